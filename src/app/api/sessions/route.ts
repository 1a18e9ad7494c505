import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { withErrorBoundary } from '@/lib/api-handler';
import { toSessionView, type SessionListResponse } from '@/lib/api-types';
import { getRuntime } from '@/lib/runtime';
import { SESSION_KINDS } from '@/lib/types';

const kindSchema = z.enum(SESSION_KINDS).optional();

export const GET = withErrorBoundary(async (req: NextRequest) => {
  const { sessions } = getRuntime();
  const kind = kindSchema.parse(req.nextUrl.searchParams.get('kind') ?? undefined);
  const [list, counts] = await Promise.all([sessions.list(kind), sessions.countByKind()]);
  return NextResponse.json<SessionListResponse>({ data: list.map(toSessionView), counts });
});
