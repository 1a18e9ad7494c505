import { NextRequest, NextResponse } from 'next/server';
import { withErrorBoundary } from '@/lib/api-handler';
import { toSessionView, type ApiResponse, type SessionView } from '@/lib/api-types';
import { SessionNotFoundError } from '@/lib/errors';
import { getRuntime } from '@/lib/runtime';
import { clearSessionCookie, readSessionCookie } from '@/lib/session-cookie';

export const GET = withErrorBoundary(async (req: NextRequest) => {
  const { sessions, settings } = getRuntime();
  const sessionId = readSessionCookie(req, settings);
  const info = sessionId ? await sessions.info(sessionId) : undefined;
  if (!info) throw new SessionNotFoundError(sessionId);
  return NextResponse.json<ApiResponse<SessionView>>({ data: toSessionView(info) });
});

/** Delete the caller's session directory now and drop the cookie. */
export const DELETE = withErrorBoundary(async (req: NextRequest) => {
  const { sessions, settings } = getRuntime();
  const sessionId = readSessionCookie(req, settings);
  const cleared = sessionId ? await sessions.clear(sessionId) : false;
  const response = NextResponse.json<ApiResponse<{ cleared: boolean }>>({ data: { cleared } });
  clearSessionCookie(response, settings);
  return response;
});
