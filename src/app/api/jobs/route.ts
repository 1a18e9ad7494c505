import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { readJsonBody, withErrorBoundary } from '@/lib/api-handler';
import { toJobView, type ApiResponse, type JobView, type SubmitJobResponse } from '@/lib/api-types';
import { getRuntime } from '@/lib/runtime';
import { isValidSessionId } from '@/lib/sessions/session-registry';
import { attachSessionCookie, readSessionCookie } from '@/lib/session-cookie';
import { JOB_KINDS } from '@/lib/types';

const submitJobSchema = z.object({
  kind: z.enum(JOB_KINDS),
  params: z.record(z.unknown()).default({}),
});

/** Jobs started from the caller's session, newest first. */
export const GET = withErrorBoundary(async (req: NextRequest) => {
  const { jobs, settings } = getRuntime();
  const sessionId = readSessionCookie(req, settings);
  if (!isValidSessionId(sessionId)) {
    return NextResponse.json<ApiResponse<JobView[]>>({ data: [] });
  }
  return NextResponse.json<ApiResponse<JobView[]>>({
    data: jobs.list({ sessionId }).map(toJobView),
  });
});

/**
 * Start an analysis job. Params are validated by the job's worker, so a bad
 * param still yields a job id whose status ends in `error`.
 */
export const POST = withErrorBoundary(async (req: NextRequest) => {
  const { runner, sessions, settings } = getRuntime();
  const body = submitJobSchema.parse(await readJsonBody(req));
  const candidate = readSessionCookie(req, settings);

  const sessionId = runner.definitionFor(body.kind).requiresExistingSession
    ? await sessions.requireExisting(candidate)
    : await sessions.resolveOrCreate(candidate, 'web');

  const jobId = runner.submit({ kind: body.kind, sessionId, params: body.params });
  const response = NextResponse.json<SubmitJobResponse>(
    { job_id: jobId, status: 'started' },
    { status: 202 },
  );
  attachSessionCookie(response, sessionId, settings);
  return response;
});
