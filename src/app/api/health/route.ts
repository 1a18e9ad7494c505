import { NextResponse } from 'next/server';
import { withErrorBoundary } from '@/lib/api-handler';
import { getRuntime } from '@/lib/runtime';

export const GET = withErrorBoundary(async () => {
  const { jobs, runner, sessions, janitor } = getRuntime();
  return NextResponse.json({
    status: 'ok',
    jobs: { active: jobs.countActive(), ...runner.stats },
    sessions: await sessions.countByKind(),
    janitor: { running: janitor.isRunning },
  });
});
