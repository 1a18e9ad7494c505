import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NextRequest } from 'next/server';
import { installTestRuntime, type TestRuntime } from '@/lib/__tests__/helpers/test-runtime';
import { GET } from '../route';

let env: TestRuntime;

beforeEach(async () => {
  env = await installTestRuntime();
});

afterEach(async () => {
  await env.dispose();
});

describe('GET /api/health', () => {
  it('reports job, session and janitor state', async () => {
    const sessionId = await env.runtime.sessions.resolveOrCreate(undefined, 'cli');
    env.runtime.jobs.submit({ kind: 'page-analysis', sessionId });

    const res = await GET(new NextRequest('http://localhost/api/health'), {
      params: Promise.resolve({}),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'ok',
      jobs: { active: 1, running: 0, queued: 0 },
      sessions: { web: 0, cli: 1 },
      janitor: { running: false },
    });
  });
});
