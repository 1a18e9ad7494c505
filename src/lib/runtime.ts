import {
  analyzerEnvAllowlist,
  config,
  progressDir,
  sessionsDir,
  type EnvConfig,
} from '@/lib/config';
import { JobRegistry } from '@/lib/jobs/job-registry';
import { ProgressChannel } from '@/lib/jobs/progress-channel';
import { SessionRegistry } from '@/lib/sessions/session-registry';
import { Janitor } from '@/lib/worker/janitor';
import { createJobDefinitions, type JobDefinition } from '@/lib/worker/job-kinds';
import { JobRunner } from '@/lib/worker/job-runner';
import type { JobKind } from '@/lib/types';

export interface Runtime {
  jobs: JobRegistry;
  sessions: SessionRegistry;
  progress: ProgressChannel;
  runner: JobRunner;
  janitor: Janitor;
  settings: EnvConfig;
}

export interface RuntimeOverrides {
  settings?: Partial<EnvConfig>;
  sessionsDir?: string;
  progressDir?: string;
  definitions?: Record<JobKind, JobDefinition>;
}

/** Wire every component from one settings object. Nothing starts here. */
export function createRuntime(overrides: RuntimeOverrides = {}): Runtime {
  const settings: EnvConfig = { ...config, ...overrides.settings };
  const jobs = new JobRegistry({ retentionMs: settings.JOB_RETENTION_MS });
  const sessions = new SessionRegistry({ rootDir: overrides.sessionsDir ?? sessionsDir });
  const progress = new ProgressChannel(overrides.progressDir ?? progressDir);
  const definitions =
    overrides.definitions ??
    createJobDefinitions({
      pythonBin: settings.PYTHON_BIN,
      analyzerScript: settings.ANALYZER_SCRIPT,
      batchCompareScript: settings.BATCH_COMPARE_SCRIPT,
      cwd: settings.ANALYZER_CWD ?? process.cwd(),
      pageTimeoutMs: settings.PAGE_JOB_TIMEOUT_MS,
      batchTimeoutMs: settings.BATCH_JOB_TIMEOUT_MS,
      maxImagesPerPage: settings.MAX_IMAGES_PER_PAGE,
      envAllowlist: analyzerEnvAllowlist,
    });
  const runner = new JobRunner({
    jobs,
    sessions,
    progress,
    definitions,
    maxConcurrentJobs: settings.MAX_CONCURRENT_JOBS,
    maxQueuedJobs: settings.MAX_QUEUED_JOBS,
    pollIntervalMs: settings.PROGRESS_POLL_INTERVAL_MS,
    drainJoinTimeoutMs: settings.DRAIN_JOIN_TIMEOUT_MS,
    killGraceMs: settings.KILL_GRACE_MS,
    maxCapturedOutputBytes: settings.MAX_CAPTURED_OUTPUT_BYTES,
  });
  const janitor = new Janitor(sessions, {
    intervalMs: settings.JANITOR_INTERVAL_MS,
    maxSessionAgeMs: settings.SESSION_MAX_AGE_MS,
  });
  return { jobs, sessions, progress, runner, janitor, settings };
}

declare global {
  // Next.js bundles instrumentation.ts and each route separately, so a module
  // variable would give every bundle its own runtime. The process has one.
  var __alttextRuntime: Runtime | undefined;
}

/** Process-wide runtime shared by route handlers and the startup hook. */
export function getRuntime(): Runtime {
  const runtime = globalThis.__alttextRuntime ?? createRuntime();
  globalThis.__alttextRuntime = runtime;
  return runtime;
}

/** Test hook: stop the janitor and replace (or drop) the shared runtime. */
export function resetRuntime(next: Runtime | null = null): void {
  globalThis.__alttextRuntime?.janitor.stop();
  globalThis.__alttextRuntime = next ?? undefined;
}
