import type { ChildProcessWithoutNullStreams } from 'node:child_process';
import { CapacityError, SubprocessFailureError, SubprocessTimeoutError } from '@/lib/errors';
import type { JobRegistry } from '@/lib/jobs/job-registry';
import { mergeSnapshot, ProgressPoller, type ProgressChannel } from '@/lib/jobs/progress-channel';
import { createLogger } from '@/lib/logger';
import type { SessionRegistry } from '@/lib/sessions/session-registry';
import { isTerminalJobStatus } from '@/lib/state-machines';
import type { JobKind } from '@/lib/types';
import type { JobDefinition, JobWorkspace } from '@/lib/worker/job-kinds';
import { JobSlots } from '@/lib/worker/job-slots';
import {
  describeExit,
  launchProcess,
  terminateProcess,
  waitForExit,
} from '@/lib/worker/process-control';
import { extractResult } from '@/lib/worker/result-extractor';
import { StreamDrain } from '@/lib/worker/stream-drain';

const log = createLogger('job-runner');

const STDERR_TAIL_LINES = 5;

// --- Types ---

export interface JobRunnerOptions {
  jobs: JobRegistry;
  sessions: SessionRegistry;
  progress: ProgressChannel;
  definitions: Record<JobKind, JobDefinition>;
  maxConcurrentJobs: number;
  maxQueuedJobs: number;
  pollIntervalMs: number;
  drainJoinTimeoutMs: number;
  killGraceMs: number;
  maxCapturedOutputBytes: number;
}

export interface SubmitJobInput {
  kind: JobKind;
  sessionId: string;
  params: unknown;
}

// --- Runner ---

/**
 * Starts one supervised worker per submitted job.
 *
 * Each worker owns its JobRecord until the record is terminal, its analyzer
 * process group, and its progress file. Whatever happens inside a worker ends
 * as `complete` or `error` on that job only; nothing propagates to the caller
 * of `submit` or to other jobs.
 */
export class JobRunner {
  private readonly slots: JobSlots;
  private readonly workers = new Map<string, Promise<void>>();
  private readonly children = new Map<string, ChildProcessWithoutNullStreams>();
  private shuttingDown = false;

  constructor(private readonly options: JobRunnerOptions) {
    this.slots = new JobSlots({
      maxConcurrent: options.maxConcurrentJobs,
      maxQueued: options.maxQueuedJobs,
    });
  }

  definitionFor(kind: JobKind): JobDefinition {
    return this.options.definitions[kind];
  }

  /**
   * Create the job and start (or queue) its worker. Returns immediately.
   * Throws CapacityError, without creating a record, when the queue is full.
   */
  submit(input: SubmitJobInput): string {
    if (this.shuttingDown) {
      throw new CapacityError('Service is shutting down; not accepting new jobs');
    }
    const reservation = this.slots.reserve();
    const jobId = this.options.jobs.submit({ kind: input.kind, sessionId: input.sessionId });
    if (reservation.queued) {
      this.options.jobs.update(jobId, { message: 'Queued' });
      log.info(`Job ${jobId} (${input.kind}) queued`, this.slots.stats);
    }
    this.workers.set(jobId, this.supervise(jobId, input, reservation.ready));
    return jobId;
  }

  /** Resolves once the job's worker has finished. Unknown ids resolve at once. */
  async waitFor(jobId: string): Promise<void> {
    await this.workers.get(jobId);
  }

  get stats(): { running: number; queued: number } {
    return this.slots.stats;
  }

  /** Terminate every live analyzer and wait for all workers to settle. */
  async shutdown(graceMs = this.options.killGraceMs): Promise<void> {
    this.shuttingDown = true;
    const live = [...this.children.values()];
    if (live.length > 0) log.info(`Terminating ${live.length} running analyzer(s)`);
    await Promise.all(live.map((child) => terminateProcess(child, graceMs)));
    await Promise.allSettled([...this.workers.values()]);
  }

  // --- Worker ---

  private async supervise(jobId: string, input: SubmitJobInput, ready: Promise<void>): Promise<void> {
    try {
      await ready;
      if (this.shuttingDown) throw new Error('Service shut down before the job could start');
      await this.execute(jobId, input);
    } catch (err) {
      this.failJob(jobId, err);
    } finally {
      this.slots.release();
      this.workers.delete(jobId);
    }
  }

  /**
   * 1. Validate params (nothing touches disk on failure)
   * 2. Open the session's directories and the job's private output dir;
   *    a session cleared or expired meanwhile fails the job
   * 3. Launch the analyzer in its own process group -> running
   * 4. Drain stdout/stderr, poll progress, enforce the kind's timeout
   * 5. On exit: final merge, join drains, drop progress file, extract result
   */
  private async execute(jobId: string, input: SubmitJobInput): Promise<void> {
    const { jobs, sessions, progress } = this.options;
    const definition = this.definitionFor(input.kind);

    // --- 1. Validation ---
    const plan = definition.plan(input.params);

    // --- 2. Workspace ---
    const dirs = await sessions.directoriesFor(input.sessionId, jobId);
    const workspace: JobWorkspace = {
      jobId,
      dirs,
      outputDir: dirs.output,
      progressPath: progress.pathFor(jobId),
    };
    const invocation = await plan.invocationFor(workspace);

    // --- 3. Launch ---
    const child = await launchProcess(invocation);
    this.children.set(jobId, child);
    log.info(`Job ${jobId} (${input.kind}) started analyzer pid ${child.pid}`);
    if (this.shuttingDown) {
      // shutdown() ran while the spawn was in flight and could not see this child
      void terminateProcess(child, this.options.killGraceMs);
    }

    const exited = waitForExit(child);
    const stdout = new StreamDrain('stdout', child.stdout, this.options.maxCapturedOutputBytes);
    const stderr = new StreamDrain('stderr', child.stderr, this.options.maxCapturedOutputBytes);
    const poller = new ProgressPoller(progress, workspace.progressPath, (snapshot) => {
      jobs.update(jobId, mergeSnapshot(snapshot));
    });
    let timeoutTimer: ReturnType<typeof setTimeout> | null = null;
    let timedOut = false;

    try {
      jobs.update(jobId, { status: 'running', message: 'Running' });

      // --- 4. Supervise ---
      poller.start(this.options.pollIntervalMs);
      timeoutTimer = setTimeout(() => {
        timedOut = true;
        log.warn(`Job ${jobId} timed out after ${definition.timeoutMs}ms. Sending SIGTERM.`);
        void terminateProcess(child, this.options.killGraceMs);
      }, definition.timeoutMs);

      const exit = await exited;
      clearTimeout(timeoutTimer);
      timeoutTimer = null;

      // --- 5. Finalize ---
      await poller.stop();
      await poller.pollOnce();
      await this.joinDrains(jobId, child, [stdout, stderr]);
      log.debug(`Job ${jobId} analyzer ${describeExit(exit)}`, {
        stdout: stdout.stats,
        stderr: stderr.stats,
      });

      if (timedOut) {
        throw new SubprocessTimeoutError(
          `Analyzer timed out after ${Math.round(definition.timeoutMs / 1000)}s`,
          { jobId, timeoutMs: definition.timeoutMs },
        );
      }

      const result = await extractResult({
        outputDir: workspace.outputDir,
        expectedExtensions: definition.expectedExtensions,
        stdout: stdout.text(),
        stderr: stderr.text(),
        exitCode: exit.code,
        preferredLanguage: plan.preferredLanguage,
      });

      if (!result) {
        const tail = stderr.tail(STDERR_TAIL_LINES);
        throw new SubprocessFailureError(
          `Analyzer ${describeExit(exit)} without producing any artifact${tail ? `: ${tail}` : ''}`,
          { jobId, exitCode: exit.code, signal: exit.signal },
        );
      }
      if (result.partial) {
        log.warn(
          `Job ${jobId} analyzer ${describeExit(exit)} but left ${result.artifacts.length} artifact(s); marking partial`,
        );
      }
      jobs.complete(jobId, result, result.partial ? 'Completed with warnings' : 'Completed');
      log.info(`Job ${jobId} complete`, { artifacts: result.artifacts.length });
    } finally {
      if (timeoutTimer) clearTimeout(timeoutTimer);
      await poller.stop();
      if (child.exitCode === null && child.signalCode === null) {
        await terminateProcess(child, this.options.killGraceMs);
      }
      this.children.delete(jobId);
      await progress.discard(workspace.progressPath);
    }
  }

  /**
   * Wait for both pipes to close, at most drainJoinTimeoutMs. A grandchild
   * holding a pipe open past that gets its end destroyed.
   */
  private async joinDrains(
    jobId: string,
    child: ChildProcessWithoutNullStreams,
    drains: StreamDrain[],
  ): Promise<void> {
    const joined = await new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), this.options.drainJoinTimeoutMs);
      void Promise.all(drains.map((d) => d.done)).then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
    if (!joined) {
      log.warn(`Job ${jobId} output pipes still open ${this.options.drainJoinTimeoutMs}ms after exit`);
      child.stdout.destroy();
      child.stderr.destroy();
    }
  }

  private failJob(jobId: string, err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    const current = this.options.jobs.find(jobId);
    if (!current || isTerminalJobStatus(current.status)) {
      log.error(`Job ${jobId} failed after reaching a terminal state:`, err);
      return;
    }
    log.error(`Job ${jobId} failed: ${message}`);
    this.options.jobs.fail(jobId, message);
  }
}
