import { randomUUID } from 'node:crypto';
import { ConflictError, NotFoundError } from '@/lib/errors';
import { isTerminalJobStatus, isValidJobTransition } from '@/lib/state-machines';
import type { JobProgressPatch, JobRecord, JobResult, NewJob } from '@/lib/types';

export interface JobRegistryOptions {
  /** How long a terminal record stays readable after it finished. */
  retentionMs: number;
}

export interface JobUpdate extends JobProgressPatch {
  status?: 'running';
}

export interface ListJobsInput {
  sessionId?: string;
}

/**
 * In-memory catalog of job records.
 *
 * Only the owning worker mutates a record while it is non-terminal; every read
 * hands out a deep copy so pollers never see a record mid-update. Terminal
 * records are purged lazily on the next read once `retentionMs` has elapsed.
 */
export class JobRegistry {
  private readonly records = new Map<string, JobRecord>();

  constructor(private readonly options: JobRegistryOptions) {}

  submit(input: NewJob): string {
    const jobId = randomUUID();
    const now = Date.now();
    this.records.set(jobId, {
      jobId,
      kind: input.kind,
      sessionId: input.sessionId,
      status: 'starting',
      percent: 0,
      message: 'Starting',
      createdAt: now,
      updatedAt: now,
    });
    return jobId;
  }

  get(jobId: string): JobRecord {
    const record = this.find(jobId);
    if (!record) throw new NotFoundError('Job', jobId);
    return record;
  }

  find(jobId: string): JobRecord | undefined {
    this.purgeExpired();
    const record = this.records.get(jobId);
    return record ? structuredClone(record) : undefined;
  }

  list(input: ListJobsInput = {}): JobRecord[] {
    this.purgeExpired();
    return [...this.records.values()]
      .filter((r) => input.sessionId === undefined || r.sessionId === input.sessionId)
      .sort((a, b) => b.createdAt - a.createdAt)
      .map((r) => structuredClone(r));
  }

  update(jobId: string, patch: JobUpdate): JobRecord {
    const record = this.requireLive(jobId);
    if (patch.status && patch.status !== record.status) {
      this.assertTransition(record, patch.status);
      record.status = patch.status;
    }
    applyProgress(record, patch);
    record.updatedAt = Date.now();
    return structuredClone(record);
  }

  complete(jobId: string, result: JobResult, message = 'Completed'): JobRecord {
    const record = this.requireLive(jobId);
    this.assertTransition(record, 'complete');
    const now = Date.now();
    record.status = 'complete';
    record.message = message;
    record.result = structuredClone(result);
    delete record.error;
    record.updatedAt = now;
    record.finishedAt = now;
    return structuredClone(record);
  }

  fail(jobId: string, error: string): JobRecord {
    const record = this.requireLive(jobId);
    this.assertTransition(record, 'error');
    const now = Date.now();
    record.status = 'error';
    record.message = 'Failed';
    record.error = error;
    delete record.result;
    record.updatedAt = now;
    record.finishedAt = now;
    return structuredClone(record);
  }

  /** Jobs that have not reached a terminal state yet. */
  countActive(): number {
    let active = 0;
    for (const record of this.records.values()) {
      if (!isTerminalJobStatus(record.status)) active++;
    }
    return active;
  }

  /** Test hook: drop every record. */
  reset(): void {
    this.records.clear();
  }

  private requireLive(jobId: string): JobRecord {
    const record = this.records.get(jobId);
    if (!record) throw new NotFoundError('Job', jobId);
    if (isTerminalJobStatus(record.status)) {
      throw new ConflictError(`Job ${jobId} is already ${record.status}`, {
        jobId,
        status: record.status,
      });
    }
    return record;
  }

  private assertTransition(record: JobRecord, next: JobRecord['status']): void {
    if (!isValidJobTransition(record.status, next)) {
      throw new ConflictError(`Invalid job transition ${record.status} -> ${next}`, {
        jobId: record.jobId,
      });
    }
  }

  private purgeExpired(): void {
    const cutoff = Date.now() - this.options.retentionMs;
    for (const [jobId, record] of this.records) {
      if (record.finishedAt !== undefined && record.finishedAt <= cutoff) {
        this.records.delete(jobId);
      }
    }
  }
}

function applyProgress(record: JobRecord, patch: JobProgressPatch): void {
  if (patch.percent !== undefined) record.percent = patch.percent;
  if (patch.message !== undefined) record.message = patch.message;
  if (patch.phase !== undefined) record.phase = patch.phase;
  if (patch.currentImage !== undefined) record.currentImage = patch.currentImage;
  if (patch.totalImages !== undefined) record.totalImages = patch.totalImages;
}
