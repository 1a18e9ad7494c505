import type { JobStatus } from './types';

/**
 * Valid job status transitions.
 * Key = current status, Value = set of valid next statuses.
 * starting -> error covers validation and launch failures, which never reach running.
 */
export const JOB_TRANSITIONS: Record<JobStatus, ReadonlySet<JobStatus>> = {
  starting: new Set(['running', 'error']),
  running: new Set(['complete', 'error']),
  complete: new Set(), // terminal
  error: new Set(), // terminal
};

export const TERMINAL_JOB_STATUSES: ReadonlySet<JobStatus> = new Set(['complete', 'error']);

/**
 * Check if a status transition is valid.
 * @returns true if transitioning from `current` to `next` is allowed
 */
export function isValidJobTransition(current: JobStatus, next: JobStatus): boolean {
  return JOB_TRANSITIONS[current].has(next);
}

export function isTerminalJobStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.has(status);
}
