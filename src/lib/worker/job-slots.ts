import { CapacityError } from '@/lib/errors';
import { Future } from '@/lib/utils/future';

export interface JobSlotsOptions {
  maxConcurrent: number;
  maxQueued: number;
}

export interface SlotReservation {
  /** True when the job has to wait for a running one to finish. */
  queued: boolean;
  /** Resolves once the job may start. */
  ready: Promise<void>;
}

/**
 * Bounded worker pool with a FIFO admission queue.
 *
 * At most `maxConcurrent` jobs run; up to `maxQueued` more wait their turn.
 * Anything beyond that is rejected up front with a CapacityError rather than
 * growing without bound.
 */
export class JobSlots {
  private running = 0;
  private readonly waiting: Future<void>[] = [];

  constructor(private readonly options: JobSlotsOptions) {}

  reserve(): SlotReservation {
    if (this.running < this.options.maxConcurrent) {
      this.running++;
      return { queued: false, ready: Promise.resolve() };
    }
    if (this.waiting.length >= this.options.maxQueued) {
      throw new CapacityError(
        `Too many analysis jobs in progress (${this.running} running, ${this.waiting.length} queued). Try again later.`,
        { running: this.running, queued: this.waiting.length },
      );
    }
    const turn = new Future<void>();
    this.waiting.push(turn);
    return { queued: true, ready: turn.promise };
  }

  /** Hand the slot to the next queued job, or free it. */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next.resolve();
      return;
    }
    this.running = Math.max(0, this.running - 1);
  }

  get stats(): { running: number; queued: number } {
    return { running: this.running, queued: this.waiting.length };
  }
}
