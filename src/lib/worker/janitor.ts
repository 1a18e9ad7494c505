import { createLogger } from '@/lib/logger';
import type { SessionRegistry } from '@/lib/sessions/session-registry';
import type { ExpiryReport } from '@/lib/types';

const log = createLogger('janitor');

export interface JanitorOptions {
  intervalMs: number;
  maxSessionAgeMs: number;
}

/**
 * Periodically reclaims idle sessions. Job records are not its concern:
 * JobRegistry purges those lazily on read.
 */
export class Janitor {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<ExpiryReport> | null = null;

  constructor(
    private readonly sessions: Pick<SessionRegistry, 'expireOlderThan'>,
    private readonly options: JanitorOptions,
  ) {}

  /** Sweep once now, then every intervalMs. */
  start(): void {
    if (this.timer) return;
    void this.sweep();
    this.timer = setInterval(() => void this.sweep(), this.options.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** Never rejects. A sweep requested while one runs joins the running one. */
  sweep(): Promise<ExpiryReport> {
    if (this.running) return this.running;
    this.running = this.runSweep().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  private async runSweep(): Promise<ExpiryReport> {
    try {
      const report = await this.sessions.expireOlderThan(this.options.maxSessionAgeMs);
      if (report.removed.length > 0 || report.failed.length > 0) {
        log.info(
          `Sweep removed ${report.removed.length} session(s), ${report.failed.length} failure(s)`,
        );
      }
      return report;
    } catch (err) {
      log.error('Session sweep failed:', err);
      return { removed: [], failed: [] };
    }
  }
}
