import { createLogger } from '@/lib/logger';
import type { Runtime } from '@/lib/runtime';

const log = createLogger('startup');

const SHUTDOWN_GRACE_MS = 25_000;

/**
 * Cold-start housekeeping, then background work:
 * 1. Drop progress files orphaned by the previous process
 * 2. Start the session janitor (first sweep runs immediately)
 * Returns the shutdown routine.
 */
export async function startRuntime(runtime: Runtime): Promise<(signal: string) => Promise<void>> {
  const removed = await runtime.progress.prepare();
  if (removed > 0) log.info(`Cleaned ${removed} orphaned progress file(s)`);

  runtime.janitor.start();
  log.info(
    `Janitor started (every ${runtime.settings.JANITOR_INTERVAL_MS}ms, max session age ${runtime.settings.SESSION_MAX_AGE_MS}ms)`,
  );

  return async (signal: string) => {
    log.info(`Received ${signal}, shutting down...`);
    runtime.janitor.stop();
    let graceTimer: ReturnType<typeof setTimeout> | undefined;
    await Promise.race([
      runtime.runner.shutdown(),
      new Promise<void>((resolve) => {
        graceTimer = setTimeout(resolve, SHUTDOWN_GRACE_MS);
      }),
    ]);
    clearTimeout(graceTimer);
  };
}

/** Wire SIGTERM/SIGINT to a graceful shutdown followed by exit. */
export function installSignalHandlers(shutdown: (signal: string) => Promise<void>): void {
  let stopping = false;
  const onSignal = (signal: string) => {
    if (stopping) return;
    stopping = true;
    void shutdown(signal)
      .catch((err: unknown) => log.error('Shutdown failed:', err))
      .finally(() => process.exit(0));
  };
  process.once('SIGTERM', () => onSignal('SIGTERM'));
  process.once('SIGINT', () => onSignal('SIGINT'));
}
