import { spawn as nodeSpawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { SubprocessLaunchError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';

const log = createLogger('process');

export interface AnalyzerInvocation {
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Spawn the analyzer in its own process group so a timeout can take down
 * anything it forked. Resolves once the OS has started the process; spawn
 * failures (missing binary, bad cwd) reject with SubprocessLaunchError.
 */
export function launchProcess(invocation: AnalyzerInvocation): Promise<ChildProcessWithoutNullStreams> {
  return new Promise((resolve, reject) => {
    let child: ChildProcessWithoutNullStreams;
    try {
      child = nodeSpawn(invocation.command, invocation.args, {
        cwd: invocation.cwd,
        env: invocation.env,
        stdio: 'pipe',
        shell: false,
        detached: true,
      });
    } catch (err) {
      reject(launchError(invocation, err));
      return;
    }

    const onError = (err: Error) => reject(launchError(invocation, err));
    child.once('error', onError);
    child.once('spawn', () => {
      child.off('error', onError);
      // Errors after a successful spawn (e.g. a failed kill) must not crash the service.
      child.on('error', (err) => log.warn(`Analyzer pid ${child.pid} error:`, err));
      // The analyzer takes no input.
      child.stdin.end();
      resolve(child);
    });
  });
}

export function waitForExit(child: ChildProcessWithoutNullStreams): Promise<ProcessExit> {
  return new Promise((resolve) => {
    if (child.exitCode !== null || child.signalCode !== null) {
      resolve({ code: child.exitCode, signal: child.signalCode });
      return;
    }
    child.once('exit', (code, signal) => resolve({ code, signal }));
  });
}

/** Send a signal to the child's whole process group, falling back to the child alone. */
export function signalProcessGroup(
  child: ChildProcessWithoutNullStreams,
  signal: NodeJS.Signals,
): void {
  const pid = child.pid;
  if (!pid) return;
  try {
    process.kill(-pid, signal);
  } catch {
    try {
      process.kill(pid, signal);
    } catch {
      // Already dead
    }
  }
}

/**
 * SIGTERM -> wait -> SIGKILL escalation for a child process group.
 * Resolves once the child has exited or the SIGKILL has been sent.
 */
export async function terminateProcess(
  child: ChildProcessWithoutNullStreams,
  graceMs: number,
): Promise<void> {
  if (child.exitCode !== null || child.signalCode !== null) return;
  const exited = waitForExit(child);
  signalProcessGroup(child, 'SIGTERM');

  const exitedInGrace = await new Promise<boolean>((resolve) => {
    const graceTimer = setTimeout(() => resolve(false), graceMs);
    void exited.then(() => {
      clearTimeout(graceTimer);
      resolve(true);
    });
  });

  if (!exitedInGrace) {
    log.warn(`Analyzer pid ${child.pid} ignored SIGTERM for ${graceMs}ms. Sending SIGKILL.`);
    signalProcessGroup(child, 'SIGKILL');
  }
}

export function describeExit(exit: ProcessExit): string {
  if (exit.signal) return `terminated by ${exit.signal}`;
  return `exited with code ${exit.code ?? 'unknown'}`;
}

function launchError(invocation: AnalyzerInvocation, err: unknown): SubprocessLaunchError {
  const reason = err instanceof Error ? err.message : String(err);
  return new SubprocessLaunchError(`Could not start analyzer '${invocation.command}': ${reason}`, {
    command: invocation.command,
  });
}
