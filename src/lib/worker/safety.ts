import { accessSync, constants } from 'node:fs';
import { isAbsolute } from 'node:path';
import { SubprocessLaunchError } from '@/lib/errors';

export interface SafeEnvOptions {
  base?: readonly string[];
  analyzerAllowlist?: readonly string[];
}

const BASE_ENV_ALLOWLIST = ['PATH', 'HOME', 'USER', 'LANG', 'LC_ALL', 'TMPDIR', 'TZ'] as const;

/** Model, prompt and provider names: no whitespace, no shell metacharacters. */
export const SAFE_ARG_PATTERN = /^[a-zA-Z0-9_.,@:/+-]+$/;

/** ISO 639 language code with an optional region, e.g. `en`, `pt-BR`. */
export const LANGUAGE_CODE_PATTERN = /^[a-z]{2,3}(-[A-Za-z0-9]{2,8})?$/;

/**
 * Environment for the analyzer: only allowlisted variables cross over.
 * Output is forced unbuffered so progress and log lines arrive as they happen.
 */
export function buildChildEnv(opts: SafeEnvOptions = {}): Record<string, string> {
  const allowlist = [...(opts.base ?? BASE_ENV_ALLOWLIST), ...(opts.analyzerAllowlist ?? [])];
  const env: Record<string, string> = {};
  for (const key of allowlist) {
    const value = process.env[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }
  env.PYTHONUNBUFFERED = '1';
  env.PYTHONIOENCODING = 'utf-8';
  return env;
}

/**
 * Absolute binaries must exist and be executable. Bare names are left to the
 * PATH lookup at spawn time, where a miss surfaces as a launch error.
 */
export function validateBinary(binaryPath: string): void {
  if (!isAbsolute(binaryPath)) return;
  try {
    accessSync(binaryPath, constants.X_OK);
  } catch {
    throw new SubprocessLaunchError(`Analyzer binary not found or not executable: ${binaryPath}`, {
      command: binaryPath,
    });
  }
}
