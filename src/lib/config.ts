import { join, resolve } from 'node:path';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  DATA_DIR: z.string().default('./data'),
  // Derived from DATA_DIR when unset
  SESSIONS_DIR: z.string().optional(),
  PROGRESS_DIR: z.string().optional(),

  // External analyzer
  PYTHON_BIN: z.string().default('python3'),
  ANALYZER_SCRIPT: z.string().default('backend/app.py'),
  BATCH_COMPARE_SCRIPT: z.string().default('tools/batch_compare_prompts.py'),
  ANALYZER_CWD: z.string().optional(),
  ANALYZER_ENV_ALLOWLIST: z
    .string()
    .default('OPENAI_API_KEY:ANTHROPIC_API_KEY:OLLAMA_HOST:ECB_LLM_CLIENT_ID:ECB_LLM_CLIENT_SECRET'),

  // Supervision
  PAGE_JOB_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  BATCH_JOB_TIMEOUT_MS: z.coerce.number().int().positive().default(3_600_000),
  PROGRESS_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(500),
  DRAIN_JOIN_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5_000),
  KILL_GRACE_MS: z.coerce.number().int().nonnegative().default(5_000),
  MAX_CAPTURED_OUTPUT_BYTES: z.coerce.number().int().positive().default(1024 * 1024),
  MAX_CONCURRENT_JOBS: z.coerce.number().int().positive().default(3),
  MAX_QUEUED_JOBS: z.coerce.number().int().nonnegative().default(10),
  JOB_RETENTION_MS: z.coerce.number().int().nonnegative().default(300_000),
  MAX_IMAGES_PER_PAGE: z.coerce.number().int().positive().default(200),

  // Sessions
  SESSION_MAX_AGE_MS: z.coerce.number().int().positive().default(24 * 60 * 60 * 1000),
  JANITOR_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  SESSION_COOKIE_NAME: z.string().min(1).default('web_session_id'),
});

export type EnvConfig = z.infer<typeof envSchema>;

function loadConfig(): EnvConfig {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('Invalid environment configuration:');
    console.error(result.error.format());
    process.exit(1);
  }
  return result.data;
}

export const config = loadConfig();

/** Absolute root under which every session directory lives */
export const sessionsDir = resolve(config.SESSIONS_DIR ?? join(config.DATA_DIR, 'sessions'));

/** Absolute directory holding per-job progress files */
export const progressDir = resolve(config.PROGRESS_DIR ?? join(config.DATA_DIR, 'progress'));

/** Extra env vars forwarded to the analyzer, parsed from ANALYZER_ENV_ALLOWLIST */
export const analyzerEnvAllowlist = config.ANALYZER_ENV_ALLOWLIST.split(':').filter(Boolean);
