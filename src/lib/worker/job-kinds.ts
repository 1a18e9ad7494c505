import { readdir } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { z } from 'zod';
import { ValidationError } from '@/lib/errors';
import type { JobKind, SessionDirectories } from '@/lib/types';
import type { AnalyzerInvocation } from '@/lib/worker/process-control';
import {
  LANGUAGE_CODE_PATTERN,
  SAFE_ARG_PATTERN,
  buildChildEnv,
  validateBinary,
} from '@/lib/worker/safety';

const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.gif', '.webp', '.bmp', '.svg']);

const PROVIDER_NAMES: Record<string, string> = {
  openai: 'OpenAI',
  claude: 'Claude',
  'ecb-llm': 'ECB-LLM',
  ollama: 'Ollama',
};

/** Maps UI spellings (`openai`, `ecb-llm`) to the analyzer's; unknown names pass through. */
export function normalizeProviderName(name: string): string {
  return PROVIDER_NAMES[name.toLowerCase()] ?? name;
}

/** Paths a job may read from and must write into. */
export interface JobWorkspace {
  jobId: string;
  dirs: SessionDirectories;
  /** `<session>/reports/<jobId>`; owned by this job alone. */
  outputDir: string;
  progressPath: string;
}

/** A job whose params have been validated, not yet bound to directories. */
export interface JobPlan {
  /** Used to pick one alt text out of multilingual results. */
  preferredLanguage?: string;
  /** Builds the analyzer argv against the job's directories. May reject on missing inputs. */
  invocationFor(workspace: JobWorkspace): Promise<AnalyzerInvocation>;
}

export interface JobDefinition {
  kind: JobKind;
  timeoutMs: number;
  /** When true the caller must already hold a session with inputs in it. */
  requiresExistingSession: boolean;
  expectedExtensions: readonly string[];
  /** Validates params. Throws ValidationError; touches neither disk nor processes. */
  plan(params: unknown): JobPlan;
}

export interface JobKindsOptions {
  pythonBin: string;
  analyzerScript: string;
  batchCompareScript: string;
  /** Working directory for the analyzer; scripts resolve against it. */
  cwd: string;
  pageTimeoutMs: number;
  batchTimeoutMs: number;
  maxImagesPerPage: number;
  envAllowlist: readonly string[];
}

// ---- Param schemas ----

const safeName = z.string().min(1).max(128).regex(SAFE_ARG_PATTERN, 'contains disallowed characters');
const provider = safeName.transform(normalizeProviderName);
const languages = z
  .array(z.string().regex(LANGUAGE_CODE_PATTERN, 'must be a language code such as "en" or "pt-BR"'))
  .min(1)
  .max(10)
  .default(['en']);

const providerOverrides = z.object({
  visionProvider: provider.optional(),
  visionModel: safeName.optional(),
  processingProvider: provider.optional(),
  processingModel: safeName.optional(),
  translationProvider: provider.optional(),
  translationModel: safeName.optional(),
  advancedTranslation: z.boolean().default(false),
});

type ProviderOverrides = z.infer<typeof providerOverrides>;

function pageAnalysisSchema(maxImages: number) {
  return providerOverrides.extend({
    url: z
      .string()
      .url()
      .refine((u) => /^https?:\/\//i.test(u), 'must be an http(s) URL'),
    languages,
    numImages: z.number().int().positive().max(maxImages).optional(),
    geoBoost: z.boolean().default(false),
  });
}

export type PageAnalysisParams = z.infer<ReturnType<typeof pageAnalysisSchema>>;

const batchCompareSchema = providerOverrides.extend({
  prompts: z.array(safeName).min(1).max(20),
  languages,
  geoBoost: z.boolean().default(false),
});

export type BatchCompareParams = z.infer<typeof batchCompareSchema>;

// ---- Helpers ----

function parseParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, params: unknown): T {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join('.') || 'params'}: ${i.message}`)
      .join('; ');
    throw new ValidationError(`Invalid job parameters: ${detail}`, {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return parsed.data;
}

function overrideArgs(params: ProviderOverrides): string[] {
  const args: string[] = [];
  const pairs: Array<[string, string | undefined]> = [
    ['--vision-provider', params.visionProvider],
    ['--vision-model', params.visionModel],
    ['--processing-provider', params.processingProvider],
    ['--processing-model', params.processingModel],
    ['--translation-provider', params.translationProvider],
    ['--translation-model', params.translationModel],
  ];
  for (const [flag, value] of pairs) {
    if (value !== undefined) args.push(flag, value);
  }
  if (params.advancedTranslation) args.push('--advanced-translation');
  return args;
}

async function countImages(dir: string): Promise<number> {
  try {
    const entries = await readdir(dir);
    return entries.filter((f) => IMAGE_EXTENSIONS.has(extname(f).toLowerCase())).length;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return 0;
    throw err;
  }
}

// ---- Definitions ----

export function createJobDefinitions(options: JobKindsOptions): Record<JobKind, JobDefinition> {
  const cwd = resolve(options.cwd);
  const invocation = (script: string, args: string[]): AnalyzerInvocation => {
    validateBinary(options.pythonBin);
    return {
      command: options.pythonBin,
      args: [resolve(cwd, script), ...args],
      cwd,
      env: buildChildEnv({ analyzerAllowlist: options.envAllowlist }),
    };
  };
  const pageSchema = pageAnalysisSchema(options.maxImagesPerPage);

  const pageAnalysis: JobDefinition = {
    kind: 'page-analysis',
    timeoutMs: options.pageTimeoutMs,
    requiresExistingSession: false,
    expectedExtensions: ['.html', '.json'],
    plan(raw) {
      const params = parseParams(pageSchema, raw);
      return {
        preferredLanguage: params.languages[0],
        async invocationFor(ws) {
          const args = [
            '--workflow',
            params.url,
            '--language',
            ...params.languages,
            '--report',
            '--images-folder',
            ws.dirs.images,
            '--context-folder',
            ws.dirs.context,
            '--alt-text-folder',
            ws.outputDir,
            '--progress-file',
            ws.progressPath,
          ];
          if (params.numImages !== undefined) args.push('--num-images', String(params.numImages));
          args.push(...overrideArgs(params));
          if (params.geoBoost) args.push('--geo');
          return invocation(options.analyzerScript, args);
        },
      };
    },
  };

  const batchCompare: JobDefinition = {
    kind: 'batch-compare',
    timeoutMs: options.batchTimeoutMs,
    requiresExistingSession: true,
    expectedExtensions: ['.html', '.csv'],
    plan(raw) {
      const params = parseParams(batchCompareSchema, raw);
      return {
        preferredLanguage: params.languages[0],
        async invocationFor(ws) {
          if ((await countImages(ws.dirs.images)) === 0) {
            throw new ValidationError(
              'No images in this session to compare prompts on. Upload images first.',
            );
          }
          const args = [
            '--prompts',
            ...params.prompts,
            '--images-folder',
            ws.dirs.images,
            '--context-folder',
            ws.dirs.context,
            '--output-dir',
            ws.outputDir,
            '--language',
            ...params.languages,
            '--progress-file',
            ws.progressPath,
            ...overrideArgs(params),
          ];
          if (params.geoBoost) args.push('--geo-boost');
          return invocation(options.batchCompareScript, args);
        },
      };
    },
  };

  return { 'page-analysis': pageAnalysis, 'batch-compare': batchCompare };
}
