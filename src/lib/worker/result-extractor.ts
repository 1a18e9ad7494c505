import { readFile, readdir, stat } from 'node:fs/promises';
import { dirname, extname, join, sep } from 'node:path';
import { z } from 'zod';
import { createLogger } from '@/lib/logger';
import type { JobResult } from '@/lib/types';

const log = createLogger('result-extractor');

const MAX_WARNINGS = 20;

// "Total images: 12", "JSON files generated: 12", "Processed 12 images"
const IMAGE_COUNT_PATTERN = /(?:Total images:|JSON files generated:|Processed)\s+(\d+)/g;
const WARNING_LINE_PATTERN = /^\s*(?:ERROR|WARNING|Error|Warning)\b[:\s]/;

/** One analyzer JSON file per image. Only the fields read here are declared. */
const altTextFileSchema = z.object({
  image_id: z.string().optional(),
  proposed_alt_text: z
    .union([z.string(), z.array(z.tuple([z.string(), z.string()]))])
    .optional(),
  alt_text: z.string().optional(),
});

type AltTextFile = z.infer<typeof altTextFileSchema>;

export interface ExtractionInput {
  outputDir: string;
  /** Lower-case extensions with leading dot; any one of them counts as success. */
  expectedExtensions: readonly string[];
  stdout: string;
  stderr: string;
  exitCode: number | null;
  /** Language to pick when an alt text is given per language. */
  preferredLanguage?: string;
}

/**
 * Alt text for one image. Multilingual entries are `[lang, text]` pairs: the
 * preferred language wins, otherwise the first pair.
 */
export function pickAltText(file: AltTextFile, preferredLanguage?: string): string {
  const proposed = file.proposed_alt_text;
  if (proposed === undefined) return file.alt_text ?? '';
  if (typeof proposed === 'string') return proposed;
  const wanted = preferredLanguage?.toUpperCase();
  const match = proposed.find(([lang]) => lang.toUpperCase() === wanted);
  return (match ?? proposed[0])?.[1] ?? '';
}

/** Last image count the analyzer printed, if any. */
export function parseImagesProcessed(stdout: string): number | undefined {
  let count: number | undefined;
  for (const match of stdout.matchAll(IMAGE_COUNT_PATTERN)) {
    count = Number(match[1]);
  }
  return count;
}

export function collectWarnings(...outputs: string[]): string[] {
  const warnings: string[] = [];
  for (const output of outputs) {
    for (const line of output.split('\n')) {
      if (WARNING_LINE_PATTERN.test(line)) warnings.push(line.trim());
    }
  }
  return warnings.slice(-MAX_WARNINGS);
}

/**
 * Builds the JobResult from a job's output directory and captured output.
 * Returns null when the directory holds none of the expected artifacts,
 * whatever the exit code said.
 */
export async function extractResult(input: ExtractionInput): Promise<JobResult | null> {
  const files = await listFiles(input.outputDir);
  const expected = new Set(input.expectedExtensions);
  const artifacts = files.filter((f) => expected.has(extname(f).toLowerCase()));
  if (artifacts.length === 0) return null;

  const warnings = collectWarnings(input.stdout, input.stderr);
  const altTexts: Record<string, string> = {};
  for (const file of files.filter((f) => extname(f).toLowerCase() === '.json')) {
    const parsed = await readAltTextFile(join(input.outputDir, file));
    if (!parsed) {
      warnings.push(`Unreadable alt-text file: ${file}`);
      continue;
    }
    const key = imageKey(file, parsed.image_id);
    altTexts[key] = pickAltText(parsed, input.preferredLanguage);
  }

  const report = artifacts.find((f) => extname(f).toLowerCase() === '.html');
  const csv = artifacts.find((f) => extname(f).toLowerCase() === '.csv');
  const partial = input.exitCode !== 0;
  if (partial) {
    warnings.push(`Analyzer exited with code ${input.exitCode ?? 'unknown'} but produced artifacts`);
  }

  const result: JobResult = {
    artifacts,
    outputDir: input.outputDir,
    altTexts,
    exitCode: input.exitCode,
    partial,
    warnings,
  };
  if (report) result.reportPath = join(input.outputDir, report);
  if (csv) result.csvPath = join(input.outputDir, csv);
  const imagesProcessed = parseImagesProcessed(input.stdout);
  if (imagesProcessed !== undefined) result.imagesProcessed = imagesProcessed;
  return result;
}

/** Regular files under `dir`, as sorted paths relative to it. */
async function listFiles(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir, { recursive: true });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
    throw err;
  }
  const files: string[] = [];
  for (const entry of entries) {
    const stats = await stat(join(dir, entry)).catch(() => null);
    if (stats?.isFile()) files.push(entry);
  }
  return files.sort();
}

async function readAltTextFile(path: string): Promise<AltTextFile | null> {
  try {
    const parsed = altTextFileSchema.safeParse(JSON.parse(await readFile(path, 'utf-8')));
    return parsed.success ? parsed.data : null;
  } catch (err) {
    log.debug(`Skipping ${path}:`, err);
    return null;
  }
}

/** image_id (or the file's stem), prefixed by its subdirectory when nested. */
function imageKey(relativePath: string, imageId: string | undefined): string {
  const id = imageId ?? relativePath.slice(relativePath.lastIndexOf(sep) + 1, -'.json'.length);
  const parent = dirname(relativePath);
  return parent === '.' ? id : `${parent.split(sep).join('/')}/${id}`;
}
