import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  collectWarnings,
  extractResult,
  parseImagesProcessed,
  pickAltText,
} from '../result-extractor';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'extract-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const base = { stdout: '', stderr: '', exitCode: 0 };

describe('pickAltText', () => {
  it('returns a single-language alt text as is', () => {
    expect(pickAltText({ proposed_alt_text: 'A cat on a sofa' })).toBe('A cat on a sofa');
  });

  it('picks the preferred language from [lang, text] pairs, case-insensitively', () => {
    const file: { proposed_alt_text: [string, string][] } = {
      proposed_alt_text: [
        ['EN', 'A dog'],
        ['IT', 'Un cane'],
      ],
    };
    expect(pickAltText(file, 'it')).toBe('Un cane');
    expect(pickAltText(file, 'de')).toBe('A dog');
    expect(pickAltText(file)).toBe('A dog');
  });

  it('falls back to alt_text, then to empty', () => {
    expect(pickAltText({ alt_text: 'Legacy field' })).toBe('Legacy field');
    expect(pickAltText({})).toBe('');
    expect(pickAltText({ proposed_alt_text: [] })).toBe('');
  });
});

describe('parseImagesProcessed', () => {
  it('takes the last count the analyzer printed', () => {
    const stdout = 'Processing 4 images...\n  Total images: 4\nJSON files generated: 3\n';
    expect(parseImagesProcessed(stdout)).toBe(3);
  });

  it('returns undefined when no count was printed', () => {
    expect(parseImagesProcessed('nothing here')).toBeUndefined();
  });
});

describe('collectWarnings', () => {
  it('keeps ERROR and WARNING lines from every stream', () => {
    expect(
      collectWarnings('ok\nWARNING: slow provider\n', 'Traceback\nERROR: image 3 failed\n'),
    ).toEqual(['WARNING: slow provider', 'ERROR: image 3 failed']);
  });
});

describe('extractResult', () => {
  it('returns null when no expected artifact exists', async () => {
    await writeFile(join(dir, 'debug.log'), 'x');
    const result = await extractResult({ ...base, outputDir: dir, expectedExtensions: ['.html'] });
    expect(result).toBeNull();
  });

  it('returns null for a missing output directory', async () => {
    const result = await extractResult({
      ...base,
      outputDir: join(dir, 'missing'),
      expectedExtensions: ['.html'],
    });
    expect(result).toBeNull();
  });

  it('collects artifacts, report path and alt texts', async () => {
    await writeFile(join(dir, 'report.html'), '<html></html>');
    await writeFile(
      join(dir, 'a.json'),
      JSON.stringify({ image_id: 'hero.png', proposed_alt_text: 'Mountain at dawn' }),
    );
    await writeFile(join(dir, 'b.json'), JSON.stringify({ proposed_alt_text: 'Logo' }));
    await writeFile(join(dir, 'broken.json'), '{');

    const result = await extractResult({
      ...base,
      stdout: 'JSON files generated: 2\n',
      outputDir: dir,
      expectedExtensions: ['.html', '.json'],
    });

    expect(result).toEqual({
      artifacts: ['a.json', 'b.json', 'broken.json', 'report.html'],
      outputDir: dir,
      reportPath: join(dir, 'report.html'),
      altTexts: { 'hero.png': 'Mountain at dawn', b: 'Logo' },
      imagesProcessed: 2,
      exitCode: 0,
      partial: false,
      warnings: ['Unreadable alt-text file: broken.json'],
    });
  });

  it('finds artifacts in nested directories and keys their alt texts by folder', async () => {
    await mkdir(join(dir, 'v1'));
    await writeFile(join(dir, 'comparison.csv'), '"Image Filename"\n');
    await writeFile(
      join(dir, 'v1', 'x.json'),
      JSON.stringify({ image_id: 'x.jpg', proposed_alt_text: 'Red door' }),
    );

    const result = await extractResult({
      ...base,
      outputDir: dir,
      expectedExtensions: ['.html', '.csv'],
    });

    expect(result?.artifacts).toEqual(['comparison.csv']);
    expect(result?.csvPath).toBe(join(dir, 'comparison.csv'));
    expect(result?.reportPath).toBeUndefined();
    expect(result?.altTexts).toEqual({ 'v1/x.jpg': 'Red door' });
  });

  it('marks a non-zero exit with artifacts as partial', async () => {
    await writeFile(join(dir, 'report.html'), '<html></html>');

    const result = await extractResult({
      ...base,
      exitCode: 3,
      stderr: 'ERROR: quota exceeded\n',
      outputDir: dir,
      expectedExtensions: ['.html'],
    });

    expect(result?.partial).toBe(true);
    expect(result?.warnings).toEqual([
      'ERROR: quota exceeded',
      'Analyzer exited with code 3 but produced artifacts',
    ]);
  });

  it('treats a signal exit (null code) as partial', async () => {
    await writeFile(join(dir, 'report.html'), '<html></html>');
    const result = await extractResult({
      ...base,
      exitCode: null,
      outputDir: dir,
      expectedExtensions: ['.html'],
    });
    expect(result?.partial).toBe(true);
    expect(result?.warnings).toEqual(['Analyzer exited with code unknown but produced artifacts']);
  });
});
