import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, stat, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, rm: vi.fn(actual.rm) };
});

import { SessionNotFoundError } from '@/lib/errors';
import {
  isValidSessionId,
  makeSessionId,
  SessionRegistry,
  sessionKindOf,
} from '../session-registry';

const DAY_MS = 24 * 60 * 60 * 1000;

let root: string;
let registry: SessionRegistry;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'sessions-'));
  registry = new SessionRegistry({ rootDir: root });
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('session ids', () => {
  it('embeds kind and compact UTC timestamp', () => {
    const id = makeSessionId('web', new Date('2026-10-19T09:30:00.123Z'));
    expect(id).toMatch(/^web-20261019T093000123Z-[A-Za-z0-9_-]{12}$/);
    expect(isValidSessionId(id)).toBe(true);
  });

  it('sorts lexically by creation time within a kind', () => {
    const earlier = makeSessionId('cli', new Date('2026-10-19T09:30:00.000Z'));
    const later = makeSessionId('cli', new Date('2026-10-19T09:30:00.001Z'));
    expect([later, earlier].sort()).toEqual([earlier, later]);
  });

  it('does not collide for the same instant', () => {
    const now = new Date();
    const ids = new Set(Array.from({ length: 100 }, () => makeSessionId('web', now)));
    expect(ids.size).toBe(100);
  });

  it('rejects anything that could escape the sessions directory', () => {
    expect(isValidSessionId('../etc')).toBe(false);
    expect(isValidSessionId('web-20261019T093000123Z-../../x')).toBe(false);
    expect(isValidSessionId('')).toBe(false);
    expect(isValidSessionId(undefined)).toBe(false);
  });

  it('reads the kind from the prefix', () => {
    expect(sessionKindOf('cli-20261019T093000123Z-abcdefgh')).toBe('cli');
    expect(sessionKindOf('web-20261019T093000123Z-abcdefgh')).toBe('web');
  });
});

describe('SessionRegistry', () => {
  it('mints a session with its working directories', async () => {
    const id = await registry.resolveOrCreate();

    expect(id.startsWith('web-')).toBe(true);
    for (const sub of ['images', 'context', 'alt-text', 'reports']) {
      expect(existsSync(join(root, id, sub))).toBe(true);
    }
  });

  it('returns an existing candidate unchanged', async () => {
    const id = await registry.resolveOrCreate();
    expect(await registry.resolveOrCreate(id)).toBe(id);
  });

  it('mints a new id for malformed or vanished candidates', async () => {
    const fresh = await registry.resolveOrCreate('not-a-session');
    expect(fresh).not.toBe('not-a-session');
    expect(isValidSessionId(fresh)).toBe(true);

    const vanished = makeSessionId('web');
    const replacement = await registry.resolveOrCreate(vanished);
    expect(replacement).not.toBe(vanished);
    expect(existsSync(join(root, vanished))).toBe(false);
  });

  it('mints cli sessions on request', async () => {
    expect(sessionKindOf(await registry.resolveOrCreate(null, 'cli'))).toBe('cli');
  });

  it('requireExisting throws SessionNotFoundError instead of minting', async () => {
    await expect(registry.requireExisting(undefined)).rejects.toThrow(SessionNotFoundError);
    await expect(registry.requireExisting(makeSessionId('web'))).rejects.toThrow(
      SessionNotFoundError,
    );
    const id = await registry.resolveOrCreate();
    await expect(registry.requireExisting(id)).resolves.toBe(id);
  });

  it('touch moves the directory mtime forward', async () => {
    const id = await registry.resolveOrCreate();
    const old = new Date(Date.now() - DAY_MS);
    await utimes(join(root, id), old, old);
    registry.forgetAll();

    await registry.touch(id);

    const { mtimeMs } = await stat(join(root, id));
    expect(mtimeMs).toBeGreaterThan(old.getTime() + DAY_MS / 2);
  });

  it('touch throws once the directory is gone', async () => {
    const id = await registry.resolveOrCreate();
    await rm(join(root, id), { recursive: true });
    await expect(registry.touch(id)).rejects.toThrow(SessionNotFoundError);
  });

  it('survives a restart: a session on disk is found without the cache', async () => {
    const id = await registry.resolveOrCreate();
    registry.forgetAll();

    const reopened = new SessionRegistry({ rootDir: root });
    expect(await reopened.exists(id)).toBe(true);
    expect(await reopened.resolveOrCreate(id)).toBe(id);
    expect((await reopened.info(id))?.kind).toBe('web');
  });

  it('expireOlderThan(0) removes every session', async () => {
    const a = await registry.resolveOrCreate();
    const b = await registry.resolveOrCreate(null, 'cli');
    await new Promise((resolve) => setTimeout(resolve, 5));

    const report = await registry.expireOlderThan(0);

    expect(report.removed.sort()).toEqual([a, b].sort());
    expect(report.failed).toEqual([]);
    expect(existsSync(join(root, a))).toBe(false);
  });

  it('expireOlderThan(huge) removes nothing', async () => {
    await registry.resolveOrCreate();
    const report = await registry.expireOlderThan(365 * DAY_MS);
    expect(report).toEqual({ removed: [], failed: [] });
  });

  it('expires sessions known only from disk by their mtime', async () => {
    const stale = makeSessionId('web', new Date(Date.now() - 2 * DAY_MS));
    await mkdir(join(root, stale, 'images'), { recursive: true });
    const old = new Date(Date.now() - 2 * DAY_MS);
    await utimes(join(root, stale), old, old);
    const fresh = await registry.resolveOrCreate();

    const report = await registry.expireOlderThan(DAY_MS);

    expect(report.removed).toEqual([stale]);
    expect(existsSync(join(root, fresh))).toBe(true);
  });

  it('keeps a session whose cache is fresher than its mtime', async () => {
    const id = await registry.resolveOrCreate();
    const old = new Date(Date.now() - 2 * DAY_MS);
    await utimes(join(root, id), old, old);

    const report = await registry.expireOlderThan(DAY_MS);

    expect(report.removed).toEqual([]);
  });

  it('ignores stray entries in the sessions directory', async () => {
    await writeFile(join(root, 'notes.txt'), 'x');
    await mkdir(join(root, 'not-a-session'));

    expect(await registry.list()).toEqual([]);
    expect(await registry.expireOlderThan(0)).toEqual({ removed: [], failed: [] });
    expect(existsSync(join(root, 'not-a-session'))).toBe(true);
  });

  it('clear removes the session at once and reports whether it existed', async () => {
    const id = await registry.resolveOrCreate();
    expect(await registry.clear(id)).toBe(true);
    expect(existsSync(join(root, id))).toBe(false);
    expect(await registry.clear(id)).toBe(false);
    expect(await registry.clear('../etc')).toBe(false);
  });

  it('directoriesFor returns the working subdirectories, idempotently', async () => {
    const id = await registry.resolveOrCreate();
    await rm(join(root, id, 'context'), { recursive: true });

    const dirs = await registry.directoriesFor(id);

    expect(dirs).toEqual({
      root: join(root, id),
      images: join(root, id, 'images'),
      context: join(root, id, 'context'),
      altText: join(root, id, 'alt-text'),
      reports: join(root, id, 'reports'),
    });
    expect((await stat(dirs.context)).isDirectory()).toBe(true);
    await expect(registry.directoriesFor(id)).resolves.toEqual(dirs);
  });

  it('directoriesFor with a job id adds the job output directory', async () => {
    const id = await registry.resolveOrCreate();
    const jobId = '3f2b8c1e-9a4d-4e7b-8c2a-1d5e6f7a8b9c';

    const dirs = await registry.directoriesFor(id, jobId);

    expect(dirs.output).toBe(join(root, id, 'reports', jobId));
    expect((await stat(dirs.output)).isDirectory()).toBe(true);
  });

  it('directoriesFor never recreates a cleared session', async () => {
    const id = await registry.resolveOrCreate();
    await registry.clear(id);

    await expect(registry.directoriesFor(id)).rejects.toThrow(SessionNotFoundError);
    await expect(
      registry.directoriesFor(id, '3f2b8c1e-9a4d-4e7b-8c2a-1d5e6f7a8b9c'),
    ).rejects.toThrow(SessionNotFoundError);
    expect(existsSync(join(root, id))).toBe(false);
  });

  it('lists sessions most recently used first and counts by kind', async () => {
    const web = await registry.resolveOrCreate();
    const cli = await registry.resolveOrCreate(null, 'cli');
    await new Promise((resolve) => setTimeout(resolve, 5));
    await registry.touch(web);

    const all = await registry.list();
    expect(all.map((s) => s.sessionId)).toEqual([web, cli]);
    expect(all[0].ageHours).toBe(0);
    expect((await registry.list('cli')).map((s) => s.sessionId)).toEqual([cli]);
    expect(await registry.countByKind()).toEqual({ web: 1, cli: 1 });
  });

  it('info describes one session, or nothing for an unknown id', async () => {
    const id = await registry.resolveOrCreate();
    expect((await registry.info(id))?.sessionId).toBe(id);
    expect(await registry.info(makeSessionId('web'))).toBeUndefined();
  });

  it('counts nothing when the root does not exist yet', async () => {
    const empty = new SessionRegistry({ rootDir: join(root, 'missing') });
    expect(await empty.countByKind()).toEqual({ web: 0, cli: 0 });
  });

  it('reports a failed removal and keeps sweeping', async () => {
    const a = await registry.resolveOrCreate();
    const b = await registry.resolveOrCreate();
    await new Promise((resolve) => setTimeout(resolve, 5));
    vi.mocked(rm).mockRejectedValueOnce(new Error('EBUSY: resource busy'));

    const report = await registry.expireOlderThan(0);

    expect(report.removed).toHaveLength(1);
    expect(report.failed).toEqual([
      { sessionId: expect.any(String), error: 'EBUSY: resource busy' },
    ]);
    expect([...report.removed, report.failed[0].sessionId].sort()).toEqual([a, b].sort());
  });
});
