import { randomBytes } from 'node:crypto';
import { mkdir, readdir, rm, stat, utimes } from 'node:fs/promises';
import { join } from 'node:path';
import { differenceInMinutes } from 'date-fns';
import { SessionNotFoundError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { KeyedAsyncLock } from '@/lib/utils/async-lock';
import type {
  ExpiryReport,
  JobDirectories,
  SessionDirectories,
  SessionInfo,
  SessionKind,
  SessionRecord,
} from '@/lib/types';

const log = createLogger('sessions');

// web-20261019T093000123Z-q1w2e3r4t5y6
const SESSION_ID_PATTERN = /^(web|cli)-\d{8}T\d{9}Z-[A-Za-z0-9_-]{8,32}$/;

const SUBDIRECTORIES = {
  images: 'images',
  context: 'context',
  altText: 'alt-text',
  reports: 'reports',
} as const;

export interface SessionRegistryOptions {
  /** Directory holding one subdirectory per session. */
  rootDir: string;
}

/** Lexically sortable, timestamp-prefixed, collision-resistant session id. */
export function makeSessionId(kind: SessionKind, now: Date = new Date()): string {
  // 2026-10-19T09:30:00.123Z -> 20261019T093000123Z
  const compact = now.toISOString().replace(/[-:.]/g, '');
  const rand = randomBytes(9).toString('base64url');
  return `${kind}-${compact}-${rand}`;
}

export function isValidSessionId(value: unknown): value is string {
  return typeof value === 'string' && SESSION_ID_PATTERN.test(value);
}

export function sessionKindOf(sessionId: string): SessionKind {
  return sessionId.startsWith('cli-') ? 'cli' : 'web';
}

function withAge(record: SessionRecord, now: Date): SessionInfo {
  return { ...record, ageHours: differenceInMinutes(now, record.createdAt) / 60 };
}

/**
 * Caller-scoped working directories with inactivity expiry.
 *
 * The directory on disk is the source of truth. The in-memory map is only a
 * cache of timestamps, rebuilt from the directory's mtime whenever an id is
 * seen that the map does not know (e.g. after a restart). `touch` writes the
 * access time to the directory too, so it survives restarts as well.
 */
export class SessionRegistry {
  private readonly records = new Map<string, SessionRecord>();
  private readonly locks = new KeyedAsyncLock();

  constructor(private readonly options: SessionRegistryOptions) {}

  /**
   * Returns `candidateId` unchanged when its directory exists, touching it.
   * Anything else (absent, malformed, or deleted) gets a freshly minted session.
   */
  async resolveOrCreate(candidateId?: string | null, kind: SessionKind = 'web'): Promise<string> {
    if (isValidSessionId(candidateId)) {
      const resolved = await this.locks.acquire(candidateId, async () => {
        if (!(await this.directoryExists(candidateId))) return null;
        await this.touchUnlocked(candidateId);
        return candidateId;
      });
      if (resolved) return resolved;
      log.debug(`Session ${candidateId} has no directory; minting a new one`);
    }
    return this.create(kind);
  }

  /** Like resolveOrCreate, but never mints: a missing session is an error. */
  async requireExisting(candidateId?: string | null): Promise<string> {
    if (!isValidSessionId(candidateId)) throw new SessionNotFoundError();
    await this.touch(candidateId);
    return candidateId;
  }

  async exists(sessionId: string): Promise<boolean> {
    return isValidSessionId(sessionId) && this.directoryExists(sessionId);
  }

  async touch(sessionId: string): Promise<void> {
    if (!isValidSessionId(sessionId)) throw new SessionNotFoundError(sessionId);
    await this.locks.acquire(sessionId, () => this.touchUnlocked(sessionId));
  }

  /**
   * Working subdirectories of an existing session, created idempotently under
   * the session lock; with a job id, also that job's private
   * `reports/<jobId>` directory. A cleared or expired session is never
   * brought back: that is a SessionNotFoundError.
   */
  directoriesFor(sessionId: string): Promise<SessionDirectories>;
  directoriesFor(sessionId: string, jobId: string): Promise<JobDirectories>;
  async directoriesFor(
    sessionId: string,
    jobId?: string,
  ): Promise<SessionDirectories | JobDirectories> {
    if (!isValidSessionId(sessionId)) throw new SessionNotFoundError(sessionId);
    return this.locks.acquire(sessionId, async () => {
      if (!(await this.directoryExists(sessionId))) throw new SessionNotFoundError(sessionId);
      const dirs = await this.ensureDirectories(sessionId);
      await this.touchUnlocked(sessionId);
      if (jobId === undefined) return dirs;
      const output = join(dirs.reports, jobId);
      await mkdir(output, { recursive: true });
      return { ...dirs, output };
    });
  }

  /**
   * Remove every session whose last access predates now - maxAgeMs. Sessions
   * that exist only on disk are included. A failure on one session is
   * reported and the sweep moves on.
   */
  async expireOlderThan(maxAgeMs: number): Promise<ExpiryReport> {
    const cutoff = Date.now() - maxAgeMs;
    const report: ExpiryReport = { removed: [], failed: [] };

    for (const sessionId of await this.knownSessionIds()) {
      try {
        const removed = await this.locks.acquire(sessionId, () =>
          this.removeIfIdle(sessionId, cutoff),
        );
        if (removed) report.removed.push(sessionId);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.warn(`Failed to expire session ${sessionId}: ${message}`);
        report.failed.push({ sessionId, error: message });
      }
    }
    return report;
  }

  /** Destroy a session's artifacts immediately. Returns whether it existed. */
  async clear(sessionId: string): Promise<boolean> {
    if (!isValidSessionId(sessionId)) return false;
    return this.locks.acquire(sessionId, async () => {
      const existed = await this.directoryExists(sessionId);
      await rm(this.pathOf(sessionId), { recursive: true, force: true });
      this.records.delete(sessionId);
      if (existed) log.info(`Cleared session ${sessionId}`);
      return existed;
    });
  }

  /** Record plus age, or undefined when the session is not on disk. */
  async info(sessionId: string): Promise<SessionInfo | undefined> {
    if (!isValidSessionId(sessionId)) return undefined;
    const record = await this.loadRecord(sessionId);
    return record ? withAge(record, new Date()) : undefined;
  }

  /** Sessions currently on disk, most recently used first. */
  async list(kind?: SessionKind): Promise<SessionInfo[]> {
    const now = new Date();
    const infos: SessionInfo[] = [];
    for (const sessionId of await this.sessionIdsOnDisk()) {
      if (kind && sessionKindOf(sessionId) !== kind) continue;
      const record = await this.loadRecord(sessionId);
      if (record) infos.push(withAge(record, now));
    }
    return infos.sort((a, b) => b.lastAccessedAt - a.lastAccessedAt);
  }

  async countByKind(): Promise<Record<SessionKind, number>> {
    const counts: Record<SessionKind, number> = { web: 0, cli: 0 };
    for (const sessionId of await this.sessionIdsOnDisk()) {
      counts[sessionKindOf(sessionId)]++;
    }
    return counts;
  }

  /** Drop the in-memory cache. Disk state is untouched, as after a restart. */
  forgetAll(): void {
    this.records.clear();
  }

  // --- internals ---

  private pathOf(sessionId: string): string {
    return join(this.options.rootDir, sessionId);
  }

  private async ensureDirectories(sessionId: string): Promise<SessionDirectories> {
    const root = this.pathOf(sessionId);
    const dirs: SessionDirectories = {
      root,
      images: join(root, SUBDIRECTORIES.images),
      context: join(root, SUBDIRECTORIES.context),
      altText: join(root, SUBDIRECTORIES.altText),
      reports: join(root, SUBDIRECTORIES.reports),
    };
    await Promise.all(
      [dirs.images, dirs.context, dirs.altText, dirs.reports].map((d) =>
        mkdir(d, { recursive: true }),
      ),
    );
    return dirs;
  }

  private async create(kind: SessionKind): Promise<string> {
    const sessionId = makeSessionId(kind);
    await this.ensureDirectories(sessionId);
    const now = Date.now();
    this.records.set(sessionId, { sessionId, kind, createdAt: now, lastAccessedAt: now });
    log.info(`Created session ${sessionId}`);
    return sessionId;
  }

  private async touchUnlocked(sessionId: string): Promise<void> {
    const record = await this.loadRecord(sessionId);
    if (!record) throw new SessionNotFoundError(sessionId);
    const now = new Date();
    await utimes(this.pathOf(sessionId), now, now);
    record.lastAccessedAt = now.getTime();
  }

  private async loadRecord(sessionId: string): Promise<SessionRecord | undefined> {
    const stats = await stat(this.pathOf(sessionId)).catch(() => null);
    if (!stats?.isDirectory()) {
      this.records.delete(sessionId);
      return undefined;
    }
    let record = this.records.get(sessionId);
    if (!record) {
      const created = stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.mtimeMs;
      record = {
        sessionId,
        kind: sessionKindOf(sessionId),
        createdAt: Math.min(created, stats.mtimeMs),
        lastAccessedAt: stats.mtimeMs,
      };
      this.records.set(sessionId, record);
    }
    return record;
  }

  private async removeIfIdle(sessionId: string, cutoff: number): Promise<boolean> {
    const stats = await stat(this.pathOf(sessionId)).catch(() => null);
    if (!stats?.isDirectory()) {
      this.records.delete(sessionId);
      return false;
    }
    const cached = this.records.get(sessionId)?.lastAccessedAt ?? 0;
    const lastAccess = Math.max(cached, stats.mtimeMs);
    if (lastAccess >= cutoff) return false;

    await rm(this.pathOf(sessionId), { recursive: true, force: true });
    this.records.delete(sessionId);
    log.info(`Expired session ${sessionId}`);
    return true;
  }

  private async directoryExists(sessionId: string): Promise<boolean> {
    const stats = await stat(this.pathOf(sessionId)).catch(() => null);
    return stats?.isDirectory() ?? false;
  }

  private async sessionIdsOnDisk(): Promise<string[]> {
    try {
      const entries = await readdir(this.options.rootDir, { withFileTypes: true });
      return entries.filter((e) => e.isDirectory() && isValidSessionId(e.name)).map((e) => e.name);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw err;
    }
  }

  private async knownSessionIds(): Promise<string[]> {
    const ids = new Set(await this.sessionIdsOnDisk());
    for (const id of this.records.keys()) ids.add(id);
    return [...ids];
  }
}
