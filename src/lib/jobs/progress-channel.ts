import { randomBytes } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { createLogger } from '@/lib/logger';
import type { JobProgressPatch, ProgressSnapshot } from '@/lib/types';

const log = createLogger('progress');

const SNAPSHOT_SUFFIX = '.json';
const TEMP_SUFFIX = '.tmp';

/**
 * Wire format written by the analyzer. Keys are snake_case; `null` counts as
 * absent so writers that always emit every key still merge sparsely.
 */
const snapshotFileSchema = z.object({
  percent: z.number().finite().nullish(),
  message: z.string().nullish(),
  phase: z.string().nullish(),
  current_image: z.number().int().nonnegative().nullish(),
  total_images: z.number().int().nonnegative().nullish(),
  timestamp: z.union([z.number(), z.string()]).nullish(),
});

type SnapshotFile = z.infer<typeof snapshotFileSchema>;

function fromFile(file: SnapshotFile): ProgressSnapshot {
  const snapshot: ProgressSnapshot = {};
  if (file.percent != null) snapshot.percent = file.percent;
  if (file.message != null) snapshot.message = file.message;
  if (file.phase != null) snapshot.phase = file.phase;
  if (file.current_image != null) snapshot.currentImage = file.current_image;
  if (file.total_images != null) snapshot.totalImages = file.total_images;
  if (file.timestamp != null) {
    const ts = typeof file.timestamp === 'number' ? file.timestamp : Date.parse(file.timestamp);
    if (Number.isFinite(ts)) snapshot.timestamp = ts;
  }
  return snapshot;
}

function toFile(snapshot: ProgressSnapshot): SnapshotFile {
  return {
    percent: snapshot.percent,
    message: snapshot.message,
    phase: snapshot.phase,
    current_image: snapshot.currentImage,
    total_images: snapshot.totalImages,
    timestamp: snapshot.timestamp ?? Date.now(),
  };
}

/**
 * Builds the JobRecord patch for a snapshot: only the fields the snapshot
 * carries are present, so absent fields leave the record untouched.
 */
export function mergeSnapshot(snapshot: ProgressSnapshot): JobProgressPatch {
  const patch: JobProgressPatch = {};
  if (snapshot.percent !== undefined) {
    patch.percent = Math.min(100, Math.max(0, Math.round(snapshot.percent)));
  }
  if (snapshot.message !== undefined) patch.message = snapshot.message;
  if (snapshot.phase !== undefined) patch.phase = snapshot.phase;
  if (snapshot.currentImage !== undefined) patch.currentImage = snapshot.currentImage;
  if (snapshot.totalImages !== undefined) patch.totalImages = snapshot.totalImages;
  return patch;
}

/**
 * File-based progress channel between a worker and its analyzer subprocess.
 *
 * Writers replace the file via temp-file + rename, so a reader sees either the
 * previous snapshot or the next one, never a torn write. There is no delivery
 * guarantee: snapshots can be skipped or coalesced and the last read wins.
 */
export class ProgressChannel {
  constructor(private readonly dir: string) {}

  pathFor(jobId: string): string {
    return join(this.dir, `${jobId}${SNAPSHOT_SUFFIX}`);
  }

  /**
   * Create the channel directory and drop files left by a previous process.
   * No job survives a restart, so nothing there has a reader anymore.
   */
  async prepare(): Promise<number> {
    await mkdir(this.dir, { recursive: true });
    const leftovers = (await readdir(this.dir)).filter(
      (f) => f.endsWith(SNAPSHOT_SUFFIX) || f.endsWith(TEMP_SUFFIX),
    );
    await Promise.all(leftovers.map((f) => rm(join(this.dir, f), { force: true })));
    if (leftovers.length > 0) {
      log.info(`Removed ${leftovers.length} stale progress file(s) from ${this.dir}`);
    }
    return leftovers.length;
  }

  /** Returns null for a missing, partial, or malformed file. Never throws. */
  async read(path: string): Promise<ProgressSnapshot | null> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch {
      return null;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      log.debug(`Unparseable progress file ${path}`);
      return null;
    }
    const parsed = snapshotFileSchema.safeParse(json);
    if (!parsed.success) {
      log.debug(`Progress file ${path} failed validation`, parsed.error.issues);
      return null;
    }
    return fromFile(parsed.data);
  }

  async write(path: string, snapshot: ProgressSnapshot): Promise<void> {
    const tmpPath = `${path}.${process.pid}.${randomBytes(4).toString('hex')}${TEMP_SUFFIX}`;
    await writeFile(tmpPath, JSON.stringify(toFile(snapshot)), 'utf-8');
    await rename(tmpPath, path);
  }

  async discard(path: string): Promise<void> {
    await rm(path, { force: true });
  }
}

/**
 * Polls one progress file at a fixed interval without ever overlapping reads.
 * `stop()` waits for a read already in flight, so no snapshot lands after it.
 */
export class ProgressPoller {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly channel: ProgressChannel,
    private readonly path: string,
    private readonly onSnapshot: (snapshot: ProgressSnapshot) => void,
  ) {}

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.inFlight) return;
      void this.pollOnce();
    }, intervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  /** One read-and-merge cycle. Resolves even when the read finds nothing. */
  pollOnce(): Promise<void> {
    const run = (async () => {
      const snapshot = await this.channel.read(this.path);
      if (!snapshot) return;
      try {
        this.onSnapshot(snapshot);
      } catch (err) {
        log.warn(`Dropped progress snapshot from ${this.path}:`, err);
      }
    })();
    this.inFlight = run.finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }
}
