import type { Readable } from 'node:stream';
import { Future } from '@/lib/utils/future';

export interface StreamDrainStats {
  byteSize: number;
  lineCount: number;
  truncated: boolean;
}

/**
 * Consumes a child's stdout or stderr for as long as the stream is open.
 *
 * Reading must never stop while the child runs: an unread pipe fills the
 * kernel buffer and blocks the child's next write. Only the last `maxBytes`
 * are retained for result extraction and diagnostics; byte and line counts
 * cover the whole stream.
 */
export class StreamDrain {
  private chunks: Buffer[] = [];
  private retainedBytes = 0;
  private byteSize = 0;
  private lineCount = 0;
  private truncated = false;
  private readonly finished = new Future<void>();

  constructor(
    readonly label: 'stdout' | 'stderr',
    stream: Readable,
    private readonly maxBytes: number,
  ) {
    stream.on('data', (chunk: Buffer | string) => this.append(chunk));
    stream.once('end', () => this.finished.resolve());
    stream.once('close', () => this.finished.resolve());
    stream.once('error', () => this.finished.resolve());
  }

  /** Resolves when the stream has ended, closed, or errored. */
  get done(): Promise<void> {
    return this.finished.promise;
  }

  get stats(): StreamDrainStats {
    return { byteSize: this.byteSize, lineCount: this.lineCount, truncated: this.truncated };
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf-8');
  }

  /** Last `lines` non-empty lines of retained output. */
  tail(lines: number): string {
    return this.text()
      .split('\n')
      .map((l) => l.trimEnd())
      .filter(Boolean)
      .slice(-lines)
      .join('\n');
  }

  private append(chunk: Buffer | string): void {
    const buf = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
    this.byteSize += buf.byteLength;
    for (const byte of buf) {
      if (byte === 0x0a) this.lineCount++;
    }
    this.chunks.push(buf);
    this.retainedBytes += buf.byteLength;
    while (this.retainedBytes > this.maxBytes && this.chunks.length > 1) {
      const dropped = this.chunks.shift();
      if (!dropped) break;
      this.retainedBytes -= dropped.byteLength;
      this.truncated = true;
    }
  }
}
