/**
 * Future<T> — an externally-resolvable promise.
 *
 * Used wherever a promise has to be settled from an event handler rather
 * than from its executor: admission slots handed to queued jobs, and the
 * end-of-stream signal of an output drain. Resolving twice is a no-op.
 */
export class Future<T> {
  readonly promise: Promise<T>;
  private _resolve!: (value: T) => void;
  private resolved = false;

  constructor() {
    this.promise = new Promise<T>((res) => {
      this._resolve = res;
    });
  }

  resolve(value: T): void {
    if (this.resolved) return;
    this.resolved = true;
    this._resolve(value);
  }
}
