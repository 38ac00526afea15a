import { AsyncLock } from "@clubhouse/core";

export interface Closeable {
  close(): Promise<void> | void;
}

/**
 * Owns one lazily created handle (a store connection).
 *
 * The handle is built by `factory` on the first `get()`, never in the
 * constructor. Concurrent first callers share a single construction:
 * the lock is taken only when no handle exists, and the check is repeated
 * once it is held.
 */
export class ClientLifecycle<T extends Closeable> {
  private handle?: T;
  private readonly lock = new AsyncLock();

  constructor(
    private readonly factory: () => Promise<T> | T,
    private readonly hooks: { onOpen?: () => void; onClose?: () => void } = {}
  ) {}

  get isOpen(): boolean {
    return this.handle !== undefined;
  }

  async get(): Promise<T> {
    if (this.handle) return this.handle;

    return this.lock.runExclusive(async () => {
      if (this.handle) return this.handle;
      const handle = await this.factory();
      this.handle = handle;
      this.hooks.onOpen?.();
      return handle;
    });
  }

  /**
   * Release the handle. Safe to call when none exists, or twice.
   * Waits for a construction already in progress and closes its result.
   */
  async close(): Promise<void> {
    await this.lock.runExclusive(async () => {
      const handle = this.handle;
      if (!handle) return;
      this.handle = undefined;
      await handle.close();
      this.hooks.onClose?.();
    });
  }
}
