import { ConcurrentTransition } from "./errors";

/**
 * Single-writer guard for request status changes within one process.
 *
 * A second writer on the same key fails fast with ConcurrentTransition rather
 * than queueing behind the first; the caller's retry policy decides what next.
 * Across workers the same guarantee comes from the per-request concurrency key
 * the sync and appeal tasks are triggered with.
 */
export class RequestLock {
  private readonly held = new Set<string>();

  isHeld(key: string | number): boolean {
    return this.held.has(String(key));
  }

  async run<T>(key: string | number, fn: () => Promise<T>): Promise<T> {
    const requestKey = String(key);
    if (this.held.has(requestKey)) throw new ConcurrentTransition(requestKey);
    this.held.add(requestKey);
    try {
      return await fn();
    } finally {
      this.held.delete(requestKey);
    }
  }
}

export const requestLock = new RequestLock();
