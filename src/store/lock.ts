/**
 * Exclusive guard around the booking collection.
 *
 * Every store operation runs synchronously inside `run`, so on the event loop
 * callers are served one at a time in arrival order. An operation that throws
 * while holding the guard poisons it: from then on, and for any attempt to
 * re-enter while held, `run` returns the caller's fallback instead of running.
 */
export class StoreLock {
  private held = false;
  private poisoned = false;

  get isPoisoned(): boolean {
    return this.poisoned;
  }

  run<T>(operation: string, fallback: T, fn: () => T): T {
    if (this.poisoned) {
      console.warn(`[Store] Lock is poisoned — ${operation} returns an empty result`);
      return fallback;
    }
    if (this.held) {
      console.warn(`[Store] Lock already held — ${operation} returns an empty result`);
      return fallback;
    }

    this.held = true;
    try {
      return fn();
    } catch (err) {
      this.poisoned = true;
      console.error(`[Store] ${operation} failed while holding the lock:`, err);
      return fallback;
    } finally {
      this.held = false;
    }
  }
}
