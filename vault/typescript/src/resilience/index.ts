/**
 * Deadlines and single-flight execution.
 *
 * @module resilience
 */

import { StoreTimeoutError } from '../errors/index.js';

/**
 * Races a store call against a deadline.
 *
 * The underlying call is not cancelled; its eventual result is ignored.
 *
 * @throws {StoreTimeoutError} When the deadline passes first
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StoreTimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs at most one operation per key at a time.
 *
 * Callers arriving while an operation for the same key is in flight receive
 * that operation's promise, so they all observe the same value or the same
 * error. The key is released once the operation settles.
 *
 * @example
 * ```typescript
 * const issuance = new SingleFlight<string, Credential>();
 * const [a, b] = await Promise.all([
 *   issuance.run('readonly', () => issue('readonly')),
 *   issuance.run('readonly', () => issue('readonly')),
 * ]);
 * // issue() ran once; a === b
 * ```
 */
export class SingleFlight<K, V> {
  private readonly inFlight: Map<K, Promise<V>> = new Map();

  run(key: K, fn: () => Promise<V>): Promise<V> {
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    // fn starts on the next microtask, after the key is registered
    const promise = Promise.resolve()
      .then(fn)
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, promise);
    return promise;
  }

  /**
   * Resolves once the call in flight for `key`, if any, has settled. Its
   * failure is left to the callers of {@link run}.
   */
  async wait(key: K): Promise<void> {
    await this.inFlight.get(key)?.catch(() => undefined);
  }

  isRunning(key: K): boolean {
    return this.inFlight.has(key);
  }

  get size(): number {
    return this.inFlight.size;
  }
}
