/**
 * Memoizing fetch cache with request coalescing
 *
 * Keyed process-lifetime cache: completed values are kept forever, and
 * concurrent requests for a key share one underlying fetch. Failed or empty
 * fetches are delivered to everyone waiting but never stored.
 *
 * The maps are only touched synchronously between awaits, which is what
 * keeps "at most one fetch per key" true on the event loop.
 */

import type { Logger } from "@/types";
import * as logger from "@/logger";

/**
 * Produces the value for a key; receives a signal that fires when every
 * interested caller has cancelled. Return undefined for "nothing found".
 */
export type FetchFn<V> = (signal: AbortSignal) => Promise<V | undefined>;

export type CacheGetOptions = {
  /** Cancels this caller's wait only */
  signal?: AbortSignal;
};

type InFlightEntry<V> = {
  promise: Promise<V | undefined>;
  controller: AbortController;
  /** Callers still waiting, cancellable or not */
  waiters: number;
};

export class MemoizingFetchCache<K, V> {
  private readonly values = new Map<K, V>();
  private readonly inFlight = new Map<K, InFlightEntry<V>>();
  private readonly log: Logger;

  constructor(name: string) {
    this.log = logger.withContext({ cache: name });
  }

  /**
   * Get the value for key, fetching it at most once across concurrent callers
   *
   * - cached → returned without calling fetchFn
   * - in flight → joins the running fetch
   * - otherwise → runs fetchFn once and shares its result
   *
   * Never rejects: a thrown fetchFn error is reported as undefined, and so is
   * a cancelled wait.
   */
  async get(key: K, fetchFn: FetchFn<V>, options: CacheGetOptions = {}): Promise<V | undefined> {
    const cached = this.values.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const { signal } = options;
    if (signal?.aborted) {
      return undefined;
    }

    let entry = this.inFlight.get(key);
    if (entry) {
      this.log.debug("Joining in-flight fetch", { key: String(key), waiters: entry.waiters + 1 });
    } else {
      entry = this.start(key, fetchFn);
    }
    entry.waiters++;

    if (!signal) {
      return entry.promise;
    }
    return this.waitCancellable(key, entry, signal);
  }

  /**
   * Cached value without triggering a fetch
   */
  peek(key: K): V | undefined {
    return this.values.get(key);
  }

  has(key: K): boolean {
    return this.values.has(key);
  }

  get size(): number {
    return this.values.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Drop every stored value; running fetches are left alone
   */
  clear(): void {
    this.values.clear();
  }

  private start(key: K, fetchFn: FetchFn<V>): InFlightEntry<V> {
    const controller = new AbortController();
    const entry: InFlightEntry<V> = {
      controller,
      waiters: 0,
      promise: this.execute(key, fetchFn, controller),
    };
    this.inFlight.set(key, entry);
    return entry;
  }

  private async execute(
    key: K,
    fetchFn: FetchFn<V>,
    controller: AbortController,
  ): Promise<V | undefined> {
    let value: V | undefined;
    try {
      value = await fetchFn(controller.signal);
    } catch (err) {
      this.log.debug("Fetch failed", { key: String(key), error: logger.describeError(err) });
      value = undefined;
    }

    // A fully cancelled entry may already have been replaced by a newer fetch
    if (this.inFlight.get(key)?.controller === controller) {
      this.inFlight.delete(key);
    }
    if (value !== undefined) {
      this.values.set(key, value);
    }
    return value;
  }

  private waitCancellable(
    key: K,
    entry: InFlightEntry<V>,
    signal: AbortSignal,
  ): Promise<V | undefined> {
    return new Promise<V | undefined>((resolve) => {
      const onAbort = (): void => {
        this.release(key, entry);
        resolve(undefined);
      };
      signal.addEventListener("abort", onAbort, { once: true });
      void entry.promise.then((value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      });
    });
  }

  /**
   * One waiter gave up; the last one out cancels the underlying fetch
   */
  private release(key: K, entry: InFlightEntry<V>): void {
    entry.waiters--;
    if (entry.waiters > 0) {
      return;
    }
    if (this.inFlight.get(key) === entry) {
      this.inFlight.delete(key);
      this.log.debug("Cancelling fetch with no remaining waiters", { key: String(key) });
      entry.controller.abort();
    }
  }
}
