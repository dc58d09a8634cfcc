import { MemoryMutex, type Mutex, withLock } from "@evictor/lock"
import type { CacheEvictionPolicy } from "../ports/cache-eviction-policy"
import type { ConcurrentCache } from "../ports/concurrent-cache"
import type { SimpleCache } from "../ports/simple-cache"

export type SynchronizedCacheDeps<K, V> = {
  inner: SimpleCache<K, V>

  /** Defaults to a fresh {@link MemoryMutex}, one per cache instance. */
  mutex?: Mutex
}

/**
 * Serializes `get`, `set` and `clear` on a {@link SimpleCache} behind one
 * mutex, in acquisition order.
 *
 * The wrapped operations never await while holding the lock, so the
 * synchronous accessors cannot observe a half-applied write and skip it.
 */
export class SynchronizedCache<K, V> implements ConcurrentCache<K, V> {
  private readonly inner: SimpleCache<K, V>
  private readonly mutex: Mutex

  public constructor(deps: SynchronizedCacheDeps<K, V>) {
    this.inner = deps.inner
    this.mutex = deps.mutex ?? new MemoryMutex()
  }

  get capacity(): number {
    return this.inner.capacity
  }

  get policy(): CacheEvictionPolicy {
    return this.inner.policy
  }

  async get(key: K): Promise<V | undefined> {
    return withLock(this.mutex, () => this.inner.get(key))
  }

  async set(key: K, value: V): Promise<void> {
    return withLock(this.mutex, () => this.inner.set(key, value))
  }

  async clear(): Promise<void> {
    return withLock(this.mutex, () => this.inner.clear())
  }

  keys(): K[] {
    return this.inner.keys()
  }

  size(): number {
    return this.inner.size()
  }

  toString(): string {
    return this.inner.toString()
  }
}
