import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { EvictionMap } from "./eviction-map"

export class FifoMemoryMap<K, V> implements EvictionMap<K, V> {
  readonly policy: CacheEvictionPolicy = "fifo"

  protected readonly map = new Map<K, V>()

  get(key: K): V | undefined {
    return this.map.get(key)
  }

  peek(key: K): V | undefined {
    return this.map.get(key)
  }

  // Map keeps the original insertion slot on overwrite, which is exactly FIFO.
  set(key: K, value: V): void {
    this.map.set(key, value)
  }

  delete(key: K): boolean {
    return this.map.delete(key)
  }

  has(key: K): boolean {
    return this.map.has(key)
  }

  size(): number {
    return this.map.size
  }

  clear(): void {
    this.map.clear()
  }

  victim(): K | undefined {
    return firstKey(this.map)
  }

  keys(): K[] {
    return [...this.map.keys()]
  }

  entries(): [K, V][] {
    return [...this.map.entries()]
  }
}

export function firstKey<K>(map: ReadonlyMap<K, unknown>): K | undefined {
  for (const key of map.keys()) return key

  return undefined
}
