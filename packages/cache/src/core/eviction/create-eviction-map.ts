import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import { EphemeralFifoMemoryMap } from "./ephemeral-fifo-memory-map"
import type { EvictionMap } from "./eviction-map"
import { FifoMemoryMap } from "./fifo-memory-map"
import { LfuMemoryMap } from "./lfu-memory-map"
import { LruMemoryMap } from "./lru-memory-map"
import { MruMemoryMap } from "./mru-memory-map"

export function createEvictionMap<K, V>(policy: CacheEvictionPolicy): EvictionMap<K, V> {
  switch (policy) {
    case "fifo":
      return new FifoMemoryMap<K, V>()
    case "ephemeral-fifo":
      return new EphemeralFifoMemoryMap<K, V>()
    case "lru":
      return new LruMemoryMap<K, V>()
    case "mru":
      return new MruMemoryMap<K, V>()
    case "lfu":
      return new LfuMemoryMap<K, V>()
  }
}
