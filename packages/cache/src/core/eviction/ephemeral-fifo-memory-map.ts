import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { EvictionMap } from "./eviction-map"
import { FifoMemoryMap } from "./fifo-memory-map"

/**
 * FIFO map whose reads are destructive: `get` hands the value out once and
 * forgets the key.
 */
export class EphemeralFifoMemoryMap<K, V>
  extends FifoMemoryMap<K, V>
  implements EvictionMap<K, V>
{
  override readonly policy: CacheEvictionPolicy = "ephemeral-fifo"

  override get(key: K): V | undefined {
    const value = this.map.get(key)

    this.map.delete(key)

    return value
  }
}
