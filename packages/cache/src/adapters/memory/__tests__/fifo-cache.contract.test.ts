import { describeConcurrentCacheContract } from "../../../ports/__tests__/concurrent-cache.contract"
import { describeSimpleCacheContract } from "../../../ports/__tests__/simple-cache.contract"
import { FifoCache, SimpleFifoCache } from "../fifo-cache"

describeSimpleCacheContract({
  name: "SimpleFifoCache",
  policy: "fifo",
  make: (capacity, hooks) => new SimpleFifoCache<string, number>(capacity, hooks),
})

describeConcurrentCacheContract({
  name: "FifoCache",
  policy: "fifo",
  make: (capacity, hooks) => new FifoCache<string, number>(capacity, hooks),
})
