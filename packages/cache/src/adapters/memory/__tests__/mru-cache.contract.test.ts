import { describeConcurrentCacheContract } from "../../../ports/__tests__/concurrent-cache.contract"
import { describeSimpleCacheContract } from "../../../ports/__tests__/simple-cache.contract"
import { MruCache, SimpleMruCache } from "../mru-cache"

describeSimpleCacheContract({
  name: "SimpleMruCache",
  policy: "mru",
  make: (capacity, hooks) => new SimpleMruCache<string, number>(capacity, hooks),
})

describeConcurrentCacheContract({
  name: "MruCache",
  policy: "mru",
  make: (capacity, hooks) => new MruCache<string, number>(capacity, hooks),
})
