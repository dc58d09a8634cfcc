import { FifoMemoryMap } from "../fifo-memory-map"
import { describeEvictionMapContract } from "./eviction-map.contract"

describeEvictionMapContract("FifoMemoryMap", () => new FifoMemoryMap<string, number>())
