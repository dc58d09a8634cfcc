import type { AcquireOptions, Mutex } from "../../ports/mutex"
import type { MutexLease } from "../../ports/mutex-lease"
import { MemoryMutexLease } from "./memory-mutex-lease"

type Waiter = {
  grant: (lease: MutexLease | null) => void
  detach?: () => void
}

export class MemoryMutex implements Mutex {
  private holder: MemoryMutexLease | null = null
  private readonly waiters: Waiter[] = []

  public get pending(): number {
    return this.waiters.length
  }

  public isLocked(): boolean {
    return this.holder !== null
  }

  public async acquire(opts: AcquireOptions = {}): Promise<MutexLease | null> {
    if (opts.signal?.aborted) return null

    const lease = this.tryAcquire()
    if (lease) return lease

    return await new Promise<MutexLease | null>((resolve) => {
      const waiter: Waiter = { grant: resolve }

      const signal = opts.signal
      if (signal) {
        const onAbort = () => {
          this.dropWaiter(waiter)
          resolve(null)
        }

        signal.addEventListener("abort", onAbort, { once: true })
        waiter.detach = () => signal.removeEventListener("abort", onAbort)
      }

      this.waiters.push(waiter)
    })
  }

  public tryAcquire(): MutexLease | null {
    if (this.holder !== null || this.waiters.length > 0) return null

    return this.grant()
  }

  private grant(): MemoryMutexLease {
    const lease: MemoryMutexLease = new MemoryMutexLease({
      onRelease: () => this.handOff(lease),
    })

    this.holder = lease

    return lease
  }

  private handOff(lease: MemoryMutexLease): void {
    if (this.holder !== lease) return

    this.holder = null

    const next = this.waiters.shift()
    if (!next) return

    next.detach?.()
    next.grant(this.grant())
  }

  private dropWaiter(waiter: Waiter): void {
    const idx = this.waiters.indexOf(waiter)
    if (idx !== -1) this.waiters.splice(idx, 1)
  }
}
