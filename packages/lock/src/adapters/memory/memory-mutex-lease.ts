import type { MutexLease } from "../../ports/mutex-lease"

export type MemoryMutexLeaseDeps = {
  onRelease: () => void
}

export class MemoryMutexLease implements MutexLease {
  private isReleased = false

  public constructor(private readonly deps: MemoryMutexLeaseDeps) {}

  public get released(): boolean {
    return this.isReleased
  }

  public release(): void {
    if (this.isReleased) return

    this.isReleased = true
    this.deps.onRelease()
  }
}
