import type { AcquireOptions, Mutex } from "../ports/mutex"

/**
 * Run `fn` only if the mutex is free right now.
 *
 * @returns The result of `fn`, or `null` when the lock was busy.
 */
export async function tryWithLock<T>(
  mutex: Mutex,
  fn: () => T | Promise<T>,
): Promise<T | null> {
  const lease = mutex.tryAcquire()

  if (!lease) {
    return null
  }

  try {
    return await fn()
  } finally {
    lease.release()
  }
}

/**
 * Run `fn` while holding the mutex, waiting for it if necessary.
 */
export async function withLock<T>(
  mutex: Mutex,
  fn: () => T | Promise<T>,
  opts: AcquireOptions = {},
): Promise<T> {
  if (opts.signal?.aborted) {
    throw new Error("Lock acquisition aborted")
  }

  const lease = await mutex.acquire(opts)
  if (!lease) {
    throw new Error("Lock acquisition aborted")
  }

  try {
    return await fn()
  } finally {
    lease.release()
  }
}
