import { Mutex } from "es-toolkit"

import { AppError } from "@/lib/errors"

export interface CollectionLocks {
  /**
   * Run `task` while holding the lock for `collectionId`. Waiters are served in arrival order.
   *
   * @throws AppError of kind `LockTimeout` if the lock is not acquired within `timeoutMs`
   */
  runExclusive<T>(collectionId: string, task: () => Promise<T> | T, timeoutMs?: number): Promise<T>

  /** Whether a mutation or flush currently holds the lock */
  isLocked(collectionId: string): boolean

  /** Forget the lock of a closed collection */
  release(collectionId: string): void
}

export function createCollectionLocks(defaultTimeoutMs = 2000): CollectionLocks {
  const mutexes = new Map<string, Mutex>()

  const mutexFor = (collectionId: string) => {
    let mutex = mutexes.get(collectionId)
    if (!mutex) {
      mutex = new Mutex()
      mutexes.set(collectionId, mutex)
    }
    return mutex
  }

  const acquire = (collectionId: string, mutex: Mutex, timeoutMs: number) =>
    new Promise<void>((resolve, reject) => {
      let timedOut = false
      const timer = setTimeout(() => {
        timedOut = true
        reject(
          new AppError("LockTimeout", `Timed out after ${timeoutMs}ms waiting for collection ${collectionId}`, {
            collectionId,
          }),
        )
      }, timeoutMs)

      mutex.acquire().then(
        () => {
          if (timedOut) {
            // The waiter gave up, hand the lock straight on
            mutex.release()
            return
          }
          clearTimeout(timer)
          resolve()
        },
        (e: unknown) => {
          clearTimeout(timer)
          reject(e)
        },
      )
    })

  return {
    async runExclusive<T>(collectionId: string, task: () => Promise<T> | T, timeoutMs = defaultTimeoutMs) {
      const mutex = mutexFor(collectionId)
      await acquire(collectionId, mutex, timeoutMs)
      try {
        return await task()
      } finally {
        mutex.release()
      }
    },

    isLocked(collectionId: string) {
      return mutexes.get(collectionId)?.isLocked ?? false
    },

    release(collectionId: string) {
      const mutex = mutexes.get(collectionId)
      if (mutex && !mutex.isLocked) {
        mutexes.delete(collectionId)
      }
    },
  }
}
