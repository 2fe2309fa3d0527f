/**
 * Bounded execution slots with an optional FIFO wait queue.
 *
 * Unlike a plain semaphore, the wait queue has a limit: past it, and
 * under the 'reject' policy whenever all slots are busy, `acquire`
 * reports overload instead of waiting.
 */
import type { OverloadPolicy } from '../types'

export type Release = () => void

interface Waiter {
  grant: (release: Release) => void
}

export class ConcurrencyLimiter {
  private running = 0
  private waiters: Waiter[] = []

  constructor(
    private readonly maxConcurrency: number,
    private readonly policy: OverloadPolicy,
    private readonly maxQueued: number
  ) {}

  /**
   * Acquire an execution slot.
   *
   * @param signal - Aborting it while waiting gives the queue position up;
   *   the returned promise then resolves with null.
   * @returns null when overloaded, otherwise a promise of the slot's release function
   */
  acquire(signal?: AbortSignal): Promise<Release | null> | null {
    if (this.running < this.maxConcurrency) {
      this.running++
      return Promise.resolve(this.createRelease())
    }
    if (this.policy === 'reject' || this.waiters.length >= this.maxQueued) return null

    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve(null)
        return
      }
      const onAbort = () => {
        this.waiters = this.waiters.filter((candidate) => candidate !== waiter)
        resolve(null)
      }
      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort)
          resolve(release)
        },
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      this.waiters.push(waiter)
    })
  }

  get active(): number {
    return this.running
  }

  get queued(): number {
    return this.waiters.length
  }

  private createRelease(): Release {
    let released = false
    return () => {
      if (released) return
      released = true
      // Hand the slot straight to the next waiter
      const next = this.waiters.shift()
      if (next) {
        next.grant(this.createRelease())
      } else {
        this.running--
      }
    }
  }
}
