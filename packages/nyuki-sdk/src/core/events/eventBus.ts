/**
 * Typed in-process publish/subscribe.
 *
 * Delivery is synchronous. A publish issued from inside a listener is
 * queued and runs after the current fan-out completes, so every listener
 * sees events of a topic in publish order. Listeners are snapshotted at
 * publish time, and a throwing listener does not stop the others.
 *
 * @module Core/EventBus
 */
import { describeError, logWarn } from '../logger'

export type Listener<T> = (event: T) => void

export interface SubscriptionHandle {
  readonly topic: string
  readonly id: number
}

type AnyListener = (event: unknown) => void

export class EventBus<TMap> {
  private listeners = new Map<string, Map<number, AnyListener>>()
  private pending: Array<() => void> = []
  private draining = false
  private nextId = 1

  subscribe<K extends keyof TMap & string>(topic: K, listener: Listener<TMap[K]>): SubscriptionHandle {
    const id = this.nextId++
    let topicListeners = this.listeners.get(topic)
    if (!topicListeners) {
      topicListeners = new Map()
      this.listeners.set(topic, topicListeners)
    }
    // Stored untyped: the topic key guarantees the payload type on publish
    topicListeners.set(id, listener as AnyListener)
    return { topic, id }
  }

  /**
   * @returns false if the handle was already removed.
   */
  unsubscribe(handle: SubscriptionHandle): boolean {
    const topicListeners = this.listeners.get(handle.topic)
    if (!topicListeners?.delete(handle.id)) return false
    if (topicListeners.size === 0) this.listeners.delete(handle.topic)
    return true
  }

  publish<K extends keyof TMap & string>(topic: K, event: TMap[K]): void {
    const snapshot = [...(this.listeners.get(topic)?.values() ?? [])]
    if (snapshot.length === 0) return

    this.pending.push(() => this.fanOut(topic, event, snapshot))
    if (this.draining) return

    this.draining = true
    try {
      let job = this.pending.shift()
      while (job) {
        job()
        job = this.pending.shift()
      }
    } finally {
      this.draining = false
    }
  }

  listenerCount(topic: keyof TMap & string): number {
    return this.listeners.get(topic)?.size ?? 0
  }

  clear(): void {
    this.listeners.clear()
    this.pending = []
  }

  private fanOut(topic: string, event: unknown, snapshot: AnyListener[]): void {
    for (const listener of snapshot) {
      try {
        listener(event)
      } catch (err) {
        logWarn(`Listener for "${topic}" failed: ${describeError(err)}`)
      }
    }
  }
}
