/**
 * Outbound stanza queue.
 *
 * Every stanza the session sends goes through here. An entry stays queued
 * until the server acknowledges it (Stream Management) or, without SM,
 * until the client has written it. After a drop, entries that were in
 * flight become pending again so the next ready session resends them in
 * their original order.
 *
 * @module Core/Session
 */
import type { Element } from '@xmpp/client'
import { QueueFullError } from '../errors'
import type { BusEvent, OutboundQueueOptions } from '../types'

export const DEFAULT_QUEUE_OPTIONS: OutboundQueueOptions = {
  capacity: 1000,
  overflow: 'drop-oldest',
}

export interface QueueEntry {
  readonly event: BusEvent
  readonly element: Element
  state: 'pending' | 'inflight'
}

export class OutboundQueue {
  private entries: QueueEntry[] = []

  constructor(private readonly options: OutboundQueueOptions = DEFAULT_QUEUE_OPTIONS) {
    if (options.capacity < 1) {
      throw new RangeError(`Queue capacity must be at least 1, got ${options.capacity}`)
    }
  }

  /**
   * Append a stanza.
   *
   * @returns the entry evicted to make room under 'drop-oldest', if any
   * @throws QueueFullError when full under the 'reject' policy
   */
  enqueue(event: BusEvent, element: Element): QueueEntry | undefined {
    let evicted: QueueEntry | undefined
    if (this.entries.length >= this.options.capacity) {
      if (this.options.overflow === 'reject') throw new QueueFullError(this.options.capacity)
      evicted = this.entries.shift()
    }
    this.entries.push({ event, element, state: 'pending' })
    return evicted
  }

  /** Mark the oldest pending entry in flight and return it. */
  takePending(): QueueEntry | undefined {
    const entry = this.entries.find((candidate) => candidate.state === 'pending')
    if (entry) entry.state = 'inflight'
    return entry
  }

  /**
   * Remove the entry holding this exact element.
   * @returns false when it was already acknowledged or evicted
   */
  acknowledge(element: Element): boolean {
    const index = this.entries.findIndex((entry) => entry.element === element)
    if (index < 0) return false
    this.entries.splice(index, 1)
    return true
  }

  /**
   * Return every in-flight entry to pending. Queue order is unchanged.
   * @returns how many entries were requeued
   */
  requeueInFlight(): number {
    let count = 0
    for (const entry of this.entries) {
      if (entry.state === 'inflight') {
        entry.state = 'pending'
        count++
      }
    }
    return count
  }

  /** Empty the queue and return what it held. */
  drain(): QueueEntry[] {
    const drained = this.entries
    this.entries = []
    return drained
  }

  get size(): number {
    return this.entries.length
  }

  get pendingCount(): number {
    return this.entries.filter((entry) => entry.state === 'pending').length
  }

  get inFlightCount(): number {
    return this.entries.filter((entry) => entry.state === 'inflight').length
  }
}
