/**
 * Session types.
 *
 * @packageDocumentation
 * @module Types/Session
 */

import type { EventBus } from '../events/eventBus'
import type { BusEvent } from './bus'
import type { NyukiEventMap } from './events'

/** Public session state, derived from the session machine's state value. */
export type SessionState =
  | 'Disconnected'
  | 'Connecting'
  | 'Authenticating'
  | 'Bound'
  | 'Ready'
  | 'Closing'

export type OverflowPolicy = 'drop-oldest' | 'reject'

export interface BackoffOptions {
  initialDelayMs: number
  multiplier: number
  maxDelayMs: number
  /** Fraction in [0, 1]; the delay is scaled by a factor in [1 - jitter, 1 + jitter]. */
  jitter: number
  /** Consecutive failed attempts before giving up; null retries forever. */
  maxAttempts: number | null
}

export interface OutboundQueueOptions {
  capacity: number
  overflow: OverflowPolicy
}

export interface SessionSnapshot {
  jid: string
  state: SessionState
  reconnectAttempt: number
  queued: number
  /** Epoch ms of the last inbound frame, null before the first one. */
  lastSeenAlive: number | null
  lastError: string | null
}

/**
 * What the dispatcher and remote caller need from a session: a way to
 * send bus events and the event bus decoded traffic is published on.
 */
export interface SessionPort {
  readonly events: EventBus<NyukiEventMap>
  send(event: BusEvent): void
}
