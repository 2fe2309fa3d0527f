/**
 * Bus event types.
 *
 * A `BusEvent` is the decoded form of one stanza. The stanza codec maps
 * each variant to exactly one wire shape and back.
 *
 * @packageDocumentation
 * @module Types/Bus
 */

import type { ResponseError } from './capability'

/** Presence `type` attribute; absent means available. */
export type PresenceType =
  | 'unavailable'
  | 'subscribe'
  | 'subscribed'
  | 'unsubscribe'
  | 'unsubscribed'
  | 'probe'
  | 'error'

export type PresenceShow = 'away' | 'chat' | 'dnd' | 'xa'

export type MessageType = 'chat' | 'normal' | 'headline' | 'groupchat'

interface Addressed {
  from?: string
  to?: string
}

export interface PresenceEvent extends Addressed {
  kind: 'presence'
  type?: PresenceType
  show?: PresenceShow
  status?: string
  /** Marks a MUC join (`<x xmlns="http://jabber.org/protocol/muc"/>`). */
  muc?: true
}

export interface MessageEvent extends Addressed {
  kind: 'message'
  id?: string
  type: MessageType
  subject?: string
  body?: string
}

/** A topic event, carried as a groupchat message to the topic room. */
export interface PublicationEvent extends Addressed {
  kind: 'publication'
  id?: string
  topic: string
  payload: unknown
}

export interface CapabilityRequestEvent extends Addressed {
  kind: 'capability-request'
  id: string
  capability: string
  payload: unknown
  deadlineMs?: number
}

export interface CapabilityResultEvent extends Addressed {
  kind: 'capability-result'
  id: string
  payload: unknown
}

export interface CapabilityErrorEvent extends Addressed {
  kind: 'capability-error'
  id: string
  error: ResponseError
}

export interface DiscoveryRequestEvent extends Addressed {
  kind: 'discovery-request'
  id: string
}

export interface CapabilitySummary {
  name: string
  mode: 'sync' | 'async'
  description?: string
}

export interface DiscoveryResultEvent extends Addressed {
  kind: 'discovery-result'
  id: string
  capabilities: CapabilitySummary[]
}

export type BusEvent =
  | PresenceEvent
  | MessageEvent
  | PublicationEvent
  | CapabilityRequestEvent
  | CapabilityResultEvent
  | CapabilityErrorEvent
  | DiscoveryRequestEvent
  | DiscoveryResultEvent

export type BusEventKind = BusEvent['kind']
