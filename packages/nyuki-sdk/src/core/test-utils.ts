/**
 * Shared test utilities for session and runtime tests
 */
import { vi, type Mock } from 'vitest'
import type { Client, Element } from '@xmpp/client'

type Handler = (...args: unknown[]) => void

function createEmitter() {
  const handlers: Record<string, Handler[]> = {}
  return {
    handlers,
    on: (event: string, handler: Handler) => {
      if (!handlers[event]) handlers[event] = []
      handlers[event].push(handler)
    },
    emit: (event: string, ...args: unknown[]) => {
      // Copy: a handler may remove listeners while we iterate
      for (const handler of [...(handlers[event] ?? [])]) handler(...args)
    },
    clear: () => {
      for (const event of Object.keys(handlers)) delete handlers[event]
    },
  }
}

export interface MockXmppClient extends Client {
  on: Mock<(event: string, handler: Handler) => void>
  removeAllListeners: Mock<() => void>
  start: Mock<() => Promise<void>>
  stop: Mock<() => Promise<void>>
  send: Mock<(element: Element) => Promise<void>>
  streamManagement: {
    enabled: boolean
    outbound: number
    /** Stanzas written while enabled and not yet acknowledged, oldest first */
    outbound_q: { stanza: Element }[]
    on: Mock<(event: string, handler: Handler) => void>
  }
  reconnect: { stop: Mock<() => void> }
  socket: { end: Mock<() => void> }
  /** Everything passed to send(), in order */
  sent: Element[]
  /** Trigger a client event in tests */
  _emit: (event: string, ...args: unknown[]) => void
  /** Trigger a Stream Management event in tests */
  _emitSM: (event: string, ...args: unknown[]) => void
  /** Receive `<a h="h"/>`: emit 'ack' for each newly acknowledged stanza, as the SM plugin does */
  _serverAck: (h: number) => void
  _listenerCount: (event: string) => number
}

// Mock EventEmitter behavior for the XMPP client
export function createMockXmppClient(): MockXmppClient {
  const events = createEmitter()
  const smEvents = createEmitter()
  const sent: Element[] = []
  const streamManagement: MockXmppClient['streamManagement'] = {
    enabled: false,
    outbound: 0,
    outbound_q: [],
    on: vi.fn(smEvents.on),
  }

  return {
    on: vi.fn(events.on),
    removeAllListeners: vi.fn(() => events.clear()),
    start: vi.fn(() => Promise.resolve()),
    stop: vi.fn(() => Promise.resolve()),
    send: vi.fn((element: Element) => {
      sent.push(element)
      if (streamManagement.enabled && ['message', 'presence', 'iq'].includes(element.name)) {
        streamManagement.outbound_q.push({ stanza: element })
      }
      return Promise.resolve()
    }),
    streamManagement,
    reconnect: { stop: vi.fn() },
    socket: { end: vi.fn() },
    sent,
    _emit: events.emit,
    _emitSM: smEvents.emit,
    _serverAck: (h: number) => {
      while (streamManagement.outbound < h) {
        const item = streamManagement.outbound_q.shift()
        if (!item) break
        streamManagement.outbound++
        smEvents.emit('ack', item.stanza)
      }
    },
    _listenerCount: (event: string) => events.handlers[event]?.length ?? 0,
  }
}

/**
 * Resolve pending promise callbacks and zero-delay timers.
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0))
}

export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (reason: unknown) => void
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined
  let reject: (reason: unknown) => void = () => undefined
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

/**
 * Run queued microtasks without touching timers; safe under fake timers.
 */
export async function flushMicrotasks(turns = 100): Promise<void> {
  for (let i = 0; i < turns; i++) await Promise.resolve()
}
