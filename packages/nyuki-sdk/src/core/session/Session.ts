import { client, type Client, type Element } from '@xmpp/client'
import { createActor, type SnapshotFrom } from 'xstate'
import { encodeElement, decodeElement } from '../codec'
import {
  AuthFailureError,
  ConnectionDropError,
  SessionClosedError,
  isDecodeError,
  type NyukiError,
} from '../errors'
import { EventBus, type SubscriptionHandle } from '../events/eventBus'
import { createFullJid, getBareJid, getDomain, getLocalPart, getResource, topicFromRoomJid, topicRoomJid } from '../jid'
import { describeError, logDebug, logError, logInfo, logWarn } from '../logger'
import {
  DEFAULT_BACKOFF,
  getSessionStateFromValue,
  isClosedState,
  sessionMachine,
  type SessionActor,
  type SessionStateValue,
} from '../sessionMachine'
import type {
  BackoffOptions,
  BusEvent,
  NyukiEventMap,
  OutboundQueueOptions,
  PresenceEvent,
  PublicationEvent,
  SessionPort,
  SessionSnapshot,
  SessionState,
} from '../types'
import { createSessionStore, toSessionSnapshot, type SessionStore } from '../../stores/sessionStore'
import { generateStanzaId } from '../../utils/uuid'
import {
  CLIENT_STOP_TIMEOUT_MS,
  CONNECT_ATTEMPT_TIMEOUT_MS,
  describeAuthError,
  disableBuiltInReconnect,
  forceDestroyClient,
  isAuthError,
  withTimeout,
} from './connectionUtils'
import { DEFAULT_QUEUE_OPTIONS, OutboundQueue } from './outboundQueue'

export const DEFAULT_PORT = 5222
export const DEFAULT_RESOURCE = 'nyuki'

export interface SessionOptions {
  /** Bare or full JID; a resource here is used unless `resource` is given. */
  jid: string
  password: string
  /** Tried in order when the server rejects the password. */
  alternatePasswords?: string[]
  /** Server host; defaults to the JID's domain. */
  host?: string
  port?: number
  resource?: string
  /** MUC service hosting topic rooms; defaults to `conference.<domain>`. */
  mucDomain?: string
  /** Our nickname in topic rooms; defaults to the JID's local part. */
  nick?: string
  backoff?: BackoffOptions
  queue?: OutboundQueueOptions
  /** Bus to publish session events on; a private one is created otherwise. */
  events?: EventBus<NyukiEventMap>
  /** Source of randomness for backoff jitter. */
  random?: () => number
  connectTimeoutMs?: number
}

export type TopicListener = (event: PublicationEvent) => void

interface StartWaiter {
  resolve: () => void
  reject: (error: NyukiError) => void
}

function stateKey(value: SessionStateValue): string {
  return typeof value === 'string' ? value : `disconnected.${value.disconnected}`
}

/**
 * One bus connection.
 *
 * The session machine decides; this class carries out its decisions:
 * it creates the XMPP client on `connecting`, announces presence on
 * `bound`, replays topic subscriptions and flushes the outbound queue on
 * `ready`, and tears the client down on every way out.
 *
 * Decoded inbound traffic is published on the event bus as
 * `session:event`, in arrival order.
 *
 * @example
 * ```typescript
 * const session = new Session({ jid: 'agent@example.com', password: 'secret' })
 * session.subscribe('alerts', (event) => console.log(event.payload))
 * await session.start()
 * session.publish('alerts', { level: 'high' })
 * await session.stop()
 * ```
 *
 * @category Session
 */
export class Session implements SessionPort {
  readonly events: EventBus<NyukiEventMap>
  readonly store: SessionStore

  private readonly actor: SessionActor
  private readonly queue: OutboundQueue
  private readonly passwords: string[]
  private readonly bareJid: string
  private readonly resource: string
  private readonly service: string
  private readonly mucDomain: string
  private readonly nick: string
  private readonly connectTimeoutMs: number

  private xmpp: Client | null = null
  private previousValue: SessionStateValue
  private attemptTimer: ReturnType<typeof setTimeout> | null = null
  private pumping = false
  private replaying = false
  private lastAuthReason: string | null = null

  private readonly topicListeners = new Map<string, Map<number, TopicListener>>()
  /** Topic rooms to be present in; replayed on every ready. */
  private readonly rooms = new Set<string>()
  private nextSubscriptionId = 1

  private startWaiters: StartWaiter[] = []
  private closeWaiters: Array<() => void> = []

  constructor(options: SessionOptions) {
    this.bareJid = getBareJid(options.jid)
    this.resource = options.resource ?? getResource(options.jid) ?? DEFAULT_RESOURCE
    const domain = getDomain(this.bareJid)
    this.service = `xmpp://${options.host ?? domain}:${options.port ?? DEFAULT_PORT}`
    this.mucDomain = options.mucDomain ?? `conference.${domain}`
    this.nick = options.nick ?? getLocalPart(this.bareJid)
    this.connectTimeoutMs = options.connectTimeoutMs ?? CONNECT_ATTEMPT_TIMEOUT_MS
    this.passwords = [options.password]
    for (const alternate of options.alternatePasswords ?? []) {
      if (!this.passwords.includes(alternate)) this.passwords.push(alternate)
    }

    this.events = options.events ?? new EventBus<NyukiEventMap>()
    this.store = createSessionStore(this.jid)
    this.queue = new OutboundQueue(options.queue ?? DEFAULT_QUEUE_OPTIONS)

    this.actor = createActor(sessionMachine, {
      input: {
        backoff: options.backoff ?? DEFAULT_BACKOFF,
        credentialCount: this.passwords.length,
        random: options.random,
      },
    }).start()
    this.previousValue = this.getMachineState()
    this.actor.subscribe((snapshot) => this.onSnapshot(snapshot))
  }

  /** Full JID this session binds. */
  get jid(): string {
    return createFullJid(this.bareJid, this.resource)
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Connect and resolve once the session is ready.
   *
   * Rejects with `AuthFailureError` when every credential is refused, with
   * `ConnectionDropError` when `maxAttempts` is exhausted, and with
   * `SessionClosedError` when the session is stopped first.
   */
  start(): Promise<void> {
    if (isClosedState(this.getMachineState())) return Promise.reject(new SessionClosedError('start'))
    if (this.isReady()) return Promise.resolve()
    const ready = new Promise<void>((resolve, reject) => {
      this.startWaiters.push({ resolve, reject })
    })
    this.actor.send({ type: 'START' })
    return ready
  }

  /**
   * Close the stream and shut the session down for good. Unsent stanzas
   * are discarded. Resolves once closed; calling it again is harmless.
   */
  stop(): Promise<void> {
    if (isClosedState(this.getMachineState())) return Promise.resolve()
    const closed = new Promise<void>((resolve) => {
      this.closeWaiters.push(resolve)
    })
    this.actor.send({ type: 'STOP' })
    return closed
  }

  /** Skip the remaining backoff delay. */
  retryNow(): void {
    this.actor.send({ type: 'RETRY_NOW' })
  }

  getState(): SessionState {
    return getSessionStateFromValue(this.getMachineState())
  }

  getSnapshot(): SessionSnapshot {
    return toSessionSnapshot(this.store.getState())
  }

  // ============================================================================
  // Outbound
  // ============================================================================

  /**
   * Queue an event for delivery. It is written once the session is ready
   * and stays queued until acknowledged.
   *
   * @throws SessionClosedError once stop() was called
   * @throws QueueFullError when the queue is full under the 'reject' policy
   */
  send(event: BusEvent): void {
    if (this.isShutDown()) throw new SessionClosedError(`send ${event.kind}`)
    const element = encodeElement(event)
    const evicted = this.queue.enqueue(event, element)
    if (evicted) {
      logWarn(`Outbound queue full, dropped oldest ${evicted.event.kind}`)
    }
    this.syncQueued()
    if (this.isReady()) void this.pump()
  }

  /**
   * Listen to a bus topic. The first listener joins the topic room.
   */
  subscribe(topic: string, listener: TopicListener): SubscriptionHandle {
    if (this.isShutDown()) throw new SessionClosedError(`subscribe to ${topic}`)
    let listeners = this.topicListeners.get(topic)
    if (!listeners) {
      listeners = new Map()
      this.topicListeners.set(topic, listeners)
    }
    const id = this.nextSubscriptionId++
    listeners.set(id, listener)
    this.joinRoom(topic)
    return { topic, id }
  }

  /**
   * Remove a topic listener. The last one leaves the topic room.
   * @returns false if the handle was already removed
   */
  unsubscribe(handle: SubscriptionHandle): boolean {
    const listeners = this.topicListeners.get(handle.topic)
    if (!listeners?.delete(handle.id)) return false
    if (listeners.size === 0) {
      this.topicListeners.delete(handle.topic)
      this.leaveRoom(handle.topic)
    }
    return true
  }

  /**
   * Publish an event to a topic, joining its room first if needed.
   * @returns the publication id
   */
  publish(topic: string, payload: unknown): string {
    if (this.isShutDown()) throw new SessionClosedError(`publish to ${topic}`)
    this.joinRoom(topic)
    const id = generateStanzaId('pub')
    this.send({ kind: 'publication', id, to: topicRoomJid(topic, this.mucDomain), topic, payload })
    return id
  }

  private joinRoom(topic: string): void {
    if (this.rooms.has(topic)) return
    this.rooms.add(topic)
    if (this.isReady()) this.send(this.joinEvent(topic))
  }

  private leaveRoom(topic: string): void {
    if (!this.rooms.delete(topic)) return
    if (this.isReady()) {
      this.send({ kind: 'presence', type: 'unavailable', to: this.occupantJid(topic) })
    }
  }

  private joinEvent(topic: string): PresenceEvent {
    return { kind: 'presence', to: this.occupantJid(topic), muc: true }
  }

  private occupantJid(topic: string): string {
    return `${topicRoomJid(topic, this.mucDomain)}/${this.nick}`
  }

  /**
   * Write pending entries in queue order while the session stays ready.
   * Without Stream Management a completed write counts as acknowledged.
   */
  private async pump(): Promise<void> {
    if (this.pumping || this.replaying) return
    const xmpp = this.xmpp
    if (!xmpp || !this.isReady()) return
    this.pumping = true
    try {
      let entry = this.queue.takePending()
      while (entry) {
        logDebug(`SEND ${entry.element.toString()}`)
        await xmpp.send(entry.element)
        // Replaced while writing: the drop already requeued this entry
        if (xmpp !== this.xmpp) break
        if (!xmpp.streamManagement.enabled) this.queue.acknowledge(entry.element)
        this.syncQueued()
        entry = this.isReady() ? this.queue.takePending() : undefined
      }
    } catch (err) {
      if (xmpp === this.xmpp) {
        this.actor.send({ type: 'TRANSPORT_DROPPED', error: `Send failed: ${describeError(err)}` })
      }
    } finally {
      this.pumping = false
    }
    // A newer client may have become ready while this write was pending
    if (xmpp !== this.xmpp) await this.pump()
  }

  private syncQueued(): void {
    this.store.getState().setQueued(this.queue.size)
  }

  // ============================================================================
  // Inbound
  // ============================================================================

  private receive(stanza: Element): void {
    this.store.getState().markAlive(Date.now())
    const result = decodeElement(stanza)
    if (isDecodeError(result)) {
      if (result.reason === 'unsupported') {
        logDebug(`Ignoring stanza: ${result.message}`)
      } else {
        logWarn(`Could not decode stanza: ${result.message}`)
      }
      logDebug(`RECV ${result.fragment}`)
      this.events.publish('session:decode-error', { error: result })
      return
    }

    logDebug(`RECV ${stanza.toString()}`)
    if (result.kind === 'publication') {
      if (this.isOwnEcho(result)) return
      this.deliverPublication(result)
    }
    this.events.publish('session:event', { event: result })
  }

  /** Rooms reflect our own publications back to us. */
  private isOwnEcho(event: PublicationEvent): boolean {
    if (event.from === undefined) return false
    return topicFromRoomJid(event.from, this.mucDomain) !== undefined && getResource(event.from) === this.nick
  }

  private deliverPublication(event: PublicationEvent): void {
    const listeners = this.topicListeners.get(event.topic)
    if (!listeners) return
    for (const listener of [...listeners.values()]) {
      try {
        listener(event)
      } catch (err) {
        logWarn(`Listener for topic "${event.topic}" failed: ${describeError(err)}`)
      }
    }
  }

  // ============================================================================
  // Machine Reactions
  // ============================================================================

  private getMachineState(): SessionStateValue {
    return this.actor.getSnapshot().value as SessionStateValue
  }

  private isReady(): boolean {
    return this.getMachineState() === 'ready'
  }

  private isShutDown(): boolean {
    const value = this.getMachineState()
    return value === 'closing' || isClosedState(value)
  }

  private onSnapshot(snapshot: SnapshotFrom<typeof sessionMachine>): void {
    const value = snapshot.value as SessionStateValue
    const previousKey = stateKey(this.previousValue)
    this.previousValue = value

    const { context } = snapshot
    const store = this.store.getState()
    store.setReconnectState(context.reconnectAttempt, context.reconnectTargetTime)
    store.setError(context.lastError)

    const state = getSessionStateFromValue(value)
    const previous = store.state
    if (state !== previous) {
      store.setState(state)
      this.events.publish('session:state', { state, previous })
    }

    const key = stateKey(value)
    if (key === previousKey) return
    try {
      this.enter(key, snapshot)
    } catch (err) {
      logError(`Handling session state ${key} failed: ${describeError(err)}`)
    }
  }

  private enter(key: string, snapshot: SnapshotFrom<typeof sessionMachine>): void {
    switch (key) {
      case 'connecting':
        this.connect(snapshot.context.credentialIndex)
        break
      case 'bound':
        this.clearAttemptTimer()
        if (this.xmpp) void this.announce(this.xmpp)
        break
      case 'ready':
        void this.onReady()
        break
      case 'closing':
        void this.close()
        break
      case 'disconnected.waiting':
        this.onDropped(snapshot.context.reconnectAttempt, snapshot.context.nextRetryDelayMs, snapshot.context.lastError)
        break
      case 'disconnected.failed':
        this.onFailed(snapshot.context.failure, snapshot.context.reconnectAttempt, snapshot.context.lastError)
        break
      case 'disconnected.closed':
        this.onClosed()
        break
    }
  }

  private connect(credentialIndex: number): void {
    this.teardownClient()
    const password = this.passwords[credentialIndex] ?? this.passwords[0]
    const xmpp = client({
      service: this.service,
      domain: getDomain(this.bareJid),
      username: getLocalPart(this.bareJid),
      password,
      resource: this.resource,
    })
    disableBuiltInReconnect(xmpp)
    this.xmpp = xmpp
    this.bindClient(xmpp)

    this.attemptTimer = setTimeout(() => {
      this.attemptTimer = null
      if (xmpp !== this.xmpp) return
      this.actor.send({
        type: 'TRANSPORT_DROPPED',
        error: `Connection attempt timed out after ${this.connectTimeoutMs / 1000}s`,
      })
    }, this.connectTimeoutMs)

    const credential = credentialIndex > 0 ? ` with alternate credential ${credentialIndex}` : ''
    logInfo(`Connecting to ${this.service} as ${this.jid}${credential}`)
    void xmpp.start().catch((err: unknown) => {
      if (xmpp !== this.xmpp) return
      if (isAuthError(err)) {
        this.authFailed(err)
      } else {
        this.actor.send({ type: 'TRANSPORT_DROPPED', error: describeError(err) })
      }
    })
  }

  private bindClient(xmpp: Client): void {
    const current = () => xmpp === this.xmpp

    xmpp.on('connect', () => {
      if (current() && this.getMachineState() === 'connecting') {
        this.actor.send({ type: 'TRANSPORT_CONNECTED' })
      }
    })

    xmpp.on('online', (address) => {
      if (!current()) return
      logInfo(`Online as ${address.toString()}`)
      if (this.getMachineState() === 'connecting') this.actor.send({ type: 'TRANSPORT_CONNECTED' })
      this.actor.send({ type: 'AUTH_SUCCESS' })
    })

    xmpp.on('error', (err) => {
      if (!current()) return
      if (isAuthError(err)) {
        this.authFailed(err)
      } else {
        logWarn(`Client error: ${err.message}`)
      }
    })

    xmpp.on('disconnect', (details) => {
      if (!current()) return
      logInfo(`Socket disconnected (clean: ${details?.clean ?? false})`)
      this.actor.send({ type: 'TRANSPORT_DROPPED', error: 'Socket disconnected' })
    })

    xmpp.on('offline', () => {
      if (!current()) return
      this.actor.send({ type: 'TRANSPORT_DROPPED', error: 'Stream closed' })
    })

    xmpp.on('stanza', (stanza) => {
      if (current()) this.receive(stanza)
    })

    xmpp.streamManagement.on('ack', (stanza) => {
      if (current() && this.queue.acknowledge(stanza)) this.syncQueued()
    })
  }

  private authFailed(err: unknown): void {
    const reason = describeAuthError(err)
    this.lastAuthReason = reason
    logWarn(`Authentication failed for ${this.jid}: ${reason}`)
    if (this.getMachineState() === 'connecting') this.actor.send({ type: 'TRANSPORT_CONNECTED' })
    this.actor.send({ type: 'AUTH_FAILED', error: reason })
  }

  private async announce(xmpp: Client): Promise<void> {
    try {
      await xmpp.send(encodeElement({ kind: 'presence' }))
    } catch (err) {
      if (xmpp === this.xmpp) {
        this.actor.send({ type: 'TRANSPORT_DROPPED', error: `Presence announcement failed: ${describeError(err)}` })
      }
      return
    }
    if (xmpp === this.xmpp) this.actor.send({ type: 'PRESENCE_ANNOUNCED' })
  }

  /** Replay topic rooms, then flush the queue. */
  private async onReady(): Promise<void> {
    const xmpp = this.xmpp
    if (!xmpp) return
    logInfo(`Session ready as ${this.jid}`)
    const waiters = this.startWaiters
    this.startWaiters = []
    for (const waiter of waiters) waiter.resolve()

    this.replaying = true
    try {
      for (const topic of [...this.rooms]) {
        await xmpp.send(encodeElement(this.joinEvent(topic)))
      }
    } catch (err) {
      if (xmpp === this.xmpp) {
        this.actor.send({ type: 'TRANSPORT_DROPPED', error: `Subscription replay failed: ${describeError(err)}` })
      }
      return
    } finally {
      this.replaying = false
    }
    await this.pump()
  }

  private onDropped(attempt: number, delayMs: number, reason: string | null): void {
    this.teardownClient()
    const requeued = this.queue.requeueInFlight()
    this.syncQueued()
    const resend = requeued > 0 ? `, ${requeued} stanzas to resend` : ''
    logWarn(`Connection lost (${reason ?? 'unknown'}), retrying in ${delayMs} ms (attempt ${attempt}${resend})`)
    this.events.publish('session:dropped', { attempt, delayMs, reason })
  }

  private onFailed(failure: 'auth' | 'maxAttempts' | null, attempts: number, reason: string | null): void {
    this.teardownClient()
    this.queue.requeueInFlight()
    this.syncQueued()
    const error =
      failure === 'auth'
        ? new AuthFailureError(this.jid, this.lastAuthReason ?? 'credentials rejected')
        : new ConnectionDropError(reason ?? 'Connection lost', attempts)
    logError(error.message)
    this.events.publish('session:fatal', { error })
    const waiters = this.startWaiters
    this.startWaiters = []
    for (const waiter of waiters) waiter.reject(error)
  }

  private async close(): Promise<void> {
    this.clearAttemptTimer()
    const xmpp = this.xmpp
    if (xmpp) {
      try {
        await withTimeout(xmpp.stop(), CLIENT_STOP_TIMEOUT_MS)
      } catch (err) {
        logWarn(`Graceful stop failed: ${describeError(err)}`)
      }
    }
    this.actor.send({ type: 'CLOSED' })
  }

  private onClosed(): void {
    this.teardownClient()
    const discarded = this.queue.drain()
    this.syncQueued()
    if (discarded.length > 0) {
      logWarn(`Session closed, discarded ${discarded.length} unsent stanzas`)
    } else {
      logInfo('Session closed')
    }

    const startWaiters = this.startWaiters
    this.startWaiters = []
    for (const waiter of startWaiters) waiter.reject(new SessionClosedError('start'))
    const closeWaiters = this.closeWaiters
    this.closeWaiters = []
    for (const resolve of closeWaiters) resolve()
  }

  private teardownClient(): void {
    this.clearAttemptTimer()
    const xmpp = this.xmpp
    this.xmpp = null
    if (xmpp) forceDestroyClient(xmpp)
  }

  private clearAttemptTimer(): void {
    if (this.attemptTimer) {
      clearTimeout(this.attemptTimer)
      this.attemptTimer = null
    }
  }
}
