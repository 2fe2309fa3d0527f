import type { FastifyInstance } from 'fastify'
import type { z } from 'zod'
import { CapabilityRegistry } from './capabilities/registry'
import { Dispatcher, type DispatcherOptions } from './dispatch/Dispatcher'
import { RemoteCaller, DEFAULT_CALL_DEADLINE_MS, type CallOptions } from './dispatch/remoteCaller'
import { EventBus, type Listener } from './events/eventBus'
import { createApiServer } from './http/apiServer'
import { describeError, logError, logInfo, setDebugLogging } from './logger'
import { Session, type SessionOptions, type TopicListener } from './session/Session'
import { withTimeout } from './session/connectionUtils'
import type {
  CapabilityDefinition,
  CapabilityResponse,
  NyukiEventMap,
  OverloadPolicy,
  SessionSnapshot,
  SessionState,
} from './types'
import { generateStanzaId } from '../utils/uuid'

/** Time stop() waits for running handlers before closing the session. */
export const DEFAULT_DRAIN_TIMEOUT_MS = 5000

export interface ApiAddress {
  host: string
  port: number
}

export interface DispatchConfig {
  maxConcurrency: number
  overloadPolicy: OverloadPolicy
  maxQueued: number
  defaultDeadlineMs: number | null
}

export const DEFAULT_DISPATCH: DispatchConfig = {
  maxConcurrency: 16,
  overloadPolicy: 'queue',
  maxQueued: 256,
  defaultDeadlineMs: null,
}

export interface NyukiConfig {
  bus: Omit<SessionOptions, 'events'>
  /** HTTP listen address; null keeps the API server unbound (inject only). */
  api?: ApiAddress | null
  dispatch?: Partial<DispatchConfig>
  /** Deadline for call() when none is given. */
  callDeadlineMs?: number
  drainTimeoutMs?: number
  debug?: boolean
}

export type TeardownHook = () => void | Promise<void>

type LifecycleState = 'created' | 'starting' | 'running' | 'stopping' | 'stopped'

/**
 * A nyuki: one bus session, its capabilities and its HTTP surface.
 *
 * @example
 * ```typescript
 * const nyuki = new Nyuki({
 *   bus: { jid: 'agent@example.com', password: 'secret' },
 *   api: { host: '0.0.0.0', port: 8080 },
 * })
 *
 * nyuki.capability(defineCapability({
 *   name: 'echo',
 *   input: z.unknown(),
 *   output: z.unknown(),
 *   handler: (payload) => payload,
 * }))
 *
 * nyuki.subscribe('alerts', (event) => console.log(event.payload))
 * await nyuki.start()
 * ```
 *
 * @category Core
 */
export class Nyuki {
  readonly events = new EventBus<NyukiEventMap>()
  readonly registry = new CapabilityRegistry()
  readonly session: Session
  readonly dispatcher: Dispatcher
  readonly http: FastifyInstance

  private readonly remoteCaller: RemoteCaller
  private readonly api: ApiAddress | null
  private readonly drainTimeoutMs: number
  private teardownHooks: TeardownHook[] = []
  private lifecycle: LifecycleState = 'created'
  private stopping: Promise<void> | null = null

  constructor(config: NyukiConfig) {
    if (config.debug !== undefined) setDebugLogging(config.debug)

    this.session = new Session({ ...config.bus, events: this.events })

    const dispatch = { ...DEFAULT_DISPATCH, ...config.dispatch }
    const dispatcherOptions: DispatcherOptions = { ...dispatch, events: this.events }
    this.dispatcher = new Dispatcher(this.registry, dispatcherOptions)
    this.dispatcher.attachSession(this.session)

    this.remoteCaller = new RemoteCaller(this.session, config.callDeadlineMs ?? DEFAULT_CALL_DEADLINE_MS)
    this.http = createApiServer({ registry: this.registry, dispatcher: this.dispatcher, session: this.session })
    this.api = config.api ?? null
    this.drainTimeoutMs = config.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS
  }

  // ============================================================================
  // Setup
  // ============================================================================

  /**
   * Register a capability. Only allowed before start().
   *
   * @throws DuplicateCapabilityError if the name is taken
   * @throws RegistryFrozenError after start()
   */
  capability<TInput extends z.ZodTypeAny, TOutput extends z.ZodTypeAny>(
    definition: CapabilityDefinition<TInput, TOutput>
  ): this {
    this.registry.register(definition)
    return this
  }

  /**
   * Listen to runtime events (session state, decoded traffic, diagnostics).
   * @returns Unsubscribe function
   */
  on<K extends keyof NyukiEventMap & string>(topic: K, listener: Listener<NyukiEventMap[K]>): () => void {
    const handle = this.events.subscribe(topic, listener)
    return () => {
      this.events.unsubscribe(handle)
    }
  }

  /** Run `hook` during stop(), after handlers have drained. Hooks run in reverse order. */
  onTeardown(hook: TeardownHook): void {
    this.teardownHooks.push(hook)
  }

  // ============================================================================
  // Bus
  // ============================================================================

  /**
   * Listen to a bus topic. Subscriptions made before start() are joined
   * once the session is ready, and again after every reconnect.
   * @returns Unsubscribe function
   */
  subscribe(topic: string, listener: TopicListener): () => void {
    const handle = this.session.subscribe(topic, listener)
    return () => {
      this.session.unsubscribe(handle)
    }
  }

  /** @returns the publication id */
  publish(topic: string, payload: unknown): string {
    return this.session.publish(topic, payload)
  }

  /** Send a chat message to another address. */
  send(to: string, body: string): string {
    const id = generateStanzaId('msg')
    this.session.send({ kind: 'message', id, type: 'chat', to, body })
    return id
  }

  /**
   * Invoke a capability of another agent. Never rejects: failures,
   * deadline expiry and shutdown come back as error responses.
   */
  call(to: string, capability: string, payload: unknown, options?: CallOptions): Promise<CapabilityResponse> {
    return this.remoteCaller.call(to, capability, payload, options)
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Freeze the registry, bind the HTTP server and connect. Resolves once
   * the session is ready.
   *
   * Rejects with the session's fatal error (`AuthFailureError`,
   * `ConnectionDropError`) or with the listen error.
   */
  async start(): Promise<void> {
    if (this.lifecycle !== 'created') {
      throw new Error(`Cannot start: agent is ${this.lifecycle}`)
    }
    this.lifecycle = 'starting'

    this.dispatcher.start()
    this.remoteCaller.attach()

    if (this.api) {
      const address = await this.http.listen({ host: this.api.host, port: this.api.port })
      logInfo(`API listening on ${address}`)
    }

    await this.session.start()
    if (this.lifecycle === 'starting') this.lifecycle = 'running'
    logInfo(`Agent ${this.session.jid} ready with ${this.registry.size} capabilities`)
  }

  /**
   * Stop accepting requests, let running handlers finish (bounded by
   * `drainTimeoutMs`), run teardown hooks, close the session and the
   * HTTP server. Calling it again returns the same promise.
   */
  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown()
    return this.stopping
  }

  get state(): SessionState {
    return this.session.getState()
  }

  getSnapshot(): SessionSnapshot {
    return this.session.getSnapshot()
  }

  get isStopped(): boolean {
    return this.lifecycle === 'stopped'
  }

  private async shutdown(): Promise<void> {
    this.lifecycle = 'stopping'
    this.dispatcher.stop()
    this.remoteCaller.cancelAll('Agent is stopping')

    if (this.dispatcher.inFlightCount > 0) {
      await withTimeout(this.dispatcher.drain(), this.drainTimeoutMs)
      if (this.dispatcher.inFlightCount > 0) {
        logError(`Stopping with ${this.dispatcher.inFlightCount} requests still running`)
      }
    }

    const hooks = [...this.teardownHooks].reverse()
    this.teardownHooks = []
    for (const hook of hooks) {
      try {
        await hook()
      } catch (err) {
        logError(`Teardown hook failed: ${describeError(err)}`)
      }
    }

    await this.session.stop()
    await this.http.close()
    this.lifecycle = 'stopped'
    logInfo(`Agent ${this.session.jid} stopped`)
  }
}
