/**
 * Capability dispatch engine.
 *
 * Routes requests from any transport to registered capabilities and
 * guarantees exactly one response per request:
 *
 * 1. Unknown capability → `NotFound`, no handler runs
 * 2. Payload rejected by the input schema → `InvalidInput`
 * 3. Handler runs inside the concurrency budget, under an optional deadline
 * 4. Output rejected by the output schema → `InternalFault`
 * 5. Handler throws or rejects → `HandlerFailure`
 * 6. A schema that throws while checking → `InternalFault`
 *
 * Whatever completes first (the handler or the deadline) claims the
 * in-flight entry; later completions are reported as diagnostics only.
 *
 * @module Core/Dispatch
 */
import type { z } from 'zod'
import type { CapabilityRegistry } from '../capabilities/registry'
import type { EventBus, SubscriptionHandle } from '../events/eventBus'
import { describeError, logDebug, logError, logWarn } from '../logger'
import type {
  BusEvent,
  Capability,
  CapabilityContext,
  CapabilityRequest,
  CapabilityRequestEvent,
  CapabilityResponse,
  DispatchDiagnostic,
  NyukiEventMap,
  OverloadPolicy,
  SessionPort,
} from '../types'
import { ConcurrencyLimiter, type Release } from './concurrencyLimiter'
import { correlationKey, InFlightTable, type InFlightEntry } from './inFlightTable'
import { errorResponse, okResponse, toBusResponse } from './responses'

export interface DispatcherOptions {
  maxConcurrency: number
  /** Required: there is no implicit choice between queueing and shedding load. */
  overloadPolicy: OverloadPolicy
  /** Wait-queue bound under the 'queue' policy. */
  maxQueued: number
  /** Deadline for requests that carry none; null for no deadline. */
  defaultDeadlineMs?: number | null
  /** Receives `dispatch:diagnostic` events. */
  events?: EventBus<NyukiEventMap>
}

export type ResponseSink = (response: CapabilityResponse) => void

type DispatcherState = 'idle' | 'running' | 'stopped'

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function'
}

export class Dispatcher {
  private readonly inFlight = new InFlightTable()
  private readonly limiter: ConcurrencyLimiter
  private state: DispatcherState = 'idle'

  constructor(
    private readonly registry: CapabilityRegistry,
    private readonly options: DispatcherOptions
  ) {
    if (options.maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be at least 1, got ${options.maxConcurrency}`)
    }
    this.limiter = new ConcurrencyLimiter(options.maxConcurrency, options.overloadPolicy, options.maxQueued)
  }

  /**
   * Start accepting requests. Freezes the registry.
   * Called implicitly by the first request.
   */
  start(): void {
    if (this.state !== 'idle') return
    this.registry.freeze()
    this.state = 'running'
    logDebug(`Dispatcher accepting requests for ${this.registry.size} capabilities`)
  }

  /**
   * Execute a request and resolve with its response. Never rejects.
   *
   * A request whose correlation key is already in flight is not run
   * again: it resolves with the first request's response.
   */
  submit(request: CapabilityRequest): Promise<CapabilityResponse> {
    const existing = this.inFlight.get(correlationKey(request))
    if (existing) {
      this.reportDuplicate(request)
      return existing.response
    }
    return this.execute(request)
  }

  /**
   * Execute a request and hand its response to `deliver`, exactly once.
   *
   * @returns false when the request duplicates one already in flight; it
   *   then gets no delivery of its own.
   */
  handle(request: CapabilityRequest, deliver: ResponseSink): boolean {
    if (this.inFlight.get(correlationKey(request))) {
      this.reportDuplicate(request)
      return false
    }
    void this.execute(request).then((response) => {
      try {
        deliver(response)
      } catch (err) {
        logError(`Delivering response ${response.correlationId} failed: ${describeError(err)}`)
      }
    })
    return true
  }

  /**
   * Serve capability and discovery requests arriving on a session, and
   * answer them over the same session.
   */
  attachSession(session: SessionPort): SubscriptionHandle {
    return session.events.subscribe('session:event', ({ event }) => {
      if (event.kind === 'capability-request') {
        this.handleBusRequest(session, event)
      } else if (event.kind === 'discovery-request') {
        const reply: BusEvent = { kind: 'discovery-result', id: event.id, capabilities: this.registry.summaries() }
        if (event.from !== undefined) reply.to = event.from
        this.reply(session, reply)
      }
    })
  }

  /** Reject new requests with `Overloaded`. Running handlers continue. */
  stop(): void {
    this.state = 'stopped'
  }

  /** Wait until every running or queued handler has finished. */
  async drain(): Promise<void> {
    await Promise.all(this.inFlight.values().map((entry) => entry.finished))
  }

  get isRunning(): boolean {
    return this.state === 'running'
  }

  get inFlightCount(): number {
    return this.inFlight.size
  }

  get activeCount(): number {
    return this.limiter.active
  }

  get queuedCount(): number {
    return this.limiter.queued
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  private execute(request: CapabilityRequest): Promise<CapabilityResponse> {
    if (this.state === 'stopped') {
      return Promise.resolve(errorResponse(request, 'Overloaded', 'Dispatcher is not accepting requests'))
    }
    this.start()

    const capability = this.registry.lookup(request.capability)
    if (!capability) {
      return Promise.resolve(
        errorResponse(request, 'NotFound', `Capability "${request.capability}" is not registered`)
      )
    }

    const parsed = this.check(request, capability, 'input', request.payload)
    if ('status' in parsed) return Promise.resolve(parsed)
    if (!parsed.success) {
      return Promise.resolve(
        errorResponse(request, 'InvalidInput', 'Payload does not match the input schema', parsed.error.issues)
      )
    }

    const entry = this.inFlight.open(request)
    const slot = this.limiter.acquire(entry.controller.signal)
    if (!slot) {
      this.inFlight.close(entry)
      return Promise.resolve(
        errorResponse(request, 'Overloaded', `Too many requests in flight for "${request.capability}"`)
      )
    }

    const deadlineMs = request.deadlineMs ?? this.options.defaultDeadlineMs ?? null
    if (deadlineMs !== null) {
      entry.armDeadline(deadlineMs, () => {
        const claimed = entry.settle(
          errorResponse(request, 'Timeout', `Deadline of ${deadlineMs} ms expired`, { deadlineMs })
        )
        if (claimed) {
          logDebug(`Request ${request.correlationId} for ${request.capability} timed out`)
          entry.controller.abort()
        }
      })
    }

    void this.run(entry, capability, parsed.data, slot)
    return entry.response
  }

  private async run(
    entry: InFlightEntry,
    capability: Capability,
    input: unknown,
    slot: Promise<Release | null>
  ): Promise<void> {
    let release: Release | null = null
    try {
      release = await slot
      // No slot: the deadline expired while queued
      if (!release || entry.settled) return
      const response = await this.invoke(entry, capability, input)
      if (!entry.settle(response)) {
        logDebug(`Discarding late ${response.status} for request ${entry.request.correlationId}`)
        this.diagnose({
          type: 'late-result',
          correlationId: entry.request.correlationId,
          capability: capability.name,
          outcome: response.status,
        })
      }
    } catch (err) {
      logError(`Request ${entry.request.correlationId} for ${capability.name} failed: ${describeError(err)}`)
      entry.settle(
        errorResponse(entry.request, 'InternalFault', `Capability "${capability.name}" could not run`, describeError(err))
      )
    } finally {
      release?.()
      this.inFlight.close(entry)
    }
  }

  private async invoke(entry: InFlightEntry, capability: Capability, input: unknown): Promise<CapabilityResponse> {
    const { request } = entry
    const context: CapabilityContext = {
      correlationId: request.correlationId,
      transport: request.transport,
      signal: entry.controller.signal,
    }
    if (request.from !== undefined) context.from = request.from

    let output: unknown
    try {
      if (capability.mode === 'sync') {
        output = capability.handler(input, context)
        if (isThenable(output)) {
          void Promise.resolve(output).catch((err: unknown) => {
            logWarn(`Sync capability ${capability.name} rejected: ${describeError(err)}`)
          })
          this.diagnose({
            type: 'sync-returned-promise',
            correlationId: request.correlationId,
            capability: capability.name,
          })
          return errorResponse(request, 'InternalFault', `Capability "${capability.name}" is sync but returned a promise`)
        }
      } else {
        output = await capability.handler(input, context)
      }
    } catch (err) {
      return errorResponse(request, 'HandlerFailure', `Capability "${capability.name}" failed`, describeError(err))
    }

    const checked = this.check(request, capability, 'output', output)
    if ('status' in checked) return checked
    if (!checked.success) {
      logWarn(`Capability ${capability.name} produced output that does not match its schema`)
      this.diagnose({
        type: 'output-violation',
        correlationId: request.correlationId,
        capability: capability.name,
        issues: checked.error.issues,
      })
      return errorResponse(request, 'InternalFault', `Capability "${capability.name}" produced an invalid result`)
    }
    return okResponse(request, checked.data)
  }

  /**
   * safeParse, except that zod lets exceptions from refinements and
   * transforms escape it; those become an `InternalFault` response.
   */
  private check(
    request: CapabilityRequest,
    capability: Capability,
    schema: 'input' | 'output',
    value: unknown
  ): z.SafeParseReturnType<unknown, unknown> | CapabilityResponse {
    try {
      return capability[schema].safeParse(value)
    } catch (err) {
      const error = describeError(err)
      logWarn(`The ${schema} schema of capability ${capability.name} threw: ${error}`)
      this.diagnose({
        type: 'schema-failure',
        correlationId: request.correlationId,
        capability: capability.name,
        schema,
        error,
      })
      return errorResponse(request, 'InternalFault', `The ${schema} schema of "${capability.name}" failed`, error)
    }
  }

  // ==========================================================================
  // Bus binding
  // ==========================================================================

  private handleBusRequest(session: SessionPort, event: CapabilityRequestEvent): void {
    const request: CapabilityRequest = {
      correlationId: event.id,
      transport: 'bus',
      capability: event.capability,
      payload: event.payload,
    }
    if (event.deadlineMs !== undefined) request.deadlineMs = event.deadlineMs
    if (event.from !== undefined) request.from = event.from

    this.handle(request, (response) => this.reply(session, toBusResponse(response, event.from)))
  }

  private reply(session: SessionPort, event: BusEvent): void {
    try {
      session.send(event)
    } catch (err) {
      logError(`Could not send ${event.kind} to ${event.to ?? 'server'}: ${describeError(err)}`)
    }
  }

  private reportDuplicate(request: CapabilityRequest): void {
    logDebug(`Request ${request.correlationId} is already in flight`)
    this.diagnose({ type: 'duplicate-request', correlationId: request.correlationId, transport: request.transport })
  }

  private diagnose(diagnostic: DispatchDiagnostic): void {
    this.options.events?.publish('dispatch:diagnostic', diagnostic)
  }
}
