/**
 * Invokes capabilities of other agents over the bus.
 *
 * Each call sends a `capability-request` with a fresh id and waits for the
 * matching result or error from the addressed peer. The local deadline
 * resolves the call with `Timeout`; a reply arriving later is ignored.
 */
import type { SubscriptionHandle } from '../events/eventBus'
import { getBareJid } from '../jid'
import { describeError, logDebug } from '../logger'
import type { BusEvent, CapabilityResponse, ResponseErrorKind, SessionPort } from '../types'
import { generateStanzaId } from '../../utils/uuid'

export const DEFAULT_CALL_DEADLINE_MS = 30_000

export interface CallOptions {
  deadlineMs?: number
}

interface PendingCall {
  to: string
  resolve: (response: CapabilityResponse) => void
  timer: ReturnType<typeof setTimeout>
}

export class RemoteCaller {
  private pending = new Map<string, PendingCall>()
  private subscription: SubscriptionHandle | null = null

  constructor(
    private readonly session: SessionPort,
    private readonly defaultDeadlineMs: number = DEFAULT_CALL_DEADLINE_MS
  ) {}

  /** Start matching replies. Called once before the first call. */
  attach(): void {
    if (this.subscription) return
    this.subscription = this.session.events.subscribe('session:event', ({ event }) => this.onEvent(event))
  }

  call(to: string, capability: string, payload: unknown, options: CallOptions = {}): Promise<CapabilityResponse> {
    this.attach()
    const id = generateStanzaId('call')
    const deadlineMs = options.deadlineMs ?? this.defaultDeadlineMs

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.settle(id, failure(id, 'Timeout', `${to} did not answer ${capability} within ${deadlineMs} ms`))
      }, deadlineMs)
      this.pending.set(id, { to, resolve, timer })

      try {
        this.session.send({ kind: 'capability-request', id, to, capability, payload, deadlineMs })
      } catch (err) {
        this.settle(id, failure(id, 'Overloaded', `Could not send request: ${describeError(err)}`))
      }
    })
  }

  /** Resolve every pending call with `Overloaded` and stop matching replies. */
  cancelAll(reason: string): void {
    for (const id of [...this.pending.keys()]) {
      this.settle(id, failure(id, 'Overloaded', reason))
    }
    if (this.subscription) {
      this.session.events.unsubscribe(this.subscription)
      this.subscription = null
    }
  }

  get pendingCount(): number {
    return this.pending.size
  }

  private onEvent(event: BusEvent): void {
    if (event.kind !== 'capability-result' && event.kind !== 'capability-error') return
    const call = this.pending.get(event.id)
    if (!call) return
    if (event.from !== undefined && getBareJid(event.from) !== getBareJid(call.to)) {
      logDebug(`Ignoring reply to ${event.id} from unexpected sender ${event.from}`)
      return
    }
    this.settle(
      event.id,
      event.kind === 'capability-result'
        ? { correlationId: event.id, status: 'ok', payload: event.payload }
        : { correlationId: event.id, status: 'error', error: event.error }
    )
  }

  private settle(id: string, response: CapabilityResponse): void {
    const call = this.pending.get(id)
    if (!call) return
    this.pending.delete(id)
    clearTimeout(call.timer)
    call.resolve(response)
  }
}

function failure(id: string, kind: ResponseErrorKind, message: string): CapabilityResponse {
  return { correlationId: id, status: 'error', error: { kind, message } }
}
