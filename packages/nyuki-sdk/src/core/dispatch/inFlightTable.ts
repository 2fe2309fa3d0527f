/**
 * Requests currently executing or queued, keyed by correlation key.
 *
 * Each entry carries a one-shot claim: the first `settle` call decides the
 * response, every later one is a no-op. An entry stays in the table until
 * its handler has actually finished, even after a timeout settled it.
 */
import type { CapabilityRequest, CapabilityResponse } from '../types'

/** Correlation ids are only unique per transport and sender. */
export function correlationKey(request: CapabilityRequest): string {
  return `${request.transport}|${request.from ?? ''}|${request.correlationId}`
}

export class InFlightEntry {
  readonly controller = new AbortController()
  readonly response: Promise<CapabilityResponse>
  readonly finished: Promise<void>
  private resolveResponse: (response: CapabilityResponse) => void = () => {}
  private resolveFinished: () => void = () => {}
  private outcome: CapabilityResponse | null = null
  private deadlineTimer: ReturnType<typeof setTimeout> | null = null

  constructor(
    readonly key: string,
    readonly request: CapabilityRequest
  ) {
    this.response = new Promise((resolve) => {
      this.resolveResponse = resolve
    })
    this.finished = new Promise((resolve) => {
      this.resolveFinished = resolve
    })
  }

  get settled(): boolean {
    return this.outcome !== null
  }

  /**
   * Claim the entry with a response.
   * @returns false if another completion already claimed it
   */
  settle(response: CapabilityResponse): boolean {
    if (this.outcome) return false
    this.outcome = response
    this.resolveResponse(response)
    return true
  }

  armDeadline(ms: number, onExpire: () => void): void {
    this.deadlineTimer = setTimeout(onExpire, ms)
  }

  markFinished(): void {
    if (this.deadlineTimer) {
      clearTimeout(this.deadlineTimer)
      this.deadlineTimer = null
    }
    this.resolveFinished()
  }
}

export class InFlightTable {
  private entries = new Map<string, InFlightEntry>()

  open(request: CapabilityRequest): InFlightEntry {
    const entry = new InFlightEntry(correlationKey(request), request)
    this.entries.set(entry.key, entry)
    return entry
  }

  get(key: string): InFlightEntry | undefined {
    return this.entries.get(key)
  }

  close(entry: InFlightEntry): void {
    entry.markFinished()
    if (this.entries.get(entry.key) === entry) this.entries.delete(entry.key)
  }

  values(): InFlightEntry[] {
    return [...this.entries.values()]
  }

  get size(): number {
    return this.entries.size
  }
}
