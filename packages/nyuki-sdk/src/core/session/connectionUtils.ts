/**
 * Client lifecycle helpers used by the session.
 *
 * Pure functions kept apart from Session.ts so they can be tested without
 * a client mock wired through the state machine.
 */
import type { Client } from '@xmpp/client'
import { describeError, logDebug } from '../logger'

// ── Constants ──────────────────────────────────────────────────────────────────

/** Timeout for graceful client stop (stream close + socket close).
 *  When the socket is already dead, stop() can hang waiting for the server. */
export const CLIENT_STOP_TIMEOUT_MS = 2000

/** Timeout for a single connection attempt (TCP + stream negotiation).
 *  A stalled negotiation is abandoned and counted as a drop. */
export const CONNECT_ATTEMPT_TIMEOUT_MS = 30_000

// ── Functions ──────────────────────────────────────────────────────────────────

/**
 * Race a promise against a timeout. Resolves with void if the timeout fires first.
 * The timer is cleared as soon as the promise settles.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T | void> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms)
  })
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer))
}

/**
 * Forcefully destroy a client instance without graceful shutdown.
 *
 * Unlike client.stop(), which sends </stream:stream> and waits for the
 * server, this strips every listener so stale events cannot reach the
 * session, then ends the socket.
 *
 * Use this when the connection is already lost. For a requested close,
 * use the graceful stop() instead.
 */
export function forceDestroyClient(client: Client): void {
  try {
    client.removeAllListeners()
  } catch (err) {
    logDebug(`Removing client listeners failed: ${describeError(err)}`)
  }

  try {
    client.socket?.end?.()
  } catch (err) {
    logDebug(`Closing socket failed: ${describeError(err)}`)
  }
}

/**
 * Turn off the client's own reconnect loop; the session machine owns
 * reconnection and backoff.
 */
export function disableBuiltInReconnect(client: Client): void {
  client.reconnect?.stop()
}

/**
 * Check whether an error raised by the client means the server rejected
 * our credentials (SASL failure), as opposed to a transport problem.
 */
export function isAuthError(err: unknown): boolean {
  if (!(err instanceof Error)) return false
  if (err.name === 'SASLError') return true
  const condition = 'condition' in err ? err.condition : undefined
  if (condition === 'not-authorized' || condition === 'credentials-expired' || condition === 'account-disabled') {
    return true
  }
  return err.message.includes('not-authorized')
}

/** Reason string recorded for an auth failure. */
export function describeAuthError(err: unknown): string {
  if (err instanceof Error && 'condition' in err && typeof err.condition === 'string') {
    return err.condition
  }
  return describeError(err)
}
