/**
 * XState session state machine.
 *
 * Owns the bus session lifecycle. The machine performs no I/O: the
 * Session class subscribes to state changes and drives the XMPP client.
 *
 * ## State Diagram
 *
 * ```
 * ┌────────────────────────────────────────────┐
 * │               disconnected                  │
 * │  ┌──────┐  ┌─────────┐  ┌────────┐  ┌──────┐ │
 * │  │ idle │  │ waiting │  │ failed │  │closed│ │
 * │  └──┬───┘  └────┬────┘  └───┬────┘  └──▲───┘ │
 * └─────┼───────────┼───────────┼──────────┼─────┘
 *   START      backoff       START      CLOSED
 *       ▼           ▼           ▼          │
 * ┌────────────┐ TRANSPORT_CONNECTED ┌────────────────┐
 * │ connecting │────────────────────►│ authenticating │
 * └────────────┘                     └───────┬────────┘
 *                                            │ AUTH_SUCCESS
 *                                            ▼
 * ┌─────────┐   PRESENCE_ANNOUNCED   ┌───────┐
 * │  ready  │◄───────────────────────│ bound │
 * └────┬────┘                        └───────┘
 *      │ STOP (also from connecting/authenticating/bound)
 *      ▼
 * ┌─────────┐
 * │ closing │
 * └─────────┘
 * ```
 *
 * TRANSPORT_DROPPED from connecting, authenticating, bound or ready goes
 * to `disconnected.waiting`, or to `disconnected.failed` once `maxAttempts`
 * consecutive attempts have failed. AUTH_FAILED goes to `waiting` with the
 * next credential while alternates remain, otherwise to `failed`.
 *
 * ## Key Invariants
 *
 * 1. No reconnect is scheduled once STOP was received
 * 2. `closed` has no outgoing transitions: a stopped session stays stopped
 * 3. The attempt counter resets only on reaching `ready`
 * 4. Backoff context is always consistent with the current state
 *
 * @module Core/SessionMachine
 */
import { setup, assign, type ActorRefFrom } from 'xstate'
import type { BackoffOptions, SessionState } from './types'

// ============================================================================
// Constants
// ============================================================================

/** Initial delay before first reconnect attempt (ms) */
export const INITIAL_RECONNECT_DELAY = 1000

/** Maximum delay between reconnect attempts (ms) */
export const MAX_RECONNECT_DELAY = 120_000

/** Multiplier for exponential backoff */
export const RECONNECT_MULTIPLIER = 2

/** Spread applied around each delay (±20%) */
export const RECONNECT_JITTER = 0.2

export const DEFAULT_BACKOFF: BackoffOptions = {
  initialDelayMs: INITIAL_RECONNECT_DELAY,
  multiplier: RECONNECT_MULTIPLIER,
  maxDelayMs: MAX_RECONNECT_DELAY,
  jitter: RECONNECT_JITTER,
  maxAttempts: null,
}

// ============================================================================
// Types
// ============================================================================

export type SessionMachineEvent =
  | { type: 'START' }
  | { type: 'STOP' }
  | { type: 'TRANSPORT_CONNECTED' }
  | { type: 'AUTH_SUCCESS' }
  | { type: 'AUTH_FAILED'; error: string }
  | { type: 'PRESENCE_ANNOUNCED' }
  | { type: 'TRANSPORT_DROPPED'; error?: string }
  | { type: 'CLOSED' }
  | { type: 'RETRY_NOW' }

export type FailureReason = 'auth' | 'maxAttempts'

export interface SessionMachineContext {
  backoff: BackoffOptions
  random: () => number
  /** Consecutive failed attempts since the last time the session was ready */
  reconnectAttempt: number
  nextRetryDelayMs: number
  /** Absolute timestamp (ms since epoch) of the next attempt, null when not waiting */
  reconnectTargetTime: number | null
  lastError: string | null
  /** Index into the credential list (primary password, then alternates) */
  credentialIndex: number
  credentialCount: number
  failure: FailureReason | null
}

export interface SessionMachineInput {
  backoff?: BackoffOptions
  credentialCount?: number
  /** Source of randomness for jitter, in [0, 1) */
  random?: () => number
}

export type SessionStateValue =
  | { disconnected: 'idle' }
  | { disconnected: 'waiting' }
  | { disconnected: 'failed' }
  | { disconnected: 'closed' }
  | 'connecting'
  | 'authenticating'
  | 'bound'
  | 'ready'
  | 'closing'

// ============================================================================
// Helpers (pure functions)
// ============================================================================

/**
 * Compute the delay before a reconnect attempt.
 *
 * `initialDelayMs * multiplier^(attempt-1)`, capped at `maxDelayMs`, then
 * scaled by a factor drawn from [1 - jitter, 1 + jitter] and capped again.
 *
 * @param attempt - 1-based attempt number
 * @param random - Returns a number in [0, 1)
 */
export function computeBackoffDelay(attempt: number, options: BackoffOptions, random: () => number): number {
  const base = Math.min(
    options.initialDelayMs * Math.pow(options.multiplier, Math.max(attempt - 1, 0)),
    options.maxDelayMs
  )
  if (options.jitter <= 0) return base
  const factor = 1 - options.jitter + random() * 2 * options.jitter
  return Math.min(Math.round(base * factor), options.maxDelayMs)
}

// ============================================================================
// Machine Definition
// ============================================================================

const dropTransitions = [
  {
    guard: 'attemptsExhausted' as const,
    target: '#session.disconnected.failed',
    actions: ['setDropError' as const, 'setMaxAttemptsFailure' as const],
  },
  {
    target: '#session.disconnected.waiting',
    actions: ['setDropError' as const, 'incrementAttempt' as const],
  },
]

export const sessionMachine = setup({
  types: {
    context: {} as SessionMachineContext,
    events: {} as SessionMachineEvent,
    input: {} as SessionMachineInput,
  },
  actions: {
    resetReconnectState: assign({
      reconnectAttempt: 0,
      nextRetryDelayMs: 0,
      reconnectTargetTime: null,
    }),

    // Sets reconnectTargetTime as an absolute timestamp for observers
    incrementAttempt: assign(({ context }) => {
      const attempt = context.reconnectAttempt + 1
      const delay = computeBackoffDelay(attempt, context.backoff, context.random)
      return {
        reconnectAttempt: attempt,
        nextRetryDelayMs: delay,
        reconnectTargetTime: Date.now() + delay,
      }
    }),

    nextCredential: assign(({ context }) => ({
      credentialIndex: context.credentialIndex + 1,
    })),

    resetCredentials: assign({ credentialIndex: 0 }),

    setDropError: assign(({ event }) => {
      if (event.type === 'TRANSPORT_DROPPED') {
        return { lastError: event.error ?? 'Connection lost' }
      }
      return {}
    }),

    setAuthError: assign(({ event }) => {
      if (event.type === 'AUTH_FAILED') {
        return { lastError: `Authentication failed: ${event.error}` }
      }
      return {}
    }),

    setAuthFailure: assign({ failure: 'auth' }),

    setMaxAttemptsFailure: assign({ failure: 'maxAttempts' }),

    clearTargetTime: assign({ reconnectTargetTime: null }),

    clearError: assign({ lastError: null, failure: null }),
  },
  guards: {
    hasMoreCredentials: ({ context }) => context.credentialIndex + 1 < context.credentialCount,
    attemptsExhausted: ({ context }) =>
      context.backoff.maxAttempts !== null && context.reconnectAttempt + 1 > context.backoff.maxAttempts,
  },
  delays: {
    reconnectDelay: ({ context }) => context.nextRetryDelayMs,
  },
}).createMachine({
  id: 'session',
  context: ({ input }) => ({
    backoff: input.backoff ?? DEFAULT_BACKOFF,
    random: input.random ?? Math.random,
    reconnectAttempt: 0,
    nextRetryDelayMs: 0,
    reconnectTargetTime: null,
    lastError: null,
    credentialIndex: 0,
    credentialCount: Math.max(input.credentialCount ?? 1, 1),
    failure: null,
  }),
  initial: 'disconnected',
  states: {
    disconnected: {
      initial: 'idle',
      states: {
        /** Fresh session, start() not called yet */
        idle: {
          on: {
            START: { target: '#session.connecting', actions: 'clearError' },
            STOP: { target: 'closed' },
          },
        },

        /**
         * Backoff timer running after a drop. Observers read
         * reconnectTargetTime from context for a countdown.
         */
        waiting: {
          after: {
            reconnectDelay: { target: '#session.connecting', actions: 'clearTargetTime' },
          },
          on: {
            RETRY_NOW: { target: '#session.connecting', actions: 'clearTargetTime' },
            STOP: { target: 'closed', actions: ['resetReconnectState'] },
          },
        },

        /** Fatal: credentials rejected or attempts exhausted. Only START escapes. */
        failed: {
          on: {
            START: {
              target: '#session.connecting',
              actions: ['resetReconnectState', 'resetCredentials', 'clearError'],
            },
            STOP: { target: 'closed' },
          },
        },

        /** Shut down for good */
        closed: {},
      },
    },

    connecting: {
      on: {
        TRANSPORT_CONNECTED: { target: 'authenticating' },
        // Some servers skip straight to a bound stream
        AUTH_SUCCESS: { target: 'bound' },
        TRANSPORT_DROPPED: dropTransitions,
        STOP: { target: 'closing' },
      },
    },

    authenticating: {
      on: {
        AUTH_SUCCESS: { target: 'bound' },
        AUTH_FAILED: [
          {
            guard: 'hasMoreCredentials',
            target: '#session.disconnected.waiting',
            actions: ['setAuthError', 'nextCredential', 'incrementAttempt'],
          },
          {
            target: '#session.disconnected.failed',
            actions: ['setAuthError', 'setAuthFailure'],
          },
        ],
        TRANSPORT_DROPPED: dropTransitions,
        STOP: { target: 'closing' },
      },
    },

    bound: {
      on: {
        PRESENCE_ANNOUNCED: { target: 'ready', actions: 'resetReconnectState' },
        TRANSPORT_DROPPED: dropTransitions,
        STOP: { target: 'closing' },
      },
    },

    ready: {
      on: {
        TRANSPORT_DROPPED: dropTransitions,
        STOP: { target: 'closing' },
      },
    },

    closing: {
      on: {
        CLOSED: { target: '#session.disconnected.closed', actions: 'resetReconnectState' },
        TRANSPORT_DROPPED: { target: '#session.disconnected.closed', actions: 'resetReconnectState' },
      },
    },
  },
})

// ============================================================================
// Actor Type
// ============================================================================

export type SessionActor = ActorRefFrom<typeof sessionMachine>

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Map a machine state value to the public session state.
 */
export function getSessionStateFromValue(stateValue: SessionStateValue): SessionState {
  if (typeof stateValue !== 'string') return 'Disconnected'
  switch (stateValue) {
    case 'connecting':
      return 'Connecting'
    case 'authenticating':
      return 'Authenticating'
    case 'bound':
      return 'Bound'
    case 'ready':
      return 'Ready'
    case 'closing':
      return 'Closing'
  }
}

/** True once the session can no longer be restarted */
export function isClosedState(stateValue: SessionStateValue): boolean {
  return typeof stateValue !== 'string' && stateValue.disconnected === 'closed'
}
