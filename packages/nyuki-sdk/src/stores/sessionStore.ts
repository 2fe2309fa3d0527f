import { createStore } from 'zustand/vanilla'
import { subscribeWithSelector } from 'zustand/middleware'
import type { SessionSnapshot, SessionState } from '../core/types'

/**
 * Observable session state.
 *
 * Each Session owns one store and is its only writer. Readers either
 * poll `getState()` or subscribe to a slice.
 *
 * @example
 * ```ts
 * const unsubscribe = session.store.subscribe(
 *   (state) => state.state,
 *   (state, previous) => console.log(`${previous} -> ${state}`)
 * )
 *
 * const { queued, lastSeenAlive } = session.store.getState()
 * ```
 *
 * @category Stores
 */
interface SessionStoreState extends SessionSnapshot {
  /** Epoch ms of the next reconnect attempt while waiting, otherwise null */
  reconnectTargetTime: number | null

  setState: (state: SessionState) => void
  setError: (error: string | null) => void
  setReconnectState: (attempt: number, reconnectTargetTime: number | null) => void
  setQueued: (queued: number) => void
  markAlive: (at: number) => void
  reset: () => void
}

type SessionData = Omit<SessionStoreState, 'setState' | 'setError' | 'setReconnectState' | 'setQueued' | 'markAlive' | 'reset'>

function initialState(jid: string): SessionData {
  return {
    jid,
    state: 'Disconnected',
    reconnectAttempt: 0,
    reconnectTargetTime: null,
    queued: 0,
    lastSeenAlive: null,
    lastError: null,
  }
}

export function createSessionStore(jid: string) {
  return createStore<SessionStoreState>()(
    subscribeWithSelector((set) => ({
      ...initialState(jid),

      setState: (state) => set({ state }),
      setError: (lastError) => set({ lastError }),
      setReconnectState: (reconnectAttempt, reconnectTargetTime) => set({ reconnectAttempt, reconnectTargetTime }),
      setQueued: (queued) => set({ queued }),
      markAlive: (at) => set({ lastSeenAlive: at }),

      reset: () => set(initialState(jid)),
    }))
  )
}

export type SessionStore = ReturnType<typeof createSessionStore>

/** Plain copy of the observable fields, without actions. */
export function toSessionSnapshot(state: SessionStoreState): SessionSnapshot {
  return {
    jid: state.jid,
    state: state.state,
    reconnectAttempt: state.reconnectAttempt,
    queued: state.queued,
    lastSeenAlive: state.lastSeenAlive,
    lastError: state.lastError,
  }
}

export type { SessionStoreState }
