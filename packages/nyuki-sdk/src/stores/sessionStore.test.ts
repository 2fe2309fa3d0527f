import { describe, it, expect, beforeEach, vi } from 'vitest'
import { createSessionStore, toSessionSnapshot, type SessionStore } from './sessionStore'

describe('sessionStore', () => {
  let store: SessionStore

  beforeEach(() => {
    store = createSessionStore('agent@example.com/nyuki')
  })

  describe('initial state', () => {
    it('should start disconnected with nothing queued', () => {
      expect(toSessionSnapshot(store.getState())).toEqual({
        jid: 'agent@example.com/nyuki',
        state: 'Disconnected',
        reconnectAttempt: 0,
        queued: 0,
        lastSeenAlive: null,
        lastError: null,
      })
      expect(store.getState().reconnectTargetTime).toBeNull()
    })
  })

  describe('setters', () => {
    it('should update state, error and queue depth', () => {
      store.getState().setState('Ready')
      store.getState().setError('socket closed')
      store.getState().setQueued(3)
      store.getState().markAlive(1700000000000)

      const state = store.getState()
      expect(state.state).toBe('Ready')
      expect(state.lastError).toBe('socket closed')
      expect(state.queued).toBe(3)
      expect(state.lastSeenAlive).toBe(1700000000000)
    })

    it('should update reconnect attempt and target time together', () => {
      store.getState().setReconnectState(2, 1700000002000)
      expect(store.getState().reconnectAttempt).toBe(2)
      expect(store.getState().reconnectTargetTime).toBe(1700000002000)
    })

    it('should reset to the initial state but keep the jid', () => {
      store.getState().setState('Ready')
      store.getState().setQueued(5)
      store.getState().reset()

      expect(store.getState().state).toBe('Disconnected')
      expect(store.getState().queued).toBe(0)
      expect(store.getState().jid).toBe('agent@example.com/nyuki')
    })
  })

  describe('subscriptions', () => {
    it('should notify slice subscribers only when the slice changes', () => {
      const listener = vi.fn()
      store.subscribe((state) => state.state, listener)

      store.getState().setQueued(1)
      expect(listener).not.toHaveBeenCalled()

      store.getState().setState('Connecting')
      expect(listener).toHaveBeenCalledWith('Connecting', 'Disconnected')
    })

    it('should keep separate stores independent', () => {
      const other = createSessionStore('other@example.com')
      other.getState().setState('Ready')
      expect(store.getState().state).toBe('Disconnected')
    })
  })
})
