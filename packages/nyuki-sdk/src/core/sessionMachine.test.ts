/**
 * Tests for the session state machine.
 *
 * These tests verify:
 * 1. The ordered path from idle to ready
 * 2. Drops schedule a backoff and re-enter connecting when it elapses
 * 3. Auth failures try alternate credentials before giving up
 * 4. A closed session never leaves closed
 * 5. Backoff computation honours multiplier, cap and jitter
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createActor } from 'xstate'
import {
  sessionMachine,
  computeBackoffDelay,
  getSessionStateFromValue,
  isClosedState,
  DEFAULT_BACKOFF,
  type SessionMachineInput,
} from './sessionMachine'
import type { BackoffOptions } from './types'

const noJitter: BackoffOptions = { ...DEFAULT_BACKOFF, jitter: 0 }

function startActor(input: SessionMachineInput = { backoff: noJitter }) {
  return createActor(sessionMachine, { input }).start()
}

function toReady(actor: ReturnType<typeof startActor>) {
  actor.send({ type: 'START' })
  actor.send({ type: 'TRANSPORT_CONNECTED' })
  actor.send({ type: 'AUTH_SUCCESS' })
  actor.send({ type: 'PRESENCE_ANNOUNCED' })
}

describe('sessionMachine', () => {
  describe('initial state', () => {
    it('should start in disconnected.idle', () => {
      const actor = startActor()
      expect(actor.getSnapshot().value).toEqual({ disconnected: 'idle' })
      actor.stop()
    })

    it('should count at least one credential', () => {
      const actor = startActor({ credentialCount: 0 })
      expect(actor.getSnapshot().context.credentialCount).toBe(1)
      expect(actor.getSnapshot().context.backoff).toEqual(DEFAULT_BACKOFF)
      actor.stop()
    })
  })

  describe('happy path', () => {
    it('should pass through every phase in order', () => {
      const actor = startActor()
      const seen: unknown[] = []
      actor.subscribe((snapshot) => seen.push(snapshot.value))

      toReady(actor)

      expect(seen).toEqual([
        'connecting',
        'authenticating',
        'bound',
        'ready',
      ])
      actor.stop()
    })

    it('should ignore PRESENCE_ANNOUNCED before the stream is bound', () => {
      const actor = startActor()
      actor.send({ type: 'START' })
      actor.send({ type: 'PRESENCE_ANNOUNCED' })
      expect(actor.getSnapshot().value).toBe('connecting')
      actor.stop()
    })

    it('should accept AUTH_SUCCESS straight from connecting', () => {
      const actor = startActor()
      actor.send({ type: 'START' })
      actor.send({ type: 'AUTH_SUCCESS' })
      expect(actor.getSnapshot().value).toBe('bound')
      actor.stop()
    })
  })

  describe('reconnection', () => {
    beforeEach(() => {
      vi.useFakeTimers()
    })

    afterEach(() => {
      vi.useRealTimers()
    })

    it('should wait the backoff delay after a drop, then reconnect', () => {
      const actor = startActor()
      toReady(actor)

      actor.send({ type: 'TRANSPORT_DROPPED', error: 'socket closed' })
      const { value, context } = actor.getSnapshot()
      expect(value).toEqual({ disconnected: 'waiting' })
      expect(context.reconnectAttempt).toBe(1)
      expect(context.nextRetryDelayMs).toBe(1000)
      expect(context.lastError).toBe('socket closed')
      expect(context.reconnectTargetTime).toBe(Date.now() + 1000)

      vi.advanceTimersByTime(999)
      expect(actor.getSnapshot().value).toEqual({ disconnected: 'waiting' })
      vi.advanceTimersByTime(1)
      expect(actor.getSnapshot().value).toBe('connecting')
      expect(actor.getSnapshot().context.reconnectTargetTime).toBeNull()
      actor.stop()
    })

    it('should double the delay for each consecutive failure', () => {
      const actor = startActor()
      actor.send({ type: 'START' })

      const delays: number[] = []
      for (let i = 0; i < 4; i++) {
        actor.send({ type: 'TRANSPORT_DROPPED' })
        delays.push(actor.getSnapshot().context.nextRetryDelayMs)
        actor.send({ type: 'RETRY_NOW' })
      }
      expect(delays).toEqual([1000, 2000, 4000, 8000])
      expect(actor.getSnapshot().context.lastError).toBe('Connection lost')
      actor.stop()
    })

    it('should reset the attempt counter on reaching ready', () => {
      const actor = startActor()
      actor.send({ type: 'START' })
      actor.send({ type: 'TRANSPORT_DROPPED' })
      actor.send({ type: 'RETRY_NOW' })
      actor.send({ type: 'TRANSPORT_DROPPED' })
      expect(actor.getSnapshot().context.reconnectAttempt).toBe(2)

      actor.send({ type: 'RETRY_NOW' })
      actor.send({ type: 'TRANSPORT_CONNECTED' })
      actor.send({ type: 'AUTH_SUCCESS' })
      expect(actor.getSnapshot().context.reconnectAttempt).toBe(2)
      actor.send({ type: 'PRESENCE_ANNOUNCED' })
      expect(actor.getSnapshot().context.reconnectAttempt).toBe(0)
      actor.stop()
    })

    it('should fail once maxAttempts consecutive attempts have failed', () => {
      const actor = startActor({ backoff: { ...noJitter, maxAttempts: 2 } })
      actor.send({ type: 'START' })
      actor.send({ type: 'TRANSPORT_DROPPED' })
      actor.send({ type: 'RETRY_NOW' })
      actor.send({ type: 'TRANSPORT_DROPPED' })
      expect(actor.getSnapshot().value).toEqual({ disconnected: 'waiting' })
      actor.send({ type: 'RETRY_NOW' })
      actor.send({ type: 'TRANSPORT_DROPPED', error: 'refused' })

      const snapshot = actor.getSnapshot()
      expect(snapshot.value).toEqual({ disconnected: 'failed' })
      expect(snapshot.context.failure).toBe('maxAttempts')
      expect(snapshot.context.lastError).toBe('refused')

      vi.advanceTimersByTime(DEFAULT_BACKOFF.maxDelayMs)
      expect(actor.getSnapshot().value).toEqual({ disconnected: 'failed' })
      actor.stop()
    })
  })

  describe('authentication', () => {
    it('should fail for good when the only credential is rejected', () => {
      const actor = startActor()
      actor.send({ type: 'START' })
      actor.send({ type: 'TRANSPORT_CONNECTED' })
      actor.send({ type: 'AUTH_FAILED', error: 'not-authorized' })

      const snapshot = actor.getSnapshot()
      expect(snapshot.value).toEqual({ disconnected: 'failed' })
      expect(snapshot.context.failure).toBe('auth')
      expect(snapshot.context.lastError).toBe('Authentication failed: not-authorized')
      actor.stop()
    })

    it('should retry with the next credential while alternates remain', () => {
      const actor = startActor({ backoff: noJitter, credentialCount: 2 })
      actor.send({ type: 'START' })
      actor.send({ type: 'TRANSPORT_CONNECTED' })
      actor.send({ type: 'AUTH_FAILED', error: 'not-authorized' })

      expect(actor.getSnapshot().value).toEqual({ disconnected: 'waiting' })
      expect(actor.getSnapshot().context.credentialIndex).toBe(1)

      actor.send({ type: 'RETRY_NOW' })
      actor.send({ type: 'TRANSPORT_CONNECTED' })
      actor.send({ type: 'AUTH_FAILED', error: 'not-authorized' })
      expect(actor.getSnapshot().value).toEqual({ disconnected: 'failed' })
      actor.stop()
    })

    it('should start over from the first credential after a fatal failure', () => {
      const actor = startActor({ backoff: noJitter, credentialCount: 2 })
      actor.send({ type: 'START' })
      actor.send({ type: 'TRANSPORT_CONNECTED' })
      actor.send({ type: 'AUTH_FAILED', error: 'x' })
      actor.send({ type: 'RETRY_NOW' })
      actor.send({ type: 'TRANSPORT_CONNECTED' })
      actor.send({ type: 'AUTH_FAILED', error: 'x' })

      actor.send({ type: 'START' })
      const snapshot = actor.getSnapshot()
      expect(snapshot.value).toBe('connecting')
      expect(snapshot.context.credentialIndex).toBe(0)
      expect(snapshot.context.reconnectAttempt).toBe(0)
      expect(snapshot.context.lastError).toBeNull()
      expect(snapshot.context.failure).toBeNull()
      actor.stop()
    })
  })

  describe('closing', () => {
    it('should close from ready via closing', () => {
      const actor = startActor()
      toReady(actor)
      actor.send({ type: 'STOP' })
      expect(actor.getSnapshot().value).toBe('closing')
      actor.send({ type: 'CLOSED' })
      expect(actor.getSnapshot().value).toEqual({ disconnected: 'closed' })
      actor.stop()
    })

    it('should treat a drop while closing as closed', () => {
      const actor = startActor()
      toReady(actor)
      actor.send({ type: 'STOP' })
      actor.send({ type: 'TRANSPORT_DROPPED' })
      expect(actor.getSnapshot().value).toEqual({ disconnected: 'closed' })
      expect(actor.getSnapshot().context.reconnectAttempt).toBe(0)
      actor.stop()
    })

    it('should cancel a pending reconnect on STOP', () => {
      vi.useFakeTimers()
      const actor = startActor()
      toReady(actor)
      actor.send({ type: 'TRANSPORT_DROPPED' })
      actor.send({ type: 'STOP' })
      expect(actor.getSnapshot().value).toEqual({ disconnected: 'closed' })

      vi.advanceTimersByTime(10_000)
      expect(actor.getSnapshot().value).toEqual({ disconnected: 'closed' })
      actor.stop()
      vi.useRealTimers()
    })

    it('should ignore every event once closed', () => {
      const actor = startActor()
      actor.send({ type: 'STOP' })
      actor.send({ type: 'START' })
      actor.send({ type: 'RETRY_NOW' })
      actor.send({ type: 'TRANSPORT_CONNECTED' })
      expect(actor.getSnapshot().value).toEqual({ disconnected: 'closed' })
      actor.stop()
    })
  })

  describe('computeBackoffDelay', () => {
    it('should grow geometrically and cap at maxDelayMs', () => {
      const options: BackoffOptions = { ...noJitter, initialDelayMs: 100, multiplier: 3, maxDelayMs: 1000 }
      const delays = [1, 2, 3, 4].map((attempt) => computeBackoffDelay(attempt, options, () => 0))
      expect(delays).toEqual([100, 300, 900, 1000])
    })

    it('should spread the delay by the jitter fraction', () => {
      const options: BackoffOptions = { ...DEFAULT_BACKOFF, jitter: 0.2 }
      expect(computeBackoffDelay(1, options, () => 0)).toBe(800)
      expect(computeBackoffDelay(1, options, () => 0.5)).toBe(1000)
      expect(computeBackoffDelay(1, options, () => 0.75)).toBe(1100)
    })

    it('should never exceed maxDelayMs with jitter', () => {
      const options: BackoffOptions = { ...DEFAULT_BACKOFF, jitter: 0.5 }
      expect(computeBackoffDelay(20, options, () => 0.99)).toBe(DEFAULT_BACKOFF.maxDelayMs)
    })

    it('should draw jitter from the machine input', () => {
      const actor = startActor({ backoff: DEFAULT_BACKOFF, random: () => 0 })
      actor.send({ type: 'START' })
      actor.send({ type: 'TRANSPORT_DROPPED' })
      expect(actor.getSnapshot().context.nextRetryDelayMs).toBe(800)
      actor.stop()
    })
  })

  describe('helpers', () => {
    it.each([
      [{ disconnected: 'idle' } as const, 'Disconnected'],
      [{ disconnected: 'waiting' } as const, 'Disconnected'],
      ['connecting' as const, 'Connecting'],
      ['authenticating' as const, 'Authenticating'],
      ['bound' as const, 'Bound'],
      ['ready' as const, 'Ready'],
      ['closing' as const, 'Closing'],
    ])('should map %o to %s', (value, expected) => {
      expect(getSessionStateFromValue(value)).toBe(expected)
    })

    it('should recognise the closed state', () => {
      expect(isClosedState({ disconnected: 'closed' })).toBe(true)
      expect(isClosedState({ disconnected: 'failed' })).toBe(false)
      expect(isClosedState('ready')).toBe(false)
    })
  })
})
