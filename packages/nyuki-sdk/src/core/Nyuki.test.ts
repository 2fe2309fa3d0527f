import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { client } from '@xmpp/client'
import { z } from 'zod'
import { Nyuki, type NyukiConfig } from './Nyuki'
import { defineCapability } from './capabilities/defineCapability'
import { decodeElement, encodeElement } from './codec'
import { RegistryFrozenError, isDecodeError } from './errors'
import { createMockXmppClient, flushMicrotasks, type MockXmppClient } from './test-utils'
import type { BusEvent, SessionState } from './types'

vi.mock('@xmpp/client', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@xmpp/client')>()
  return { ...actual, client: vi.fn() }
})

const echo = defineCapability({
  name: 'echo',
  mode: 'sync',
  input: z.unknown(),
  output: z.unknown(),
  handler: (payload) => payload,
})

let clients: MockXmppClient[] = []
let agents: Nyuki[] = []

function createAgent(overrides: Partial<NyukiConfig> = {}): Nyuki {
  const agent = new Nyuki({
    bus: { jid: 'agent@example.com', password: 'test-secret', mucDomain: 'conference.example.com' },
    ...overrides,
  })
  agents.push(agent)
  return agent
}

function latestClient(): MockXmppClient {
  const mock = clients[clients.length - 1]
  if (!mock) throw new Error('no client was created')
  return mock
}

async function startReady(agent: Nyuki): Promise<MockXmppClient> {
  const started = agent.start()
  await flushMicrotasks()
  const mock = latestClient()
  mock._emit('connect')
  mock._emit('online', { toString: () => 'agent@example.com/nyuki' })
  await flushMicrotasks()
  await started
  return mock
}

function written(mock: MockXmppClient): BusEvent[] {
  return mock.sent.flatMap((el) => {
    const event = decodeElement(el)
    return isDecodeError(event) ? [] : [event]
  })
}

function deliver(mock: MockXmppClient, event: BusEvent): void {
  mock._emit('stanza', encodeElement(event))
}

describe('Nyuki', () => {
  beforeEach(() => {
    clients = []
    agents = []
    vi.mocked(client).mockReset()
    vi.mocked(client).mockImplementation(() => {
      const mock = createMockXmppClient()
      clients.push(mock)
      return mock
    })
  })

  afterEach(async () => {
    await Promise.all(agents.map((agent) => agent.stop()))
  })

  describe('start', () => {
    it('should freeze the registry and resolve once the session is ready', async () => {
      const agent = createAgent().capability(echo)
      const states: SessionState[] = []
      agent.on('session:state', ({ state }) => states.push(state))

      await startReady(agent)

      expect(agent.state).toBe('Ready')
      expect(states).toEqual(['Connecting', 'Authenticating', 'Bound', 'Ready'])
      expect(agent.registry.isFrozen).toBe(true)
      expect(() => agent.capability({ ...echo, name: 'late' })).toThrow(RegistryFrozenError)
    })

    it('should refuse a second start', async () => {
      const agent = createAgent()
      await startReady(agent)
      await expect(agent.start()).rejects.toThrow('Cannot start: agent is running')
    })

    it('should stop delivering runtime events after unsubscribing', async () => {
      const agent = createAgent()
      const states: SessionState[] = []
      const off = agent.on('session:state', ({ state }) => states.push(state))
      off()

      await startReady(agent)

      expect(states).toEqual([])
    })
  })

  describe('capabilities over the bus', () => {
    it('should answer a request with a result addressed to the caller', async () => {
      const agent = createAgent().capability(echo)
      const mock = await startReady(agent)

      deliver(mock, {
        kind: 'capability-request',
        id: 'req-1',
        from: 'peer@example.com/nyuki',
        to: 'agent@example.com/nyuki',
        capability: 'echo',
        payload: { text: 'hi' },
      })
      await flushMicrotasks()

      expect(written(mock).at(-1)).toEqual({
        kind: 'capability-result',
        id: 'req-1',
        to: 'peer@example.com/nyuki',
        payload: { text: 'hi' },
      })
    })

    it('should answer an unknown capability with NotFound', async () => {
      const agent = createAgent().capability(echo)
      const mock = await startReady(agent)

      deliver(mock, {
        kind: 'capability-request',
        id: 'req-2',
        from: 'peer@example.com/nyuki',
        capability: 'missing',
        payload: null,
      })
      await flushMicrotasks()

      expect(written(mock).at(-1)).toEqual({
        kind: 'capability-error',
        id: 'req-2',
        to: 'peer@example.com/nyuki',
        error: { kind: 'NotFound', message: 'Capability "missing" is not registered' },
      })
    })

    it('should answer discovery with the capability summaries', async () => {
      const agent = createAgent().capability(echo)
      const mock = await startReady(agent)

      deliver(mock, { kind: 'discovery-request', id: 'disco-1', from: 'peer@example.com/nyuki' })
      await flushMicrotasks()

      expect(written(mock).at(-1)).toEqual({
        kind: 'discovery-result',
        id: 'disco-1',
        to: 'peer@example.com/nyuki',
        capabilities: [{ name: 'echo', mode: 'sync' }],
      })
    })
  })

  describe('capabilities over HTTP', () => {
    it('should serve the same registry through the API server', async () => {
      const agent = createAgent().capability(echo)
      await startReady(agent)

      const res = await agent.http.inject({
        method: 'POST',
        url: '/capabilities/echo',
        headers: { 'x-correlation-id': 'http-1' },
        payload: { text: 'hi' },
      })

      expect(res.statusCode).toBe(200)
      expect(res.json()).toEqual({ status: 'ok', correlationId: 'http-1', payload: { text: 'hi' } })
    })

    it('should report the session on /health', async () => {
      const agent = createAgent()
      await startReady(agent)

      const res = await agent.http.inject({ method: 'GET', url: '/health' })

      expect(res.json()).toEqual({ session: 'Ready', inFlight: 0, queued: 0 })
    })
  })

  describe('bus messaging', () => {
    it('should send chat messages', async () => {
      const agent = createAgent()
      const mock = await startReady(agent)

      const id = agent.send('peer@example.com', 'hello')
      await flushMicrotasks()

      expect(written(mock).at(-1)).toEqual({
        kind: 'message',
        id,
        type: 'chat',
        to: 'peer@example.com',
        body: 'hello',
      })
    })

    it('should join topics subscribed before start and deliver publications', async () => {
      const agent = createAgent()
      const received: unknown[] = []
      agent.subscribe('alerts', (event) => received.push(event.payload))

      const mock = await startReady(agent)
      deliver(mock, {
        kind: 'publication',
        id: 'pub-1',
        from: 'alerts@conference.example.com/other',
        topic: 'alerts',
        payload: { level: 'high' },
      })

      expect(written(mock)[1]).toEqual({
        kind: 'presence',
        to: 'alerts@conference.example.com/agent',
        muc: true,
      })
      expect(received).toEqual([{ level: 'high' }])
    })

    it('should publish to the topic room', async () => {
      const agent = createAgent()
      const mock = await startReady(agent)

      const id = agent.publish('metrics', { cpu: 3 })
      await flushMicrotasks()

      expect(written(mock).at(-1)).toEqual({
        kind: 'publication',
        id,
        to: 'metrics@conference.example.com',
        topic: 'metrics',
        payload: { cpu: 3 },
      })
    })
  })

  describe('call', () => {
    it('should resolve with the peer result', async () => {
      const agent = createAgent()
      const mock = await startReady(agent)

      const pending = agent.call('peer@example.com/nyuki', 'double', { n: 2 })
      await flushMicrotasks()
      const request = written(mock).at(-1)
      if (request?.kind !== 'capability-request') throw new Error('no request was written')
      expect(request).toMatchObject({ to: 'peer@example.com/nyuki', capability: 'double', payload: { n: 2 } })

      deliver(mock, { kind: 'capability-result', id: request.id, from: 'peer@example.com/nyuki', payload: 4 })

      await expect(pending).resolves.toEqual({ correlationId: request.id, status: 'ok', payload: 4 })
    })

    it('should resolve pending calls with Overloaded on stop', async () => {
      const agent = createAgent()
      await startReady(agent)

      const pending = agent.call('peer@example.com/nyuki', 'double', { n: 2 })
      await agent.stop()

      const response = await pending
      expect(response.status).toBe('error')
      if (response.status !== 'error') return
      expect(response.error).toEqual({ kind: 'Overloaded', message: 'Agent is stopping' })
    })
  })

  describe('stop', () => {
    it('should run teardown hooks in reverse order, then close the session', async () => {
      const agent = createAgent()
      const mock = await startReady(agent)
      const order: string[] = []
      agent.onTeardown(() => {
        order.push(`first:${agent.state}`)
      })
      agent.onTeardown(async () => {
        order.push('second')
      })

      await agent.stop()

      expect(order).toEqual(['second', 'first:Ready'])
      expect(mock.stop).toHaveBeenCalled()
      expect(agent.state).toBe('Disconnected')
      expect(agent.isStopped).toBe(true)
    })

    it('should keep going when a teardown hook throws', async () => {
      const agent = createAgent()
      await startReady(agent)
      const after = vi.fn()
      agent.onTeardown(after)
      agent.onTeardown(() => {
        throw new Error('hook failed')
      })

      await agent.stop()

      expect(after).toHaveBeenCalledTimes(1)
      expect(agent.isStopped).toBe(true)
    })

    it('should return the same promise when called twice', async () => {
      const agent = createAgent()
      await startReady(agent)

      expect(agent.stop()).toBe(agent.stop())
    })
  })
})
