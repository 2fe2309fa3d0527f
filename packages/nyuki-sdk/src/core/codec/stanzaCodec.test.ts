import { describe, it, expect } from 'vitest'
import { xml } from '@xmpp/client'
import { encode, encodeElement, decode, decodeElement } from './stanzaCodec'
import { DecodeError, isDecodeError } from '../errors'
import type { BusEvent } from '../types'

const validEvents: Array<[string, BusEvent]> = [
  ['available presence', { kind: 'presence' }],
  [
    'presence with show and status',
    { kind: 'presence', from: 'peer@example.com/nyuki', show: 'dnd', status: 'Busy crunching' },
  ],
  ['MUC join', { kind: 'presence', to: 'alerts@conference.example.com/agent', muc: true }],
  ['unavailable presence', { kind: 'presence', type: 'unavailable', to: 'alerts@conference.example.com/agent' }],
  [
    'chat message',
    { kind: 'message', id: 'm1', type: 'chat', from: 'peer@example.com', to: 'agent@example.com', body: 'a < b & c' },
  ],
  ['headline with subject only', { kind: 'message', type: 'headline', subject: 'Maintenance' }],
  [
    'publication',
    {
      kind: 'publication',
      id: 'p1',
      to: 'alerts@conference.example.com',
      topic: 'alerts',
      payload: { level: 'high', tags: ['disk', 'io'], ratio: 0.5 },
    },
  ],
  ['publication without payload', { kind: 'publication', topic: 'heartbeat', payload: undefined }],
  [
    'capability request',
    {
      kind: 'capability-request',
      id: 'c1',
      from: 'peer@example.com/nyuki',
      to: 'agent@example.com/nyuki',
      capability: 'echo',
      payload: 'hi',
      deadlineMs: 500,
    },
  ],
  [
    'capability request with markup in payload',
    { kind: 'capability-request', id: 'c2', capability: 'messages.set', payload: { text: '<b>"quoted" & more</b>' } },
  ],
  ['capability result', { kind: 'capability-result', id: 'c1', to: 'peer@example.com/nyuki', payload: [1, null, true] }],
  [
    'capability error with detail',
    {
      kind: 'capability-error',
      id: 'c3',
      to: 'peer@example.com/nyuki',
      error: { kind: 'InvalidInput', message: 'Payload does not match the input schema', detail: [{ path: ['text'] }] },
    },
  ],
  ['capability error without detail', { kind: 'capability-error', id: 'c4', error: { kind: 'Timeout', message: '' } }],
  ['discovery request', { kind: 'discovery-request', id: 'd1', from: 'peer@example.com/nyuki' }],
  [
    'discovery result',
    {
      kind: 'discovery-result',
      id: 'd1',
      to: 'peer@example.com/nyuki',
      capabilities: [
        { name: 'echo', mode: 'sync', description: 'Returns its input' },
        { name: 'alert', mode: 'async' },
      ],
    },
  ],
  ['empty discovery result', { kind: 'discovery-result', id: 'd2', capabilities: [] }],
]

describe('stanza codec', () => {
  describe('round-trip', () => {
    it.each(validEvents)('should decode an encoded %s to the same event', (_name, event) => {
      expect(decode(encode(event))).toEqual(event)
    })

    it.each(validEvents)('should decode an encoded %s element to the same event', (_name, event) => {
      expect(decodeElement(encodeElement(event))).toEqual(event)
    })
  })

  describe('encode', () => {
    it('should write requests as addressed messages with a JSON payload', () => {
      const wire = encode({
        kind: 'capability-request',
        id: 'c1',
        to: 'agent@example.com',
        capability: 'double',
        payload: 42,
        deadlineMs: 500,
      })
      expect(wire).toBe(
        '<message id="c1" to="agent@example.com">' +
          '<request xmlns="urn:nyuki:capability:0" capability="double" deadline="500">42</request>' +
          '</message>'
      )
    })

    it('should write errors with the mapped RFC 6120 condition and a failure marker', () => {
      const el = encodeElement({
        kind: 'capability-error',
        id: 'c1',
        error: { kind: 'Overloaded', message: 'Too busy' },
      })
      expect(el.attrs.type).toBe('error')
      const error = el.getChild('error')
      expect(error?.attrs.type).toBe('wait')
      expect(error?.getChild('resource-constraint', 'urn:ietf:params:xml:ns:xmpp-stanzas')).toBeDefined()
      expect(error?.getChild('failure', 'urn:nyuki:capability:0')?.attrs.kind).toBe('Overloaded')
    })

    it('should send publications as groupchat messages', () => {
      const el = encodeElement({ kind: 'publication', to: 'alerts@conference.example.com', topic: 'alerts', payload: 1 })
      expect(el.attrs.type).toBe('groupchat')
      expect(el.getChild('event', 'urn:nyuki:event:0')?.attrs.topic).toBe('alerts')
    })
  })

  describe('decode', () => {
    it('should read stanzas as sent by a server', () => {
      const raw =
        '<message xmlns="jabber:client" from="peer@example.com/nyuki" to="agent@example.com/nyuki" id="r7">' +
        '<request xmlns="urn:nyuki:capability:0" capability="echo">\n  {"text": "hi"}\n</request></message>'
      expect(decode(raw)).toEqual({
        kind: 'capability-request',
        id: 'r7',
        from: 'peer@example.com/nyuki',
        to: 'agent@example.com/nyuki',
        capability: 'echo',
        payload: { text: 'hi' },
      })
    })

    it('should default the message type to normal', () => {
      expect(decode('<message><body>hello</body></message>')).toEqual({
        kind: 'message',
        type: 'normal',
        body: 'hello',
      })
    })

    it('should map a server bounce without failure marker to a kind', () => {
      const raw =
        '<message type="error" id="c9" from="gone@example.com">' +
        '<error type="cancel"><service-unavailable xmlns="urn:ietf:params:xml:ns:xmpp-stanzas"/></error></message>'
      expect(decode(raw)).toEqual({
        kind: 'capability-error',
        id: 'c9',
        from: 'gone@example.com',
        error: { kind: 'NotFound', message: 'Service unavailable' },
      })
    })

    it('should read the MUC join marker', () => {
      const el = xml('presence', { to: 'alerts@conference.example.com/agent' }, xml('x', { xmlns: 'http://jabber.org/protocol/muc' }))
      expect(decodeElement(el)).toEqual({ kind: 'presence', to: 'alerts@conference.example.com/agent', muc: true })
    })
  })

  describe('decode errors', () => {
    it('should return a DecodeError for broken XML and keep the fragment', () => {
      const result = decode('<message><body>unterminated')
      expect(result).toBeInstanceOf(DecodeError)
      if (!isDecodeError(result)) throw new Error('expected a DecodeError')
      expect(result.reason).toBe('malformed')
      expect(result.fragment).toBe('<message><body>unterminated')
    })

    it('should return a DecodeError for an empty document', () => {
      const result = decode('')
      expect(isDecodeError(result)).toBe(true)
    })

    it.each([
      ['request without id', '<message><request xmlns="urn:nyuki:capability:0" capability="echo">1</request></message>'],
      ['request without capability', '<message id="a"><request xmlns="urn:nyuki:capability:0">1</request></message>'],
      ['invalid JSON payload', '<message id="a"><request xmlns="urn:nyuki:capability:0" capability="echo">{oops</request></message>'],
      ['negative deadline', '<message id="a"><request xmlns="urn:nyuki:capability:0" capability="echo" deadline="-1"/></message>'],
      ['unknown show value', '<presence><show>sleeping</show></presence>'],
      ['event without topic', '<message type="groupchat"><event xmlns="urn:nyuki:event:0">1</event></message>'],
      ['capability with bad mode', '<message id="d"><capabilities xmlns="urn:nyuki:capability:0#list"><capability name="x" mode="later"/></capabilities></message>'],
      ['error message without error', '<message type="error" id="e"/>'],
    ])('should report %s as malformed', (_name, raw) => {
      const result = decode(raw)
      if (!isDecodeError(result)) throw new Error('expected a DecodeError')
      expect(result.reason).toBe('malformed')
      expect(result.kind).toBe('DecodeError')
    })

    it.each([
      ['iq ping', '<iq type="get" id="p1"><ping xmlns="urn:xmpp:ping"/></iq>'],
      ['chat state only', '<message type="chat"><active xmlns="http://jabber.org/protocol/chatstates"/></message>'],
      ['unknown presence type', '<presence type="bogus"/>'],
    ])('should report %s as unsupported', (_name, raw) => {
      const result = decode(raw)
      if (!isDecodeError(result)) throw new Error('expected a DecodeError')
      expect(result.reason).toBe('unsupported')
      expect(result.fragment).toContain('<')
    })
  })
})
