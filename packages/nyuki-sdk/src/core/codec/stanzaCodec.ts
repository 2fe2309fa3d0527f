/**
 * Stanza codec.
 *
 * Maps bus events to XMPP stanzas and back. Capability traffic travels in
 * addressed `<message>` stanzas keyed by their `id`, with JSON payloads as
 * the text of a namespaced child:
 *
 * ```xml
 * <message id="c1" to="agent@example.com/nyuki">
 *   <request xmlns="urn:nyuki:capability:0" capability="echo" deadline="500">"hi"</request>
 * </message>
 * ```
 *
 * Decoding never throws: malformed or unsupported input yields a
 * `DecodeError` holding the raw fragment.
 *
 * @module Core/Codec
 */
import { xml, type Element } from '@xmpp/client'
import { parse, type Element as ParsedElement } from 'ltx'
import { DecodeError, type DecodeErrorReason } from '../errors'
import {
  NS_CAPABILITY,
  NS_CAPABILITY_LIST,
  NS_EVENT,
  NS_MUC,
  NS_XMPP_STANZAS,
} from '../namespaces'
import type {
  BusEvent,
  CapabilityErrorEvent,
  CapabilityRequestEvent,
  CapabilitySummary,
  MessageEvent,
  MessageType,
  PresenceEvent,
  PresenceShow,
  PresenceType,
  PublicationEvent,
  ResponseError,
  ResponseErrorKind,
} from '../types'
import { RESPONSE_ERROR_KINDS } from '../types'
import {
  buildXMPPError,
  ERROR_KIND_CONDITIONS,
  errorKindFromCondition,
  formatXMPPError,
  parseXMPPError,
} from '../../utils/xmppError'

export type DecodeResult = BusEvent | DecodeError

const PRESENCE_TYPES: readonly PresenceType[] = [
  'unavailable',
  'subscribe',
  'subscribed',
  'unsubscribe',
  'unsubscribed',
  'probe',
  'error',
]
const PRESENCE_SHOWS: readonly PresenceShow[] = ['away', 'chat', 'dnd', 'xa']
const MESSAGE_TYPES: readonly MessageType[] = ['chat', 'normal', 'headline', 'groupchat']
const EXECUTION_MODES = ['sync', 'async'] as const

function oneOf<T extends string>(values: readonly T[], value: string | undefined): value is T {
  return values.some((candidate) => candidate === value)
}

// ============================================================================
// Encoding
// ============================================================================

function compactAttrs(attrs: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(attrs)) {
    if (value !== undefined) out[key] = value
  }
  return out
}

function jsonText(payload: unknown): string[] {
  return payload === undefined ? [] : [JSON.stringify(payload)]
}

function encodeCapabilityError(event: CapabilityErrorEvent): Element {
  const { condition, type } = ERROR_KIND_CONDITIONS[event.error.kind]
  const failure = xml(
    'failure',
    { xmlns: NS_CAPABILITY, kind: event.error.kind },
    ...jsonText(event.error.detail)
  )
  return xml(
    'message',
    compactAttrs({ type: 'error', id: event.id, from: event.from, to: event.to }),
    buildXMPPError({ type, condition, text: event.error.message }, failure)
  )
}

function encodeCapabilityList(capabilities: CapabilitySummary[]): Element {
  return xml(
    'capabilities',
    { xmlns: NS_CAPABILITY_LIST },
    ...capabilities.map((capability) =>
      xml(
        'capability',
        compactAttrs({ name: capability.name, mode: capability.mode, description: capability.description })
      )
    )
  )
}

/**
 * Build the stanza element for a bus event.
 */
export function encodeElement(event: BusEvent): Element {
  switch (event.kind) {
    case 'presence': {
      const children: Element[] = []
      if (event.show !== undefined) children.push(xml('show', {}, event.show))
      if (event.status !== undefined) children.push(xml('status', {}, event.status))
      if (event.muc) children.push(xml('x', { xmlns: NS_MUC }))
      return xml('presence', compactAttrs({ type: event.type, from: event.from, to: event.to }), ...children)
    }
    case 'message': {
      const children: Element[] = []
      if (event.subject !== undefined) children.push(xml('subject', {}, event.subject))
      if (event.body !== undefined) children.push(xml('body', {}, event.body))
      return xml(
        'message',
        compactAttrs({ type: event.type, id: event.id, from: event.from, to: event.to }),
        ...children
      )
    }
    case 'publication':
      return xml(
        'message',
        compactAttrs({ type: 'groupchat', id: event.id, from: event.from, to: event.to }),
        xml('event', { xmlns: NS_EVENT, topic: event.topic }, ...jsonText(event.payload))
      )
    case 'capability-request':
      return xml(
        'message',
        compactAttrs({ id: event.id, from: event.from, to: event.to }),
        xml(
          'request',
          compactAttrs({
            xmlns: NS_CAPABILITY,
            capability: event.capability,
            deadline: event.deadlineMs === undefined ? undefined : String(event.deadlineMs),
          }),
          ...jsonText(event.payload)
        )
      )
    case 'capability-result':
      return xml(
        'message',
        compactAttrs({ id: event.id, from: event.from, to: event.to }),
        xml('response', { xmlns: NS_CAPABILITY }, ...jsonText(event.payload))
      )
    case 'capability-error':
      return encodeCapabilityError(event)
    case 'discovery-request':
      return xml(
        'message',
        compactAttrs({ id: event.id, from: event.from, to: event.to }),
        xml('discover', { xmlns: NS_CAPABILITY_LIST })
      )
    case 'discovery-result':
      return xml(
        'message',
        compactAttrs({ id: event.id, from: event.from, to: event.to }),
        encodeCapabilityList(event.capabilities)
      )
  }
}

/**
 * Serialize a bus event to stanza XML.
 */
export function encode(event: BusEvent): string {
  return encodeElement(event).toString()
}

// ============================================================================
// Decoding
// ============================================================================

/** Internal signal carrying a decode failure out of nested readers. */
class Reject {
  constructor(
    readonly reason: DecodeErrorReason,
    readonly message: string
  ) {}
}

function reject(reason: DecodeErrorReason, message: string): never {
  throw new Reject(reason, message)
}

function readAddresses(el: Element): { from?: string; to?: string } {
  const out: { from?: string; to?: string } = {}
  if (el.attrs.from !== undefined) out.from = el.attrs.from
  if (el.attrs.to !== undefined) out.to = el.attrs.to
  return out
}

function readJson(el: Element, what: string): unknown {
  const text = el.getText()
  if (text.trim() === '') return undefined
  try {
    return JSON.parse(text)
  } catch {
    return reject('malformed', `${what} is not valid JSON`)
  }
}

function requireId(el: Element): string {
  const id = el.attrs.id
  if (!id) reject('malformed', `<${el.name}> without id`)
  return id
}

function decodePresence(el: Element): BusEvent {
  const event: PresenceEvent = { kind: 'presence', ...readAddresses(el) }
  const type = el.attrs.type
  if (type !== undefined) {
    if (!oneOf(PRESENCE_TYPES, type)) reject('unsupported', `Unknown presence type "${type}"`)
    event.type = type
  }
  const show = el.getChildText('show')
  if (show !== null) {
    if (!oneOf(PRESENCE_SHOWS, show)) reject('malformed', `Unknown presence show "${show}"`)
    event.show = show
  }
  const status = el.getChildText('status')
  if (status !== null) event.status = status
  if (el.getChild('x', NS_MUC)) event.muc = true
  return event
}

function decodeFailure(el: Element): BusEvent {
  const errorEl = el.getChild('error')
  const parsed = parseXMPPError(errorEl)
  if (!errorEl || !parsed) return reject('malformed', 'Error message without <error>')

  const failure = errorEl.getChild('failure', NS_CAPABILITY)
  const failureKind = failure?.attrs.kind
  const kind: ResponseErrorKind = oneOf(RESPONSE_ERROR_KINDS, failureKind)
    ? failureKind
    : errorKindFromCondition(parsed.condition)
  const textEl = errorEl.getChild('text', NS_XMPP_STANZAS)
  const error: ResponseError = {
    kind,
    message: textEl ? textEl.getText() : formatXMPPError(parsed),
  }
  if (failure) {
    const detail = readJson(failure, 'Failure detail')
    if (detail !== undefined) error.detail = detail
  }
  return { kind: 'capability-error', id: requireId(el), ...readAddresses(el), error }
}

function decodeCapabilityList(el: Element): CapabilitySummary[] {
  return el.getChildren('capability').map((child) => {
    const { name, mode, description } = child.attrs
    if (!name) reject('malformed', '<capability> without name')
    if (!oneOf(EXECUTION_MODES, mode)) reject('malformed', `Capability "${name}" has unknown mode "${mode}"`)
    const summary: CapabilitySummary = { name, mode }
    if (description !== undefined) summary.description = description
    return summary
  })
}

function decodeMessage(el: Element): BusEvent {
  const type = el.attrs.type ?? 'normal'
  if (type === 'error') return decodeFailure(el)

  const request = el.getChild('request', NS_CAPABILITY)
  if (request) {
    const capability = request.attrs.capability
    if (!capability) reject('malformed', '<request> without capability')
    const event: CapabilityRequestEvent = {
      kind: 'capability-request',
      id: requireId(el),
      ...readAddresses(el),
      capability,
      payload: readJson(request, 'Request payload'),
    }
    const deadline = request.attrs.deadline
    if (deadline !== undefined) {
      if (!/^\d+$/.test(deadline)) reject('malformed', `Invalid deadline "${deadline}"`)
      event.deadlineMs = Number(deadline)
    }
    return event
  }

  const response = el.getChild('response', NS_CAPABILITY)
  if (response) {
    return {
      kind: 'capability-result',
      id: requireId(el),
      ...readAddresses(el),
      payload: readJson(response, 'Response payload'),
    }
  }

  if (el.getChild('discover', NS_CAPABILITY_LIST)) {
    return { kind: 'discovery-request', id: requireId(el), ...readAddresses(el) }
  }

  const list = el.getChild('capabilities', NS_CAPABILITY_LIST)
  if (list) {
    return {
      kind: 'discovery-result',
      id: requireId(el),
      ...readAddresses(el),
      capabilities: decodeCapabilityList(list),
    }
  }

  const publication = el.getChild('event', NS_EVENT)
  if (publication) {
    const topic = publication.attrs.topic
    if (!topic) reject('malformed', '<event> without topic')
    const event: PublicationEvent = {
      kind: 'publication',
      ...readAddresses(el),
      topic,
      payload: readJson(publication, 'Publication payload'),
    }
    if (el.attrs.id !== undefined) event.id = el.attrs.id
    return event
  }

  const body = el.getChildText('body')
  const subject = el.getChildText('subject')
  if (body === null && subject === null) reject('unsupported', 'Message without body, subject or known payload')
  if (!oneOf(MESSAGE_TYPES, type)) reject('unsupported', `Unknown message type "${type}"`)

  const event: MessageEvent = { kind: 'message', type, ...readAddresses(el) }
  if (el.attrs.id !== undefined) event.id = el.attrs.id
  if (subject !== null) event.subject = subject
  if (body !== null) event.body = body
  return event
}

/**
 * Decode a stanza element delivered by the XMPP client.
 */
export function decodeElement(el: Element): DecodeResult {
  try {
    switch (el.name) {
      case 'presence':
        return decodePresence(el)
      case 'message':
        return decodeMessage(el)
      default:
        return reject('unsupported', `Unsupported stanza <${el.name}>`)
    }
  } catch (err) {
    const fragment = el.toString()
    if (err instanceof Reject) return new DecodeError(err.reason, err.message, fragment)
    return new DecodeError('malformed', err instanceof Error ? err.message : String(err), fragment)
  }
}

/**
 * Decode one complete stanza from its XML text.
 */
export function decode(raw: string): DecodeResult {
  let parsed: ParsedElement | null | undefined
  try {
    parsed = parse(raw)
  } catch (err) {
    return new DecodeError('malformed', err instanceof Error ? err.message : String(err), raw)
  }
  if (!parsed) return new DecodeError('malformed', 'Empty document', raw)
  return decodeElement(toClientElement(parsed))
}

/** Rebuild a parsed tree with the client's element factory. */
function toClientElement(node: ParsedElement): Element {
  const attrs: Record<string, string> = {}
  for (const [key, value] of Object.entries(node.attrs)) {
    if (value !== undefined && value !== null) attrs[key] = String(value)
  }
  const children = node.children.map((child) => (typeof child === 'string' ? child : toClientElement(child)))
  return xml(node.name, attrs, ...children)
}
