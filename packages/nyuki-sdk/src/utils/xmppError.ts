import { xml, type Element } from '@xmpp/client'
import { NS_XMPP_STANZAS } from '../core/namespaces'
import type { ResponseErrorKind } from '../core/types'

/**
 * RFC 6120 §8.3 error type categories.
 *
 * - cancel:   Do not retry (the error condition is not expected to change)
 * - continue: Proceed (the condition was only a warning)
 * - modify:   Retry after changing the data sent
 * - auth:     Provide credentials and retry
 * - wait:     Retry after waiting (the error is temporary)
 */
export type XMPPErrorType = 'cancel' | 'continue' | 'modify' | 'auth' | 'wait'

/**
 * Structured representation of an XMPP stanza error (RFC 6120 §8.3).
 *
 * ```xml
 * <error type="wait">
 *   <remote-server-timeout xmlns="urn:ietf:params:xml:ns:xmpp-stanzas"/>
 *   <text xmlns="urn:ietf:params:xml:ns:xmpp-stanzas">Deadline of 500 ms expired</text>
 * </error>
 * ```
 */
export interface XMPPStanzaError {
  type: XMPPErrorType
  /** Defined condition element name (e.g. 'item-not-found') */
  condition: string
  text?: string
}

const ERROR_TYPES: readonly XMPPErrorType[] = ['cancel', 'continue', 'modify', 'auth', 'wait']

function isErrorType(value: string | undefined): value is XMPPErrorType {
  return ERROR_TYPES.some((type) => type === value)
}

/** Defined condition and error type used for each response error kind. */
export const ERROR_KIND_CONDITIONS: Record<ResponseErrorKind, { condition: string; type: XMPPErrorType }> = {
  NotFound: { condition: 'item-not-found', type: 'cancel' },
  InvalidInput: { condition: 'bad-request', type: 'modify' },
  HandlerFailure: { condition: 'undefined-condition', type: 'cancel' },
  InternalFault: { condition: 'internal-server-error', type: 'cancel' },
  Timeout: { condition: 'remote-server-timeout', type: 'wait' },
  Overloaded: { condition: 'resource-constraint', type: 'wait' },
}

/**
 * Map a stanza error without our failure marker (e.g. a server bounce)
 * back to a response error kind.
 */
export function errorKindFromCondition(condition: string): ResponseErrorKind {
  switch (condition) {
    case 'item-not-found':
    case 'service-unavailable':
    case 'recipient-unavailable':
    case 'remote-server-not-found':
      return 'NotFound'
    case 'bad-request':
    case 'not-acceptable':
    case 'jid-malformed':
      return 'InvalidInput'
    case 'remote-server-timeout':
      return 'Timeout'
    case 'resource-constraint':
      return 'Overloaded'
    case 'undefined-condition':
      return 'HandlerFailure'
    default:
      return 'InternalFault'
  }
}

/**
 * Parse an XMPP `<error>` element into a structured object per RFC 6120 §8.3.
 *
 * @param errorEl - The `<error>` child of a stanza, or the stanza itself.
 * @returns Parsed error, or null if no error element is found.
 */
export function parseXMPPError(errorEl: Element | undefined | null): XMPPStanzaError | null {
  if (!errorEl) return null

  const el = errorEl.name === 'error' ? errorEl : errorEl.getChild('error')
  if (!el) return null

  const rawType = el.attrs.type
  const type: XMPPErrorType = isErrorType(rawType) ? rawType : 'cancel'

  let condition = 'undefined-condition'
  for (const child of el.children) {
    if (typeof child === 'string') continue
    if (child.attrs.xmlns === NS_XMPP_STANZAS && child.name !== 'text') {
      condition = child.name
      break
    }
  }

  const text = el.getChild('text', NS_XMPP_STANZAS)?.getText() || undefined

  return { type, condition, text }
}

/**
 * Format an XMPPStanzaError into a human-readable string.
 *
 * Prefers the text element, falls back to the condition in sentence case
 * ('not-allowed' → 'Not allowed').
 */
export function formatXMPPError(error: XMPPStanzaError): string {
  if (error.text) return error.text
  const sentence = error.condition.replace(/-/g, ' ')
  return sentence.charAt(0).toUpperCase() + sentence.slice(1)
}

/** Build an `<error>` element; extra children (app-specific conditions) go last. */
export function buildXMPPError(error: XMPPStanzaError, ...extra: Element[]): Element {
  const children: Element[] = [xml(error.condition, { xmlns: NS_XMPP_STANZAS })]
  if (error.text !== undefined) {
    children.push(xml('text', { xmlns: NS_XMPP_STANZAS }, error.text))
  }
  return xml('error', { type: error.type }, ...children, ...extra)
}
