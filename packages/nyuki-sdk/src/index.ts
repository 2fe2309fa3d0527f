/**
 * # Nyuki SDK
 *
 * Runtime for long-lived bus agents: one XMPP session with reconnection
 * and an outbound queue, a registry of typed capabilities, a dispatcher
 * that answers requests from the bus and from HTTP, and topic
 * publish/subscribe.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Nyuki, defineCapability } from '@nyuki/sdk'
 * import { z } from 'zod'
 *
 * const nyuki = new Nyuki({
 *   bus: { jid: 'agent@example.com', password: 'secret' },
 *   api: { host: '0.0.0.0', port: 8080 },
 * })
 *
 * nyuki.capability(defineCapability({
 *   name: 'double',
 *   input: z.object({ value: z.number() }),
 *   output: z.number(),
 *   handler: ({ value }) => value * 2,
 * }))
 *
 * await nyuki.start()
 * ```
 *
 * @packageDocumentation
 */

export * from './core'

// Session state store, for observers that want selectors
export { createSessionStore, toSessionSnapshot } from './stores/sessionStore'
export type { SessionStore, SessionStoreState } from './stores/sessionStore'

// Stanza error helpers
export { parseXMPPError, formatXMPPError, buildXMPPError, ERROR_KIND_CONDITIONS } from './utils/xmppError'
export type { XMPPStanzaError, XMPPErrorType } from './utils/xmppError'
export { generateUUID, generateStanzaId } from './utils/uuid'
