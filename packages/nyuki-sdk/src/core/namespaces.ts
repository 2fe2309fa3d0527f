/**
 * XML Namespace Constants
 *
 * Centralized namespace definitions used by the stanza codec.
 */

// RFC 6120: client stream content and stanza errors
export const NS_CLIENT = 'jabber:client'
export const NS_XMPP_STANZAS = 'urn:ietf:params:xml:ns:xmpp-stanzas'

// XEP-0045: Multi-User Chat (join marker)
export const NS_MUC = 'http://jabber.org/protocol/muc'

// Capability requests, responses and failures
export const NS_CAPABILITY = 'urn:nyuki:capability:0'

// Capability discovery
export const NS_CAPABILITY_LIST = 'urn:nyuki:capability:0#list'

// Topic publications
export const NS_EVENT = 'urn:nyuki:event:0'
