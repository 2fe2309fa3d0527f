/**
 * JID (Jabber ID) Utilities
 *
 * Bus addresses have the format local@domain/resource. Topic rooms are
 * addressed as topic@mucDomain, and our occupant in a room as
 * topic@mucDomain/nick.
 *
 * These are plain string operations; no stringprep or escaping is applied.
 */

export interface ParsedJid {
  local: string
  domain: string
  resource?: string
  bare: string
  full: string
}

/**
 * Parse a JID into its components.
 * A JID without "@" is a bare domain (e.g. a server address).
 */
export function parseJid(jid: string): ParsedJid {
  const slash = jid.indexOf('/')
  const bare = slash >= 0 ? jid.slice(0, slash) : jid
  const resource = slash >= 0 ? jid.slice(slash + 1) : undefined
  const at = bare.indexOf('@')
  return {
    local: at >= 0 ? bare.slice(0, at) : '',
    domain: at >= 0 ? bare.slice(at + 1) : bare,
    resource,
    bare,
    full: jid,
  }
}

export function getBareJid(jid: string): string {
  return parseJid(jid).bare
}

export function getResource(jid: string): string | undefined {
  return parseJid(jid).resource
}

export function getLocalPart(jid: string): string {
  return parseJid(jid).local
}

export function getDomain(jid: string): string {
  return parseJid(jid).domain
}

/** Join a bare JID and a resource; an empty resource yields the bare JID. */
export function createFullJid(bareJid: string, resource: string | undefined): string {
  if (!resource) return bareJid
  return `${bareJid}/${resource}`
}

/** Room address of a bus topic, e.g. ("alerts", "conference.example.com") → "alerts@conference.example.com". */
export function topicRoomJid(topic: string, mucDomain: string): string {
  return `${topic}@${mucDomain}`
}

/**
 * Topic carried by a room or occupant address on the given MUC service,
 * or undefined when the address is not a topic room.
 */
export function topicFromRoomJid(jid: string, mucDomain: string): string | undefined {
  const { local, domain } = parseJid(jid)
  if (!local || domain !== mucDomain) return undefined
  return local
}
