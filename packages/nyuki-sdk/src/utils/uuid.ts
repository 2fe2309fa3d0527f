/**
 * Identifier generation for correlation ids and stanza ids.
 */
import { randomUUID } from 'node:crypto'

/**
 * Generate a random UUID v4 string
 *
 * @returns A UUID string in the format xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx
 */
export function generateUUID(): string {
  return randomUUID()
}

/**
 * Generate a short stanza id with a readable prefix, e.g. "call-1f3a9c2e".
 */
export function generateStanzaId(prefix: string): string {
  return `${prefix}-${randomUUID().slice(0, 8)}`
}
