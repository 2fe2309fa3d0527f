/**
 * Sample capabilities shipped with the agent.
 */
import { defineCapability, logInfo, type Nyuki } from '@nyuki/sdk'
import { z } from 'zod'

const messageId = z.string().regex(/^\d+$/, 'Message ids are numeric')

/** In-memory message book served by `messages.get` and `messages.set`. */
export class MessageBook {
  private readonly messages: Map<string, string>

  constructor(initial: Record<string, string> = { '1': 'message 1', '2': 'message 2' }) {
    this.messages = new Map(Object.entries(initial))
  }

  get(id: string): string | null {
    return this.messages.get(id) ?? null
  }

  set(id: string, message: string): void {
    this.messages.set(id, message)
  }

  all(): Record<string, string> {
    return Object.fromEntries(this.messages)
  }
}

export const echo = defineCapability({
  name: 'echo',
  description: 'Returns its payload unchanged',
  mode: 'sync',
  input: z.unknown(),
  output: z.unknown(),
  handler: (payload) => payload,
})

export function messagesGet(book: MessageBook) {
  return defineCapability({
    name: 'messages.get',
    description: 'Read one message by id, or all of them',
    mode: 'sync',
    input: z.object({ id: messageId.optional() }).default({}),
    output: z.union([
      z.object({ messages: z.record(z.string()) }),
      z.object({ id: z.string(), message: z.string().nullable() }),
    ]),
    handler: ({ id }) => (id === undefined ? { messages: book.all() } : { id, message: book.get(id) }),
  })
}

export function messagesSet(book: MessageBook) {
  return defineCapability({
    name: 'messages.set',
    description: 'Store a message under an id',
    mode: 'sync',
    input: z.object({ id: messageId, message: z.string().min(1) }),
    output: z.object({ id: z.string(), message: z.string() }),
    handler: ({ id, message }) => {
      book.set(id, message)
      logInfo(`Message ${id} updated`)
      return { id, message }
    },
  })
}

export function alert(nyuki: Nyuki) {
  return defineCapability({
    name: 'alert',
    description: 'Send a chat message to another address',
    input: z.object({ to: z.string().min(1), message: z.string().min(1).default('alert') }),
    output: z.object({ id: z.string() }),
    handler: async ({ to, message }) => ({ id: nyuki.send(to, message) }),
  })
}

export function registerSampleCapabilities(nyuki: Nyuki, book: MessageBook = new MessageBook()): void {
  nyuki.capability(echo).capability(messagesGet(book)).capability(messagesSet(book)).capability(alert(nyuki))
}
