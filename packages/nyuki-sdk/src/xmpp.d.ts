// @xmpp/client publishes no type declarations; this covers the surface the SDK uses.
declare module '@xmpp/client' {
  export interface Element {
    name: string
    attrs: Record<string, string>
    children: (string | Element)[]
    is(name: string, xmlns?: string): boolean
    getChild(name: string, xmlns?: string): Element | undefined
    getChildren(name: string, xmlns?: string): Element[]
    getChildText(name: string, xmlns?: string): string | null
    getText(): string
    text(): string
    toString(): string
  }

  // XEP-0198 Stream Management
  export interface StreamManagement {
    enabled: boolean
    /** Stanzas the server has acknowledged (h). */
    outbound: number
    /** Emitted once per stanza the server acknowledged, with the element given to send(). */
    on(event: 'ack', handler: (stanza: Element) => void): void
    on(event: 'fail', handler: (stanza: Element) => void): void
  }

  export interface JID {
    toString(): string
  }

  export interface Client {
    on(event: 'connect', handler: () => void): void
    on(event: 'online', handler: (address: JID) => void): void
    on(event: 'offline', handler: () => void): void
    on(event: 'disconnect', handler: (details?: { clean?: boolean }) => void): void
    on(event: 'error', handler: (err: Error) => void): void
    on(event: 'stanza', handler: (stanza: Element) => void): void
    removeAllListeners(): void
    start(): Promise<void>
    stop(): Promise<void>
    send(element: Element): Promise<void>
    streamManagement: StreamManagement
    reconnect?: { stop(): void }
    socket?: { end?: () => void } | null
  }

  export interface ClientOptions {
    service: string
    domain: string
    username?: string
    password?: string
    resource?: string
    lang?: string
  }

  export function client(options: ClientOptions): Client
  export function xml(name: string, attrs?: Record<string, string>, ...children: unknown[]): Element
}
