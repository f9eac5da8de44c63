declare module '@xmpp/client' {
  import type { EventEmitter } from 'node:events'

  export interface Element {
    name: string
    attrs: Record<string, string>
    children: (string | Element)[]
    toString(): string
  }

  export interface Client extends EventEmitter {
    start(): Promise<void>
    stop(): Promise<void>
    send(element: Element): Promise<void>
  }

  export interface ClientOptions {
    /** Endpoint URI: `xmpp://host:port` (STARTTLS), `xmpps://host:port` (direct TLS) or a WebSocket URL */
    service: string
    domain: string
    username?: string
    password?: string
    resource?: string
    lang?: string
  }

  export function client(options: ClientOptions): Client
}
