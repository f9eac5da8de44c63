/**
 * Socket factories for the transport-establishment component.
 *
 * The direct factory opens a plain TCP connection with `node:net`. Proxy-aware
 * factories delegate the tunnel to an application-provided {@link ProxyConnector};
 * HTTP CONNECT and SOCKS handshakes are not implemented here.
 */

import { connect, type Socket } from 'node:net'
import { ProxyConnectError } from '../errors'
import type { ProxyConnector, ProxyDescriptor, SocketFactory, SocketFactoryKind } from '../types'

/**
 * Opens plain TCP sockets.
 */
export class DirectSocketFactory implements SocketFactory {
  readonly kind: SocketFactoryKind = 'direct'
  readonly proxy: ProxyDescriptor

  constructor(proxy: ProxyDescriptor) {
    this.proxy = proxy
  }

  createSocket(host: string, port: number): Promise<Socket> {
    return new Promise<Socket>((resolve, reject) => {
      const socket = connect({ host, port })
      const onError = (err: Error) => {
        socket.destroy()
        reject(err)
      }
      socket.once('error', onError)
      socket.once('connect', () => {
        socket.off('error', onError)
        resolve(socket)
      })
    })
  }
}

/**
 * Tunnels through an HTTP, SOCKS4 or SOCKS5 proxy via a {@link ProxyConnector}.
 */
export class ProxySocketFactory implements SocketFactory {
  readonly kind: SocketFactoryKind
  readonly proxy: ProxyDescriptor
  /** Tunnel implementation; without one `createSocket` rejects. */
  readonly connector?: ProxyConnector

  constructor(kind: Exclude<SocketFactoryKind, 'direct'>, proxy: ProxyDescriptor, connector?: ProxyConnector) {
    this.kind = kind
    this.proxy = proxy
    this.connector = connector
  }

  async createSocket(host: string, port: number): Promise<Socket> {
    if (!this.connector) {
      throw new ProxyConnectError(
        `No proxy connector registered for ${this.kind} proxy ${this.proxy.host}:${this.proxy.port}`
      )
    }
    return this.connector.connect(this.proxy, host, port)
  }
}
