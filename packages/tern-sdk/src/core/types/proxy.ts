/**
 * Proxy descriptor and socket factory types.
 *
 * A connection attempt either opens its TCP socket directly or tunnels through
 * an HTTP CONNECT, SOCKS4 or SOCKS5 proxy. The tunnelling protocols are not
 * implemented by the SDK: a proxy-aware socket factory hands the work to a
 * {@link ProxyConnector} supplied by the application.
 *
 * @packageDocumentation
 * @module Types/Proxy
 */

import type { Socket } from 'node:net'

/**
 * Kind of proxy sitting between the client and the XMPP server.
 *
 * @category Proxy
 */
export type ProxyType = 'none' | 'http' | 'socks4' | 'socks5'

/**
 * Optional proxy authentication.
 *
 * SOCKS4 only carries a user id, so `password` is ignored for that type.
 */
export interface ProxyCredentials {
  username?: string
  password?: string
}

/**
 * Where and how to reach a proxy.
 *
 * For type `none` the host is empty and the port is 0.
 *
 * @category Proxy
 */
export interface ProxyDescriptor extends Readonly<ProxyCredentials> {
  readonly type: ProxyType
  readonly host: string
  readonly port: number
}

/**
 * Kind of socket produced by a {@link SocketFactory}.
 * `direct` is a plain TCP connection; the others tunnel through a proxy.
 */
export type SocketFactoryKind = 'direct' | Exclude<ProxyType, 'none'>

/**
 * Produces transport sockets for a connection attempt.
 *
 * Derived from the proxy descriptor once, when the settings are built.
 *
 * @category Proxy
 */
export interface SocketFactory {
  readonly kind: SocketFactoryKind
  /** Proxy the factory tunnels through (type `none` for direct factories). */
  readonly proxy: ProxyDescriptor
  /**
   * Open a connected socket to the given endpoint.
   * Resolves once the socket (or the proxy tunnel) is established.
   */
  createSocket(host: string, port: number): Promise<Socket>
}

/**
 * Application-provided tunnelling implementation.
 *
 * @example SOCKS5 via the `socks` package
 * ```typescript
 * const connector: ProxyConnector = {
 *   async connect(proxy, host, port) {
 *     const { socket } = await SocksClient.createConnection({
 *       proxy: { host: proxy.host, port: proxy.port, type: 5 },
 *       command: 'connect',
 *       destination: { host, port },
 *     })
 *     return socket
 *   },
 * }
 * ```
 *
 * @category Proxy
 */
export interface ProxyConnector {
  connect(proxy: ProxyDescriptor, host: string, port: number): Promise<Socket>
}
