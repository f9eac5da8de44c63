/**
 * Proxy descriptor factories.
 *
 * @example
 * ```typescript
 * const proxy = forSocks5Proxy('proxy.internal', 1080, { username: 'alice', password: 'test-secret' })
 * const settings = fromHostPortWithProxy('xmpp.example.com', 5222, 'example.com', proxy)
 * ```
 */

import { parseOrThrow, proxyDescriptorSchema } from '../validation'
import { DirectSocketFactory, ProxySocketFactory } from './socketFactories'
import type {
  ProxyConnector,
  ProxyCredentials,
  ProxyDescriptor,
  ProxyType,
  SocketFactory,
} from '../types'

const NO_PROXY: ProxyDescriptor = Object.freeze<ProxyDescriptor>({ type: 'none', host: '', port: 0 })

/** Direct connection, no proxy. */
export function forNoProxy(): ProxyDescriptor {
  return NO_PROXY
}

/**
 * Proxy used when the caller does not supply one.
 * System-wide proxy discovery is not attempted, so this is the same as {@link forNoProxy}.
 */
export function forDefaultProxy(): ProxyDescriptor {
  return NO_PROXY
}

function forProxy(
  type: Exclude<ProxyType, 'none'>,
  host: string,
  port: number,
  credentials: ProxyCredentials = {}
): ProxyDescriptor {
  return createProxyDescriptor({ type, host, port, ...credentials })
}

/** HTTP CONNECT proxy. */
export function forHttpProxy(host: string, port: number, credentials?: ProxyCredentials): ProxyDescriptor {
  return forProxy('http', host, port, credentials)
}

/** SOCKS4 proxy. Only `username` (the SOCKS4 user id) is used. */
export function forSocks4Proxy(host: string, port: number, credentials?: ProxyCredentials): ProxyDescriptor {
  return forProxy('socks4', host, port, credentials)
}

/** SOCKS5 proxy. */
export function forSocks5Proxy(host: string, port: number, credentials?: ProxyCredentials): ProxyDescriptor {
  return forProxy('socks5', host, port, credentials)
}

/**
 * Validate an arbitrary descriptor (e.g. read from a config file) and freeze it.
 *
 * @throws InvalidConfigurationError for an unknown type, or a missing host/port on a real proxy
 */
export function createProxyDescriptor(input: unknown): ProxyDescriptor {
  const parsed = parseOrThrow(proxyDescriptorSchema, input, 'proxy')
  const descriptor: { -readonly [K in keyof ProxyDescriptor]: ProxyDescriptor[K] } = {
    type: parsed.type,
    host: parsed.host,
    port: parsed.port,
  }
  if (parsed.username !== undefined) descriptor.username = parsed.username
  if (parsed.password !== undefined) descriptor.password = parsed.password
  return Object.freeze(descriptor)
}

/**
 * Socket factory matching the proxy type.
 *
 * @param connector - Tunnel implementation handed to proxy-aware factories
 */
export function getSocketFactory(proxy: ProxyDescriptor, connector?: ProxyConnector): SocketFactory {
  switch (proxy.type) {
    case 'none':
      return new DirectSocketFactory(proxy)
    case 'http':
    case 'socks4':
    case 'socks5':
      return new ProxySocketFactory(proxy.type, proxy, connector)
  }
}
