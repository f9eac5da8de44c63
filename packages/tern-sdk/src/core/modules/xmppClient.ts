/**
 * Wiring between ConnectionSettings and the `@xmpp/client` library.
 *
 * `@xmpp/client` opens its own TCP socket and upgrades with STARTTLS when the
 * server offers it, continuing in plaintext when it does not. It takes no TLS
 * options, so:
 *
 * - settings that need a proxy tunnel are rejected;
 * - only `securityMode: 'enabled'` matches its behaviour, and the other modes
 *   are rejected;
 * - the certificate flags and the trust/key-store fields have no effect. The
 *   library verifies with Node's defaults (trusted chain, validity dates and
 *   host name against the domain), whatever the flags say. Use
 *   `connectTls` from the TLS policy module where they must apply.
 */

import { client, type Client, type ClientOptions } from '@xmpp/client'
import { InvalidConfigurationError } from '../errors'
import type { ConnectionSettings } from '../types'

function formatHost(host: string): string {
  return host.includes(':') ? `[${host}]` : host
}

/**
 * Build `@xmpp/client` options from settings.
 *
 * The service URI targets the resolved transport endpoint while `domain`
 * carries the service name. Credentials are only passed when SASL is enabled.
 */
export function toClientOptions(settings: ConnectionSettings): ClientOptions {
  const options: ClientOptions = {
    service: `xmpp://${formatHost(settings.host)}:${settings.port}`,
    domain: settings.serviceName,
  }

  const { credentials } = settings
  if (credentials?.resource) {
    options.resource = credentials.resource
  }
  if (settings.saslEnabled && credentials) {
    options.username = credentials.username
    options.password = credentials.password
  }
  return options
}

/**
 * Create (without starting) an `@xmpp/client` instance for the settings.
 *
 * @throws InvalidConfigurationError if the settings use a proxy or a security mode other than `enabled`
 */
export function createXmppClient(settings: ConnectionSettings): Client {
  if (settings.proxy.type !== 'none') {
    throw new InvalidConfigurationError(
      `@xmpp/client cannot connect through a ${settings.proxy.type} proxy`,
      ['proxy']
    )
  }
  if (settings.securityMode !== 'enabled') {
    throw new InvalidConfigurationError(
      `@xmpp/client upgrades to TLS only when offered; securityMode "${settings.securityMode}" is not supported`,
      ['securityMode']
    )
  }
  return client(toClientOptions(settings))
}
