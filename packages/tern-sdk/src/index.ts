/**
 * # Tern SDK
 *
 * Connection bootstrap for XMPP clients: resolves where to connect (DNS SRV
 * or an explicit endpoint), which proxy to go through, and which TLS and
 * SASL policy applies, as a frozen settings value handed to the code that
 * opens the stream.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { fromServiceName, withSettings, withCredentials, createXmppClient, connectTls } from '@tern/sdk'
 *
 * let settings = await fromServiceName('example.com')
 * settings = withCredentials(settings, { username: 'bot', password: 'secret', resource: 'worker' })
 *
 * const xmpp = createXmppClient(settings)
 * await xmpp.start()
 *
 * // Own TLS negotiation with every certificate check on
 * const strict = withSettings(settings, { verifyChain: true, verifyRootCA: true, checkExpiry: true, checkDomainMatch: true })
 * const tlsSocket = await connectTls(strict)
 * ```
 *
 * @packageDocumentation
 */

export * from './core'
