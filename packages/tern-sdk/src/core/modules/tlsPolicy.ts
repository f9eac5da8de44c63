/**
 * TLS policy helpers for the TLS-negotiation component.
 *
 * The SDK does not run the STARTTLS exchange itself. These helpers turn the
 * settings into the decisions, `node:tls` options and certificate checks a
 * negotiator needs, so every negotiator applies the policy the same way.
 */

import { isIP, type Socket } from 'node:net'
import {
  checkServerIdentity,
  connect,
  type ConnectionOptions,
  type PeerCertificate,
  type TLSSocket,
} from 'node:tls'
import { logWarn } from '../logger'
import { isPermissiveCertificatePolicy } from '../settings'
import type { ConnectionSettings, SecurityMode } from '../types'

/** What the peer advertised in its stream features. */
export interface PeerTlsSupport {
  /** `<starttls/>` is present in the stream features. */
  offersStartTls: boolean
  /** `<starttls><required/></starttls>`: the peer refuses plaintext sessions. */
  requiresTls: boolean
}

export type TlsDecision =
  | { action: 'upgrade' }
  | { action: 'plaintext' }
  | { action: 'fail'; reason: string }

/**
 * Decide what to do with the peer's TLS offer under a security mode.
 *
 * | mode | peer offers | peer requires | result |
 * |------|-------------|---------------|--------|
 * | required | yes | any | upgrade |
 * | required | no | any | fail |
 * | enabled | yes | any | upgrade |
 * | enabled | no | any | plaintext |
 * | disabled | any | yes | fail |
 * | disabled | any | no | plaintext |
 */
export function decideTlsUpgrade(mode: SecurityMode, peer: PeerTlsSupport): TlsDecision {
  switch (mode) {
    case 'required':
      return peer.offersStartTls
        ? { action: 'upgrade' }
        : { action: 'fail', reason: 'TLS is required but the server does not offer it' }
    case 'enabled':
      return peer.offersStartTls ? { action: 'upgrade' } : { action: 'plaintext' }
    case 'disabled':
      return peer.requiresTls
        ? { action: 'fail', reason: 'The server requires TLS but TLS is disabled' }
        : { action: 'plaintext' }
  }
}

export interface TlsOptionsConfig {
  /** Clock used by the expiry check. */
  now?: () => Date
  /** Trust anchors replacing the runtime's bundled roots. */
  ca?: ConnectionOptions['ca']
}

export interface TlsConnectConfig extends TlsOptionsConfig {
  /** Existing stream to upgrade (STARTTLS) instead of opening a new connection. */
  socket?: Socket
}

/** The parts of a connected `TLSSocket` the certificate policy reads. */
export interface PeerVerificationState {
  authorized: boolean
  authorizationError?: unknown
  getPeerCertificate(): PeerCertificate
}

// OpenSSL verify codes, as reported in `authorizationError`
const SELF_SIGNED_CODES = new Set(['DEPTH_ZERO_SELF_SIGNED_CERT', 'SELF_SIGNED_CERT_IN_CHAIN'])
const UNTRUSTED_ROOT_CODES = new Set([
  ...SELF_SIGNED_CODES,
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
])
const VALIDITY_CODES = new Set(['CERT_HAS_EXPIRED', 'CERT_NOT_YET_VALID'])

function authorizationCode(raw: unknown): string | undefined {
  if (typeof raw === 'string') return raw
  if (raw instanceof Error) {
    return 'code' in raw && typeof raw.code === 'string' ? raw.code : raw.message
  }
  return undefined
}

function checkValidity(cert: PeerCertificate, now: Date): Error | undefined {
  const notBefore = new Date(cert.valid_from)
  const notAfter = new Date(cert.valid_to)
  if (now < notBefore) {
    return new Error(`Certificate is not valid before ${cert.valid_from}`)
  }
  if (now > notAfter) {
    return new Error(`Certificate expired on ${cert.valid_to}`)
  }
  return undefined
}

/**
 * Chain verification as reported by the handshake, filtered by the flags:
 * an untrusted root only matters with `verifyRootCA`, a self-signed one not
 * at all with `acceptSelfSigned`, and validity dates are left to `checkExpiry`.
 */
function checkChain(settings: ConnectionSettings, peer: PeerVerificationState): Error | undefined {
  if (!settings.verifyChain && !settings.verifyRootCA) return undefined
  if (peer.authorized) return undefined

  const code = authorizationCode(peer.authorizationError) ?? 'UNKNOWN'
  if (VALIDITY_CODES.has(code)) return undefined
  if (UNTRUSTED_ROOT_CODES.has(code)) {
    if (!settings.verifyRootCA) return undefined
    if (settings.acceptSelfSigned && SELF_SIGNED_CODES.has(code)) return undefined
  }
  return Object.assign(new Error(`Certificate verification failed: ${code}`), { code })
}

/**
 * Apply the certificate policy to a completed handshake.
 *
 * Each flag acts on its own: the host-name and expiry checks run whether or
 * not the chain is verified.
 *
 * @returns The first failed check, or `undefined` when the peer is acceptable
 */
export function verifyPeerCertificate(
  settings: ConnectionSettings,
  peer: PeerVerificationState,
  config: Pick<TlsOptionsConfig, 'now'> = {}
): Error | undefined {
  const chainError = checkChain(settings, peer)
  if (chainError) return chainError
  if (!settings.checkExpiry && !settings.checkDomainMatch) return undefined

  const cert = peer.getPeerCertificate()
  if (Object.keys(cert).length === 0) {
    return new Error('The server presented no certificate')
  }
  if (settings.checkExpiry) {
    const expiryError = checkValidity(cert, (config.now ?? (() => new Date()))())
    if (expiryError) return expiryError
  }
  if (settings.checkDomainMatch) {
    return checkServerIdentity(settings.serviceName, cert)
  }
  return undefined
}

/**
 * Map the settings onto `tls.connect()` options.
 *
 * - `servername` (SNI) is the service name, not the transport host, and is
 *   omitted when the service name is an IP address.
 * - `rejectUnauthorized` is off and Node's own host-name check is replaced by
 *   a no-op. Node only runs that check after the chain verifies, so the
 *   policy is applied by {@link verifyPeerCertificate} once the handshake
 *   completes.
 *
 * Trust and key stores are not loaded here; pass PEM trust anchors as `ca`.
 */
export function toTlsConnectionOptions(
  settings: ConnectionSettings,
  config: TlsOptionsConfig = {}
): ConnectionOptions {
  const options: ConnectionOptions = {
    host: settings.host,
    port: settings.port,
    rejectUnauthorized: false,
    checkServerIdentity: () => undefined,
  }
  if (isIP(settings.serviceName) === 0) {
    options.servername = settings.serviceName
  }
  if (config.ca !== undefined) {
    options.ca = config.ca
  }
  return options
}

/**
 * Open (or, given `config.socket`, upgrade) a TLS stream and enforce the
 * certificate policy on it.
 *
 * @throws The policy error from {@link verifyPeerCertificate}; the socket is destroyed first
 */
export function connectTls(settings: ConnectionSettings, config: TlsConnectConfig = {}): Promise<TLSSocket> {
  if (isPermissiveCertificatePolicy(settings)) {
    logWarn(`Certificate verification is disabled for ${settings.serviceName}`)
  }
  const options = toTlsConnectionOptions(settings, config)

  return new Promise((resolve, reject) => {
    const tlsSocket = connect(config.socket ? { ...options, socket: config.socket } : options)
    const onError = (err: Error) => reject(err)

    tlsSocket.once('error', onError)
    tlsSocket.once('secureConnect', () => {
      tlsSocket.off('error', onError)
      const policyError = verifyPeerCertificate(settings, tlsSocket, config)
      if (policyError) {
        tlsSocket.destroy()
        reject(policyError)
        return
      }
      resolve(tlsSocket)
    })
  })
}
