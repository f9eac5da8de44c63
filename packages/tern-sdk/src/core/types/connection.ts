/**
 * Connection settings type definitions.
 *
 * @packageDocumentation
 * @module Types/Connection
 */

import type { ProxyDescriptor, SocketFactory } from './proxy'

/**
 * Policy governing whether and when a TLS upgrade is attempted.
 *
 * @remarks
 * - `required`: the stream must be upgraded to TLS; a peer without TLS support is a fatal error.
 * - `enabled`: upgrade opportunistically if the peer offers it, otherwise continue unencrypted.
 * - `disabled`: never upgrade, even if offered; a peer that insists on TLS is a fatal error.
 *
 * @category Connection
 */
export type SecurityMode = 'required' | 'enabled' | 'disabled'

/**
 * A concrete transport endpoint.
 *
 * @category Connection
 */
export interface HostAddress {
  host: string
  port: number
}

/**
 * Session credentials kept alongside the settings so a reconnect can reuse them.
 *
 * @category Connection
 */
export interface SessionCredentials {
  username: string
  password: string
  /** XMPP resource identifier (e.g., 'desktop', 'bot') */
  resource?: string
}

/**
 * Certificate strictness flags read by the TLS negotiation component.
 *
 * All of them default to `false`.
 *
 * @category Connection
 */
export interface CertificatePolicy {
  /** Verify the whole certificate chain. */
  verifyChain: boolean
  /** Verify that the chain ends in a trusted root CA. */
  verifyRootCA: boolean
  /** Accept self-signed certificates. */
  acceptSelfSigned: boolean
  /** Reject expired or not-yet-valid certificates. */
  checkExpiry: boolean
  /** Reject certificates whose names do not match the service name. */
  checkDomainMatch: boolean
}

/**
 * Trust and key material locations.
 *
 * @category Connection
 */
export interface KeyMaterial {
  trustStorePath: string
  trustStoreType: string
  trustStorePassword: string
  /** Empty when no key store is configured. */
  keyStorePath: string
  keyStoreType: string
  pkcs11LibraryPath: string
}

/**
 * Everything a single connection attempt needs.
 *
 * Instances are frozen; derive a modified copy with `withSettings()`.
 * `serviceName` and `host` may differ: the service name is the XMPP domain
 * identity (certificate validation, SASL realm) while host/port is the
 * physical endpoint, possibly found through DNS SRV.
 *
 * @category Connection
 */
export interface ConnectionSettings extends Readonly<CertificatePolicy>, Readonly<KeyMaterial> {
  readonly serviceName: string
  readonly host: string
  readonly port: number
  readonly securityMode: SecurityMode
  readonly compressionEnabled: boolean
  readonly saslEnabled: boolean
  /** Send initial presence once the session is established. */
  readonly sendPresence: boolean
  /** Request the roster as part of login. */
  readonly rosterLoadedAtLogin: boolean
  readonly credentials?: Readonly<SessionCredentials>
  readonly proxy: ProxyDescriptor
  readonly socketFactory: SocketFactory
}

/**
 * Fields accepted by `withSettings()`.
 *
 * @category Connection
 */
export type SettingsPatch = Partial<Omit<ConnectionSettings, 'credentials'>> & {
  /** `null` clears stored credentials. */
  credentials?: SessionCredentials | null
}
