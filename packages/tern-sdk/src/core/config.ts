/**
 * SDK Configuration Constants
 *
 * Ports, DNS labels and the trust/key-store defaults applied to every
 * ConnectionSettings instance.
 */

/** Standard XMPP client-to-server port (RFC 6120 §3.2.3). */
export const XMPP_CLIENT_PORT = 5222

/**
 * SRV service labels, in lookup order.
 * `_jabber._tcp` predates RFC 6120 and is still published by some servers.
 */
export const SRV_SERVICE_LABELS = ['_xmpp-client._tcp', '_jabber._tcp'] as const

export type SrvServiceLabel = typeof SRV_SERVICE_LABELS[number]

export const DEFAULT_TRUSTSTORE_TYPE = 'jks'
export const DEFAULT_TRUSTSTORE_PASSWORD = 'changeit'
export const DEFAULT_KEYSTORE_TYPE = 'jks'
export const DEFAULT_PKCS11_LIBRARY_PATH = 'pkcs11.config'

/**
 * Well-known CA bundle per platform (keys match `process.platform`).
 *
 * Windows keeps its roots in the system certificate store, not in a file, so
 * its entry is empty and TLS falls back to the runtime's bundled roots.
 */
export const DEFAULT_CA_BUNDLES: Readonly<Record<string, string>> = {
  linux: '/etc/ssl/certs/ca-certificates.crt',
  darwin: '/etc/ssl/cert.pem',
  freebsd: '/usr/local/share/certs/ca-root-nss.crt',
  openbsd: '/etc/ssl/cert.pem',
  win32: '',
}

/** Overrides the CA bundle path. */
export const CA_BUNDLE_ENV = 'TERN_CA_BUNDLE'

/** OpenSSL's own override, honoured when {@link CA_BUNDLE_ENV} is unset. */
export const SSL_CERT_FILE_ENV = 'SSL_CERT_FILE'

/** Default client key-store location. */
export const KEYSTORE_ENV = 'TERN_KEYSTORE'

/** Environment lookup, compatible with `process.env`. */
export type Environment = Readonly<Record<string, string | undefined>>

/**
 * Default trust-store path: `TERN_CA_BUNDLE`, then `SSL_CERT_FILE`, then the
 * platform table. Unknown platforms get an empty path.
 */
export function defaultTrustStorePath(
  env: Environment = process.env,
  platform: string = process.platform
): string {
  return env[CA_BUNDLE_ENV] || env[SSL_CERT_FILE_ENV] || DEFAULT_CA_BUNDLES[platform] || ''
}

/** Default key-store path: `TERN_KEYSTORE`, else empty. */
export function defaultKeyStorePath(env: Environment = process.env): string {
  return env[KEYSTORE_ENV] || ''
}
