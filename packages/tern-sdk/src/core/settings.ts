/**
 * Connection settings builder.
 *
 * Produces frozen {@link ConnectionSettings} values from one of four input
 * shapes, applying the same defaults regardless of entry point:
 *
 * | Field | Default |
 * |-------|---------|
 * | `trustStorePath` | `TERN_CA_BUNDLE`, `SSL_CERT_FILE`, else the platform CA bundle |
 * | `trustStoreType` / `trustStorePassword` | `jks` / `changeit` |
 * | `keyStorePath` / `keyStoreType` | `TERN_KEYSTORE` or empty / `jks` |
 * | `pkcs11LibraryPath` | `pkcs11.config` |
 * | certificate strictness flags | all `false` |
 * | `compressionEnabled` | `false` |
 * | `saslEnabled` | `true` |
 * | `securityMode` | `enabled` |
 * | `proxy` | direct, no proxy |
 *
 * The certificate defaults are permissive (nothing is verified). Production
 * deployments must turn verification on with {@link withSettings}; see
 * {@link isPermissiveCertificatePolicy}.
 *
 * @example
 * ```typescript
 * const settings = withSettings(await fromServiceName('example.com'), {
 *   securityMode: 'required',
 *   verifyChain: true,
 *   verifyRootCA: true,
 *   checkExpiry: true,
 *   checkDomainMatch: true,
 * })
 * ```
 *
 * @module Core/Settings
 */

import {
  DEFAULT_KEYSTORE_TYPE,
  DEFAULT_PKCS11_LIBRARY_PATH,
  DEFAULT_TRUSTSTORE_PASSWORD,
  DEFAULT_TRUSTSTORE_TYPE,
  defaultKeyStorePath,
  defaultTrustStorePath,
  type Environment,
} from './config'
import { resolveEndpoint, type ResolveOptions } from './modules/serverResolution'
import { createProxyDescriptor, forDefaultProxy, getSocketFactory } from './modules/proxyInfo'
import { ProxySocketFactory } from './modules/socketFactories'
import { credentialsSchema, endpointSchema, parseOrThrow, settingsPatchSchema } from './validation'
import type {
  ConnectionSettings,
  HostAddress,
  ProxyConnector,
  ProxyDescriptor,
  SessionCredentials,
  SettingsPatch,
} from './types'

/**
 * Options shared by the named constructors.
 */
export interface BuildOptions {
  /** SRV resolver, logger and random source for service-name lookups. */
  resolve?: ResolveOptions
  /** Environment used for default trust/key-store paths. Defaults to `process.env`. */
  env?: Environment
  /** Platform key into the CA bundle table. Defaults to `process.platform`. */
  platform?: string
  /** Tunnel implementation for proxy-aware socket factories. */
  proxyConnector?: ProxyConnector
}

/**
 * Apply the defaulting rules to a validated endpoint.
 * The socket factory is derived from the proxy here and nowhere else.
 */
function createSettings(
  endpoint: HostAddress & { serviceName: string },
  proxy: ProxyDescriptor,
  options: BuildOptions
): ConnectionSettings {
  const { serviceName, host, port } = parseOrThrow(endpointSchema, endpoint)
  const { env, platform, proxyConnector } = options

  return Object.freeze<ConnectionSettings>({
    serviceName,
    host,
    port,
    trustStorePath: defaultTrustStorePath(env, platform),
    trustStoreType: DEFAULT_TRUSTSTORE_TYPE,
    trustStorePassword: DEFAULT_TRUSTSTORE_PASSWORD,
    keyStorePath: defaultKeyStorePath(env),
    keyStoreType: DEFAULT_KEYSTORE_TYPE,
    pkcs11LibraryPath: DEFAULT_PKCS11_LIBRARY_PATH,
    verifyChain: false,
    verifyRootCA: false,
    acceptSelfSigned: false,
    checkExpiry: false,
    checkDomainMatch: false,
    compressionEnabled: false,
    saslEnabled: true,
    sendPresence: true,
    rosterLoadedAtLogin: true,
    securityMode: 'enabled',
    proxy,
    socketFactory: getSocketFactory(proxy, proxyConnector),
  })
}

/**
 * Resolve the endpoint for a service name via DNS SRV, direct connection.
 *
 * @throws InvalidConfigurationError if the service name is empty
 * @throws ResolutionError if the lookup fails
 */
export async function fromServiceName(
  serviceName: string,
  options: BuildOptions = {}
): Promise<ConnectionSettings> {
  return fromServiceNameWithProxy(serviceName, forDefaultProxy(), options)
}

/**
 * Explicit endpoint, direct connection.
 *
 * @param serviceName - XMPP domain used for certificate checks and the SASL realm; defaults to `host`
 * @throws InvalidConfigurationError for an empty host or service name, or a port outside 1–65535
 */
export function fromHostPort(
  host: string,
  port: number,
  serviceName: string = host,
  options: BuildOptions = {}
): ConnectionSettings {
  return fromHostPortWithProxy(host, port, serviceName, forDefaultProxy(), options)
}

/**
 * Resolve the endpoint for a service name via DNS SRV, connecting through `proxy`.
 *
 * The proxy is validated before any DNS traffic.
 */
export async function fromServiceNameWithProxy(
  serviceName: string,
  proxy: ProxyDescriptor,
  options: BuildOptions = {}
): Promise<ConnectionSettings> {
  const descriptor = createProxyDescriptor(proxy)
  const { host, port } = await resolveEndpoint(serviceName, options.resolve)
  return createSettings({ serviceName, host, port }, descriptor, options)
}

/**
 * Fully explicit: endpoint, service name and proxy.
 */
export function fromHostPortWithProxy(
  host: string,
  port: number,
  serviceName: string,
  proxy: ProxyDescriptor,
  options: BuildOptions = {}
): ConnectionSettings {
  return createSettings({ serviceName, host, port }, createProxyDescriptor(proxy), options)
}

function connectorOf(settings: ConnectionSettings): ProxyConnector | undefined {
  return settings.socketFactory instanceof ProxySocketFactory ? settings.socketFactory.connector : undefined
}

/**
 * Derive a modified copy of `settings`. The original is left untouched.
 *
 * Patched fields are validated like constructor input. Patching `proxy`
 * re-derives the socket factory (keeping the current proxy connector unless
 * `options.proxyConnector` is given), unless the patch also supplies a
 * `socketFactory`. Passing `credentials: null` clears stored credentials.
 *
 * @throws InvalidConfigurationError if a patched field is invalid
 */
export function withSettings(
  settings: ConnectionSettings,
  patch: SettingsPatch,
  options: Pick<BuildOptions, 'proxyConnector'> = {}
): ConnectionSettings {
  const { proxy, socketFactory, credentials, ...scalars } = patch
  const parsed = parseOrThrow(settingsPatchSchema, scalars)

  const changes: Partial<ConnectionSettings> = {}
  for (const [key, value] of Object.entries(parsed)) {
    if (value !== undefined) {
      Object.assign(changes, { [key]: value })
    }
  }

  const nextProxy = proxy !== undefined ? createProxyDescriptor(proxy) : settings.proxy
  const nextFactory =
    socketFactory ??
    (proxy !== undefined
      ? getSocketFactory(nextProxy, options.proxyConnector ?? connectorOf(settings))
      : settings.socketFactory)

  const { credentials: previous, ...rest } = settings
  const next: ConnectionSettings = { ...rest, ...changes, proxy: nextProxy, socketFactory: nextFactory }

  let nextCredentials: Readonly<SessionCredentials> | undefined = previous
  if (credentials === null) {
    nextCredentials = undefined
  } else if (credentials !== undefined) {
    nextCredentials = Object.freeze(parseOrThrow(credentialsSchema, credentials, 'credentials'))
  }

  return Object.freeze(nextCredentials ? { ...next, credentials: nextCredentials } : next)
}

/**
 * Store (or with `null`, clear) session credentials for reconnect reuse.
 */
export function withCredentials(
  settings: ConnectionSettings,
  credentials: SessionCredentials | null
): ConnectionSettings {
  return withSettings(settings, { credentials })
}

/**
 * True when none of the verification checks is on, i.e. the peer's
 * certificate is not checked at all. `acceptSelfSigned` only relaxes checks,
 * so it does not count.
 */
export function isPermissiveCertificatePolicy(settings: ConnectionSettings): boolean {
  return !settings.verifyChain && !settings.verifyRootCA && !settings.checkExpiry && !settings.checkDomainMatch
}
