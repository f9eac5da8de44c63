// Settings construction
export {
  fromServiceName,
  fromHostPort,
  fromServiceNameWithProxy,
  fromHostPortWithProxy,
  withSettings,
  withCredentials,
  isPermissiveCertificatePolicy,
} from './settings'
export type { BuildOptions } from './settings'

// Endpoint resolution
export {
  resolveEndpoint,
  resolveEndpoints,
  orderSrvRecords,
  systemSrvResolver,
} from './modules/serverResolution'
export type { SrvRecord, SrvResolver, ResolutionLogger, ResolveOptions } from './modules/serverResolution'

// Proxies and socket factories
export {
  forNoProxy,
  forDefaultProxy,
  forHttpProxy,
  forSocks4Proxy,
  forSocks5Proxy,
  createProxyDescriptor,
  getSocketFactory,
} from './modules/proxyInfo'
export { DirectSocketFactory, ProxySocketFactory } from './modules/socketFactories'

// TLS policy
export { decideTlsUpgrade, toTlsConnectionOptions, verifyPeerCertificate, connectTls } from './modules/tlsPolicy'
export type {
  PeerTlsSupport,
  TlsDecision,
  TlsOptionsConfig,
  TlsConnectConfig,
  PeerVerificationState,
} from './modules/tlsPolicy'

// @xmpp/client wiring
export { toClientOptions, createXmppClient } from './modules/xmppClient'

// Errors
export {
  TernError,
  ResolutionError,
  InvalidConfigurationError,
  ProxyConnectError,
  isTernError,
} from './errors'
export type { TernErrorCode } from './errors'

// Configuration
export {
  XMPP_CLIENT_PORT,
  SRV_SERVICE_LABELS,
  DEFAULT_TRUSTSTORE_TYPE,
  DEFAULT_TRUSTSTORE_PASSWORD,
  DEFAULT_KEYSTORE_TYPE,
  DEFAULT_PKCS11_LIBRARY_PATH,
  DEFAULT_CA_BUNDLES,
  CA_BUNDLE_ENV,
  SSL_CERT_FILE_ENV,
  KEYSTORE_ENV,
  defaultTrustStorePath,
  defaultKeyStorePath,
} from './config'
export type { Environment, SrvServiceLabel } from './config'

// Types
export type {
  SecurityMode,
  HostAddress,
  SessionCredentials,
  CertificatePolicy,
  KeyMaterial,
  ConnectionSettings,
  SettingsPatch,
  ProxyType,
  ProxyCredentials,
  ProxyDescriptor,
  SocketFactoryKind,
  SocketFactory,
  ProxyConnector,
} from './types'
