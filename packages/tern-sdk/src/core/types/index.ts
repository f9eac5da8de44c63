/**
 * Type definitions for the Tern SDK.
 *
 * @packageDocumentation
 * @module Types
 */

export type {
  SecurityMode,
  HostAddress,
  SessionCredentials,
  CertificatePolicy,
  KeyMaterial,
  ConnectionSettings,
  SettingsPatch,
} from './connection'

export type {
  ProxyType,
  ProxyCredentials,
  ProxyDescriptor,
  SocketFactoryKind,
  SocketFactory,
  ProxyConnector,
} from './proxy'
