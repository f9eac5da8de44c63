/**
 * Error types raised while building connection settings.
 *
 * Nothing in this package retries or swallows these errors; retry and
 * failover belong to whoever orchestrates connection attempts.
 *
 * @module Core/Errors
 */

/**
 * Machine-readable error codes.
 *
 * @category Errors
 */
export type TernErrorCode = 'RESOLUTION_FAILED' | 'INVALID_CONFIGURATION' | 'PROXY_UNAVAILABLE'

/**
 * Base class for all SDK errors.
 *
 * @category Errors
 */
export class TernError extends Error {
  readonly code: TernErrorCode

  constructor(message: string, code: TernErrorCode, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TernError'
    this.code = code
  }
}

/**
 * DNS/service lookup failed and no fallback applies.
 *
 * @category Errors
 */
export class ResolutionError extends TernError {
  readonly serviceName: string

  constructor(serviceName: string, message: string, options?: { cause?: unknown }) {
    super(message, 'RESOLUTION_FAILED', options)
    this.name = 'ResolutionError'
    this.serviceName = serviceName
  }
}

/**
 * Structurally invalid input: empty service name, out-of-range port,
 * malformed proxy descriptor.
 *
 * @category Errors
 */
export class InvalidConfigurationError extends TernError {
  /** Dotted paths of the offending fields (e.g. `['port']`, `['proxy', 'host']`). */
  readonly fields: readonly string[]

  constructor(message: string, fields: readonly string[] = []) {
    super(message, 'INVALID_CONFIGURATION')
    this.name = 'InvalidConfigurationError'
    this.fields = fields
  }
}

/**
 * A proxy-aware socket factory was asked for a socket but has no connector
 * that knows how to tunnel through the proxy.
 *
 * @category Errors
 */
export class ProxyConnectError extends TernError {
  constructor(message: string) {
    super(message, 'PROXY_UNAVAILABLE')
    this.name = 'ProxyConnectError'
  }
}

export function isTernError(value: unknown): value is TernError {
  return value instanceof TernError
}
