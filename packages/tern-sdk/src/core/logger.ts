/**
 * SDK diagnostic logger.
 *
 * Logs to `console.info/warn/error` with a `[Tern]` prefix so messages from
 * the SDK are easy to pick out of an application's own output.
 *
 * **Privacy**: Never pass passwords, trust-store passwords or session
 * credentials to these functions. Service names and hosts are acceptable.
 *
 * @module Core/Logger
 */

const PREFIX = '[Tern]'

export function logInfo(message: string): void {
  console.info(PREFIX, message)
}

export function logWarn(message: string): void {
  console.warn(PREFIX, message)
}

export function logError(message: string): void {
  console.error(PREFIX, message)
}
