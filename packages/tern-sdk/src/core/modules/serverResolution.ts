/**
 * Server resolution utilities: DNS SRV lookup for XMPP client endpoints.
 *
 * Turns a bare service name (the XMPP domain) into an ordered list of
 * transport endpoints. Queries `_xmpp-client._tcp.<domain>`, then the legacy
 * `_jabber._tcp.<domain>`, and falls back to `<domain>:5222` when neither
 * label publishes records.
 *
 * No caching and no retries happen here: a failed lookup is raised as a
 * {@link ResolutionError} for the connection orchestrator to handle.
 */

import { resolveSrv } from 'node:dns/promises'
import { SRV_SERVICE_LABELS, XMPP_CLIENT_PORT } from '../config'
import { ResolutionError } from '../errors'
import { parseOrThrow, serviceNameSchema } from '../validation'
import type { HostAddress } from '../types'

/** A single DNS SRV answer (RFC 2782). */
export interface SrvRecord {
  priority: number
  weight: number
  port: number
  /** Target host; a lone `.` means the service is decidedly not available. */
  target: string
}

/**
 * Performs the SRV query for a fully qualified name
 * (e.g. `_xmpp-client._tcp.example.com`).
 */
export type SrvResolver = (name: string) => Promise<SrvRecord[]>

/** Console-like interface for logging (avoids direct console dependency). */
export interface ResolutionLogger {
  addEvent(message: string, category?: 'connection' | 'error'): void
}

export interface ResolveOptions {
  /** Defaults to `resolveSrv` from `node:dns/promises`. */
  resolver?: SrvResolver
  logger?: ResolutionLogger
  /** Random source in [0, 1) used for weighted selection. Defaults to `Math.random`. */
  random?: () => number
}

/**
 * DNS error codes meaning "this name has no SRV records". These fall through
 * to the next label (or the port-5222 fallback) instead of failing.
 */
const NO_RECORD_CODES = new Set(['ENODATA', 'ENOTFOUND', 'NXDOMAIN'])

/** SRV lookup backed by the system resolver. */
export const systemSrvResolver: SrvResolver = async (name) => {
  const answers = await resolveSrv(name)
  return answers.map((answer) => ({
    priority: answer.priority,
    weight: answer.weight,
    port: answer.port,
    target: answer.name,
  }))
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

function stripTrailingDot(target: string): string {
  return target.endsWith('.') ? target.slice(0, -1) : target
}

/**
 * Order SRV records per RFC 2782: ascending priority, then weighted random
 * selection within each priority group.
 *
 * Within a group, zero-weight records are placed first in the running sum so
 * they are only chosen when the random draw lands on 0 or the group has no
 * weighted records left.
 */
export function orderSrvRecords(records: readonly SrvRecord[], random: () => number = Math.random): SrvRecord[] {
  const groups = new Map<number, SrvRecord[]>()
  for (const record of records) {
    const group = groups.get(record.priority)
    if (group) {
      group.push(record)
    } else {
      groups.set(record.priority, [record])
    }
  }

  const ordered: SrvRecord[] = []
  const priorities = [...groups.keys()].sort((a, b) => a - b)

  for (const priority of priorities) {
    const group = groups.get(priority) ?? []
    const remaining = [
      ...group.filter((r) => r.weight === 0),
      ...group.filter((r) => r.weight !== 0),
    ]

    while (remaining.length > 0) {
      const total = remaining.reduce((sum, r) => sum + r.weight, 0)
      const threshold = Math.floor(random() * (total + 1))
      let running = 0
      let index = remaining.length - 1
      for (let i = 0; i < remaining.length; i++) {
        running += remaining[i].weight
        if (running >= threshold) {
          index = i
          break
        }
      }
      ordered.push(...remaining.splice(index, 1))
    }
  }

  return ordered
}

/**
 * Query one SRV name. Returns `null` when the name has no records.
 */
async function lookupLabel(
  serviceName: string,
  name: string,
  resolver: SrvResolver,
  logger?: ResolutionLogger
): Promise<SrvRecord[] | null> {
  try {
    const records = await resolver(name)
    if (records.length === 0) {
      logger?.addEvent(`No SRV records for ${name}`, 'connection')
      return null
    }
    return records
  } catch (err) {
    const code = errorCode(err)
    if (code && NO_RECORD_CODES.has(code)) {
      logger?.addEvent(`No SRV records for ${name} (${code})`, 'connection')
      return null
    }
    const errorMsg = err instanceof Error ? err.message : String(err)
    logger?.addEvent(`SRV lookup failed for ${name}: ${errorMsg}`, 'error')
    throw new ResolutionError(serviceName, `SRV lookup for ${name} failed: ${errorMsg}`, { cause: err })
  }
}

function hasValidPort(record: SrvRecord): boolean {
  return Number.isInteger(record.port) && record.port >= 1 && record.port <= 65535
}

/**
 * Resolve every candidate endpoint for a service name, in connection order.
 *
 * @param serviceName - XMPP domain (e.g. `example.com`)
 * @returns Ordered endpoints; `[{ host: serviceName, port: 5222 }]` when no SRV records exist
 * @throws InvalidConfigurationError if the service name is empty
 * @throws ResolutionError if DNS fails, or the domain advertises that the service is unavailable
 */
export async function resolveEndpoints(
  serviceName: string,
  options: ResolveOptions = {}
): Promise<HostAddress[]> {
  parseOrThrow(serviceNameSchema, serviceName, 'serviceName')
  const { resolver = systemSrvResolver, logger, random } = options

  for (const label of SRV_SERVICE_LABELS) {
    const name = `${label}.${serviceName}`
    logger?.addEvent(`Resolving ${name}...`, 'connection')

    const records = await lookupLabel(serviceName, name, resolver, logger)
    if (!records) continue

    const available = records.filter((r) => stripTrailingDot(r.target) !== '')
    if (available.length === 0) {
      logger?.addEvent(`${name} advertises that the service is not available`, 'error')
      throw new ResolutionError(serviceName, `XMPP service is not available for ${serviceName}`)
    }
    const usable = available.filter(hasValidPort)
    if (usable.length === 0) {
      logger?.addEvent(`${name} has no record with a valid port`, 'error')
      throw new ResolutionError(serviceName, `No usable SRV record for ${name}`)
    }

    const endpoints = orderSrvRecords(usable, random).map((r) => ({
      host: stripTrailingDot(r.target),
      port: r.port,
    }))
    logger?.addEvent(
      `Resolved ${name} to ${endpoints.map((e) => `${e.host}:${e.port}`).join(', ')}`,
      'connection'
    )
    return endpoints
  }

  logger?.addEvent(`Falling back to ${serviceName}:${XMPP_CLIENT_PORT}`, 'connection')
  return [{ host: serviceName, port: XMPP_CLIENT_PORT }]
}

/**
 * Resolve the preferred endpoint for a service name.
 *
 * Same lookup as {@link resolveEndpoints}, returning its first candidate.
 */
export async function resolveEndpoint(
  serviceName: string,
  options: ResolveOptions = {}
): Promise<HostAddress> {
  const [first] = await resolveEndpoints(serviceName, options)
  return first
}
