/**
 * Input schemas for settings construction.
 *
 * zod does the structural checks; {@link parseOrThrow} turns a failed parse
 * into an {@link InvalidConfigurationError} listing the offending fields.
 *
 * @module Core/Validation
 */

import { z } from 'zod'
import { InvalidConfigurationError } from './errors'

const notBlank = (value: string) => value.trim().length > 0

export const serviceNameSchema = z.string().refine(notBlank, 'Service name must not be empty')

export const hostSchema = z.string().refine(notBlank, 'Host must not be empty')

export const portSchema = z
  .number()
  .int('Port must be an integer')
  .min(1, 'Port must be between 1 and 65535')
  .max(65535, 'Port must be between 1 and 65535')

export const securityModeSchema = z.enum(['required', 'enabled', 'disabled'])

export const proxyDescriptorSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('none'),
    host: z.literal(''),
    port: z.literal(0),
    username: z.string().optional(),
    password: z.string().optional(),
  }),
  z.object({
    type: z.enum(['http', 'socks4', 'socks5']),
    host: hostSchema,
    port: portSchema,
    username: z.string().optional(),
    password: z.string().optional(),
  }),
])

export const credentialsSchema = z.object({
  username: z.string().min(1, 'Username must not be empty'),
  password: z.string(),
  resource: z.string().optional(),
})

export const endpointSchema = z.object({
  serviceName: serviceNameSchema,
  host: hostSchema,
  port: portSchema,
})

/**
 * Scalar fields accepted by `withSettings()`. Objects (proxy, socket factory,
 * credentials) are validated separately.
 */
export const settingsPatchSchema = z
  .object({
    serviceName: serviceNameSchema,
    host: hostSchema,
    port: portSchema,
    securityMode: securityModeSchema,
    trustStorePath: z.string(),
    trustStoreType: z.string().min(1),
    trustStorePassword: z.string(),
    keyStorePath: z.string(),
    keyStoreType: z.string().min(1),
    pkcs11LibraryPath: z.string(),
    verifyChain: z.boolean(),
    verifyRootCA: z.boolean(),
    acceptSelfSigned: z.boolean(),
    checkExpiry: z.boolean(),
    checkDomainMatch: z.boolean(),
    compressionEnabled: z.boolean(),
    saslEnabled: z.boolean(),
    sendPresence: z.boolean(),
    rosterLoadedAtLogin: z.boolean(),
  })
  .partial()

/**
 * Parse `input` with `schema`, throwing {@link InvalidConfigurationError} on failure.
 *
 * @param prefix - Field path prepended to every reported issue (e.g. `'proxy'`)
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  prefix?: string
): z.output<T> {
  const result = schema.safeParse(input)
  if (result.success) {
    return result.data
  }
  const issues = result.error.issues
  const fields = issues.map((issue) =>
    [prefix, ...issue.path.map(String)].filter(Boolean).join('.')
  )
  const detail = issues
    .map((issue, i) => (fields[i] ? `${fields[i]}: ${issue.message}` : issue.message))
    .join('; ')
  throw new InvalidConfigurationError(`Invalid connection configuration (${detail})`, fields)
}
