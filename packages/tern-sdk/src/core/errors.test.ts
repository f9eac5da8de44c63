import { describe, it, expect } from 'vitest'
import { InvalidConfigurationError, ProxyConnectError, ResolutionError, TernError, isTernError } from './errors'

describe('errors', () => {
  it('should expose distinct names and codes', () => {
    const resolution = new ResolutionError('example.com', 'lookup failed')
    const invalid = new InvalidConfigurationError('bad port', ['port'])
    const proxy = new ProxyConnectError('no connector')

    expect(resolution).toMatchObject({ name: 'ResolutionError', code: 'RESOLUTION_FAILED', serviceName: 'example.com' })
    expect(invalid).toMatchObject({ name: 'InvalidConfigurationError', code: 'INVALID_CONFIGURATION', fields: ['port'] })
    expect(proxy).toMatchObject({ name: 'ProxyConnectError', code: 'PROXY_UNAVAILABLE' })
  })

  it('should keep the underlying cause', () => {
    const cause = new Error('querySrv ESERVFAIL')
    expect(new ResolutionError('example.com', 'lookup failed', { cause }).cause).toBe(cause)
  })

  it('should recognise SDK errors', () => {
    expect(isTernError(new InvalidConfigurationError('bad port'))).toBe(true)
    expect(isTernError(new TernError('other', 'PROXY_UNAVAILABLE'))).toBe(true)
    expect(isTernError(new Error('plain'))).toBe(false)
    expect(isTernError('RESOLUTION_FAILED')).toBe(false)
  })

  it('should default to no offending fields', () => {
    expect(new InvalidConfigurationError('bad input').fields).toEqual([])
  })
})
