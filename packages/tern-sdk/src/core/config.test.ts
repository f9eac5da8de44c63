import { describe, it, expect } from 'vitest'
import { DEFAULT_CA_BUNDLES, defaultKeyStorePath, defaultTrustStorePath } from './config'

describe('config', () => {
  describe('defaultTrustStorePath', () => {
    it('should use the platform CA bundle', () => {
      expect(defaultTrustStorePath({}, 'linux')).toBe('/etc/ssl/certs/ca-certificates.crt')
      expect(defaultTrustStorePath({}, 'darwin')).toBe('/etc/ssl/cert.pem')
      expect(defaultTrustStorePath({}, 'freebsd')).toBe('/usr/local/share/certs/ca-root-nss.crt')
    })

    it('should return an empty path on Windows and unknown platforms', () => {
      expect(defaultTrustStorePath({}, 'win32')).toBe('')
      expect(defaultTrustStorePath({}, 'aix')).toBe('')
    })

    it('should prefer TERN_CA_BUNDLE over SSL_CERT_FILE', () => {
      const env = { TERN_CA_BUNDLE: '/opt/tern/ca.pem', SSL_CERT_FILE: '/etc/pki/tls/cert.pem' }
      expect(defaultTrustStorePath(env, 'linux')).toBe('/opt/tern/ca.pem')
    })

    it('should honour SSL_CERT_FILE when TERN_CA_BUNDLE is unset or empty', () => {
      expect(defaultTrustStorePath({ SSL_CERT_FILE: '/etc/pki/tls/cert.pem' }, 'darwin')).toBe('/etc/pki/tls/cert.pem')
      expect(defaultTrustStorePath({ TERN_CA_BUNDLE: '', SSL_CERT_FILE: '/etc/pki/tls/cert.pem' }, 'linux')).toBe(
        '/etc/pki/tls/cert.pem'
      )
    })

    it('should keep every table entry reachable', () => {
      for (const [platform, path] of Object.entries(DEFAULT_CA_BUNDLES)) {
        expect(defaultTrustStorePath({}, platform)).toBe(path)
      }
    })
  })

  describe('defaultKeyStorePath', () => {
    it('should read TERN_KEYSTORE', () => {
      expect(defaultKeyStorePath({ TERN_KEYSTORE: '/opt/tern/client.p12' })).toBe('/opt/tern/client.p12')
    })

    it('should be empty when no key store is configured', () => {
      expect(defaultKeyStorePath({})).toBe('')
    })
  })
})
