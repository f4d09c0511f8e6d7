import {describe, expect, it} from 'vitest'

import {loadConfig} from '../config'

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({NODE_ENV: 'test'})).toEqual({
      nodeEnv: 'test',
      host: '0.0.0.0',
      port: 8181,
      metadataEndpoint: 'http://169.254.169.254',
      allowIpQuery: false,
      maxHandlerDurationMs: 5_000,
      forwarder: {total_timeout_ms: 10_000},
      logging: {level: 'silent'}
    })
  })

  it('defaults to development with info logging', () => {
    const config = loadConfig({})

    expect(config.nodeEnv).toBe('development')
    expect(config.logging.level).toBe('info')
  })

  it('parses explicit values', () => {
    const config = loadConfig({
      NODE_ENV: 'development',
      METADATA_GUARD_HOST: '127.0.0.1',
      METADATA_GUARD_PORT: '9090',
      METADATA_GUARD_METADATA_ENDPOINT: 'http://127.0.0.1:1338',
      METADATA_GUARD_ALLOW_IP_QUERY: 'true',
      METADATA_GUARD_MAX_HANDLER_DURATION_MS: '2500',
      METADATA_GUARD_FORWARDER_TIMEOUT_MS: '3000',
      METADATA_GUARD_LOG_LEVEL: 'debug',
      METADATA_GUARD_ROLE_MAP_PATH: ' /etc/metadata-guard/roles.json ',
      METADATA_GUARD_CREDENTIALS_URL: 'http://127.0.0.1:9000',
      METADATA_GUARD_CREDENTIALS_TIMEOUT_MS: '1500'
    })

    expect(config).toEqual({
      nodeEnv: 'development',
      host: '127.0.0.1',
      port: 9090,
      metadataEndpoint: 'http://127.0.0.1:1338',
      allowIpQuery: true,
      maxHandlerDurationMs: 2_500,
      forwarder: {total_timeout_ms: 3_000},
      logging: {level: 'debug'},
      roleMapPath: '/etc/metadata-guard/roles.json',
      credentials: {baseUrl: 'http://127.0.0.1:9000', timeoutMs: 1_500}
    })
  })

  it('treats blank optional values as unset', () => {
    const config = loadConfig({
      NODE_ENV: 'test',
      METADATA_GUARD_ROLE_MAP_PATH: '   ',
      METADATA_GUARD_CREDENTIALS_URL: ''
    })

    expect(config.roleMapPath).toBeUndefined()
    expect(config.credentials).toBeUndefined()
  })

  it('accepts 0 and 1 as booleans', () => {
    expect(loadConfig({NODE_ENV: 'test', METADATA_GUARD_ALLOW_IP_QUERY: '1'}).allowIpQuery).toBe(true)
    expect(loadConfig({NODE_ENV: 'test', METADATA_GUARD_ALLOW_IP_QUERY: '0'}).allowIpQuery).toBe(false)
  })

  it('refuses the identity override in production', () => {
    expect(() => loadConfig({NODE_ENV: 'production', METADATA_GUARD_ALLOW_IP_QUERY: 'true'})).toThrow(
      'METADATA_GUARD_ALLOW_IP_QUERY must not be enabled in production'
    )
  })

  it('rejects invalid values', () => {
    expect(() => loadConfig({NODE_ENV: 'test', METADATA_GUARD_METADATA_ENDPOINT: 'ftp://169.254.169.254'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', METADATA_GUARD_PORT: '70000'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', METADATA_GUARD_MAX_HANDLER_DURATION_MS: '0'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', METADATA_GUARD_ALLOW_IP_QUERY: 'yes'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', METADATA_GUARD_LOG_LEVEL: 'trace'})).toThrow()
  })
})
