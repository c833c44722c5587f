import { describe, expect, test } from 'vitest'
import { ValidationError } from './api-utils.js'
import {
  DEFAULT_CREDENTIALS_PATH,
  DEFAULT_TOKEN_PATH,
  loadEnvConfig,
  resolveDirectorySettings,
  resolveSyncSettings,
  type EnvConfig,
} from './config.js'

function env(vars: Record<string, string> = {}): EnvConfig {
  const result = loadEnvConfig(vars)
  if (result instanceof Error) throw result
  return result
}

describe('loadEnvConfig', () => {
  test('switches: any value enables, "off" spellings and empty disable', () => {
    const config = env({ CLEAR: '1', DELETE: 'false', DEBUG: '' })
    expect(config.CLEAR).toBe(true)
    expect(config.DELETE).toBe(false)
    expect(config.DEBUG).toBe(false)
  })

  test('interval and comma lists', () => {
    const config = env({ INTERVAL: '30m', CONFLUENCE_CALENDARS: 'Team A, Team B,,' })
    expect(config.INTERVAL).toBe(30 * 60_000)
    expect(config.CONFLUENCE_CALENDARS).toEqual(['Team A', 'Team B'])
  })

  test('invalid values are a ValidationError naming the variable', () => {
    const result = loadEnvConfig({ INTERVAL: 'soon' })
    expect(result).toBeInstanceOf(ValidationError)
    expect(result instanceof Error && result.message).toBe(
      'Invalid environment variable INTERVAL: expected a duration such as 90, 30m, 2h or 1d',
    )
  })

  test('STORE_TIMEOUT must be a positive integer', () => {
    expect(loadEnvConfig({ STORE_TIMEOUT: '-4' })).toBeInstanceOf(ValidationError)
    expect(env({ STORE_TIMEOUT: '10' }).STORE_TIMEOUT).toBe(10)
  })
})

describe('resolveSyncSettings', () => {
  test('defaults', () => {
    expect(resolveSyncSettings({}, env())).toEqual({
      clear: false,
      deleteFringe: false,
      ignoreRevision: false,
      dryRun: false,
      includePast: false,
      intervalMs: null,
      debug: false,
      credentialsPath: DEFAULT_CREDENTIALS_PATH,
      tokenPath: DEFAULT_TOKEN_PATH,
      storeTimeoutMs: 30_000,
    })
  })

  test('flags win over the environment', () => {
    const settings = resolveSyncSettings(
      { proxy: 'http://proxy.test:3128', delete: false, interval: '2h', token: '/tmp/token.json', storeTimeout: 5 },
      env({ PROXY: 'http://other.test:8080', DELETE: '1', INTERVAL: '90', TOKEN_PATH: '/config/token' }),
    )
    if (settings instanceof Error) throw settings
    expect(settings.proxy).toBe('http://proxy.test:3128')
    expect(settings.deleteFringe).toBe(false)
    expect(settings.intervalMs).toBe(2 * 60 * 60_000)
    expect(settings.tokenPath).toBe('/tmp/token.json')
    expect(settings.storeTimeoutMs).toBe(5000)
  })

  test('environment fills in missing flags', () => {
    const settings = resolveSyncSettings({}, env({ ICS_USERNAME: 'reader', ICS_PASSWORD: 'test-secret', INTERVAL: '90' }))
    if (settings instanceof Error) throw settings
    expect(settings.feedAuth).toEqual({ username: 'reader', password: 'test-secret' })
    expect(settings.intervalMs).toBe(90_000)
  })

  test('rejects a bad interval, a bad proxy and half credentials', () => {
    expect(resolveSyncSettings({ interval: '0' }, env())).toBeInstanceOf(ValidationError)
    expect(resolveSyncSettings({ proxy: 'not a url' }, env())).toBeInstanceOf(ValidationError)
    const half = resolveSyncSettings({ username: 'reader' }, env())
    expect(half instanceof Error && half.message).toBe(
      'Invalid --username/--password: both are required for feed authentication',
    )
  })
})

describe('resolveDirectorySettings', () => {
  test('base URL is required', () => {
    const result = resolveDirectorySettings({}, env())
    expect(result instanceof Error && result.message).toBe('Invalid --confluence-url: required (or set CONFLUENCE_URL)')
  })

  test('flags over env, trailing slash dropped', () => {
    const settings = resolveDirectorySettings(
      { confluenceUrl: 'https://wiki.test/', calendar: ['Ops'] },
      env({
        CONFLUENCE_USERNAME: 'reader',
        CONFLUENCE_PASSWORD: 'test-secret',
        CONFLUENCE_CALENDAR_PREFIX: 'Wiki: ',
        CONFLUENCE_CALENDARS: 'Team A,Team B',
      }),
    )
    expect(settings).toEqual({
      baseUrl: 'https://wiki.test',
      auth: { username: 'reader', password: 'test-secret' },
      prefix: 'Wiki: ',
      calendars: ['Ops'],
    })
  })
})
