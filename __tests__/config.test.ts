/**
 * Tests for environment configuration.
 *
 * Source: src/config/config.ts, src/config/config.manager.ts
 */
import { parseEnv, parseFlag } from '../src/config/config'
import { buildAppConfig } from '../src/config/config.manager'
import { ConfigurationError } from '../src/errors/sync.errors'

const baseEnv = {
  SG_URL: 'https://sg.test.local/',
  SG_SCRIPT_NAME: 'test-script',
  SG_SCRIPT_KEY: 'test-secret',
  FMP_BASE_URL: 'https://fm.test.local',
  FMP_DATABASE: 'Editorial',
  FMP_LAYOUT: 'Plates',
}

describe('parseEnv()', () => {
  it('applies defaults', () => {
    const env = parseEnv(baseEnv)

    expect(env.NODE_ENV).toBe('development')
    expect(env.PORT).toBe(5000)
    expect(env.DEBUG).toBe(false)
    expect(env.SHOTGRID_TIMEOUT_MS).toBe(30000)
    expect(env.FILEMAKER_TIMEOUT_MS).toBe(30000)
    expect(env.LOG_LEVEL).toBe('info')
  })

  it('coerces numbers and flags', () => {
    const env = parseEnv({ ...baseEnv, PORT: '8080', DEBUG: 'Yes', FILEMAKER_TIMEOUT_MS: '1500' })

    expect(env.PORT).toBe(8080)
    expect(env.DEBUG).toBe(true)
    expect(env.FILEMAKER_TIMEOUT_MS).toBe(1500)
  })

  it('names the missing variables', () => {
    const { SG_SCRIPT_KEY: _omitted, ...partial } = baseEnv

    expect(() => parseEnv(partial)).toThrow(ConfigurationError)
    expect(() => parseEnv(partial)).toThrow(
      'Missing or invalid environment variables: SG_SCRIPT_KEY',
    )
  })

  it('rejects a malformed URL', () => {
    expect(() => parseEnv({ ...baseEnv, FMP_BASE_URL: 'not a url' })).toThrow('FMP_BASE_URL')
  })
})

describe('buildAppConfig()', () => {
  it('normalizes URLs and treats blank credentials as absent', () => {
    const config = buildAppConfig(parseEnv({ ...baseEnv, FMP_USER: '', FMP_PASSWORD: '' }))

    expect(config.shotgrid.url).toBe('https://sg.test.local')
    expect(config.filemaker.user).toBeUndefined()
    expect(config.filemaker.password).toBeUndefined()
  })

  it('is immutable', () => {
    const config = buildAppConfig(parseEnv(baseEnv))
    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.filemaker)).toBe(true)
  })
})

describe('parseFlag()', () => {
  it('only accepts the documented truthy spellings', () => {
    expect(parseFlag(' TRUE ')).toBe(true)
    expect(parseFlag('on')).toBe(false)
    expect(parseFlag(undefined)).toBe(false)
  })
})
