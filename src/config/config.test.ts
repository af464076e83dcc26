import { describe, expect, it } from 'vitest'
import { ConfigError, loadConfig } from './index.js'

describe('loadConfig', () => {
  it('falls back to the defaults', () => {
    expect(loadConfig({})).toEqual({ host: '127.0.0.1', port: 8080, logLevel: 'info' })
  })

  it('reads the environment', () => {
    expect(loadConfig({ SERVER_HOST: '0.0.0.0', SERVER_PORT: '3000', LOG_LEVEL: 'warn' })).toEqual({
      host: '0.0.0.0',
      port: 3000,
      logLevel: 'warn',
    })
  })

  it('lists every invalid variable', () => {
    let caught: unknown
    try {
      loadConfig({ SERVER_PORT: '70000', LOG_LEVEL: 'verbose' })
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(ConfigError)
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(2)
      expect(caught.issues[0]).toBe('SERVER_PORT: must be 1-65535')
      expect(caught.issues[1]).toMatch(/^LOG_LEVEL: /)
    }
  })

  it('rejects a port that is not a number', () => {
    expect(() => loadConfig({ SERVER_PORT: 'http' })).toThrow('SERVER_PORT: must be a number')
  })
})
