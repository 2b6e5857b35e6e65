/**
 * Tests for `verdict serve`.
 */

import { describe, it, expect } from 'vitest'
import { join } from 'path'
import { tmpdir } from 'os'
import { buildServeOverrides, startServer } from '../serve.js'
import { ConfigError } from '../../../core/errors.js'

describe('buildServeOverrides', () => {
  it('returns an empty layer without flags', () => {
    expect(buildServeOverrides({})).toEqual({})
  })

  it('parses the port and keeps the host', () => {
    expect(buildServeOverrides({ port: '9100', host: '0.0.0.0' })).toEqual({
      server: { port: 9100, host: '0.0.0.0' },
    })
  })

  it.each(['http', '-1', '70000', '80.5'])('rejects port %j', (port) => {
    expect(() => buildServeOverrides({ port })).toThrow(new ConfigError(`Invalid port "${port}"`))
  })
})

describe('startServer', () => {
  it('listens on the requested interface and serves health', async () => {
    const missingDir = join(tmpdir(), `verdict-serve-missing-${Math.random().toString(36).slice(2)}`)
    const running = await startServer({
      port: '0',
      host: '127.0.0.1',
      version: '1.2.3',
      projectConfigDir: join(missingDir, 'project'),
      globalConfigDir: join(missingDir, 'global'),
    })

    try {
      expect(running.address.address).toBe('127.0.0.1')
      expect(running.address.port).toBeGreaterThan(0)
      const response = await fetch(`http://127.0.0.1:${String(running.address.port)}/health`)
      const body: unknown = await response.json()
      expect(body).toEqual({ status: 'ok', version: '1.2.3', sessions: 0 })
    } finally {
      await running.close()
    }
  })
})
