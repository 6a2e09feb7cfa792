import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import { loadServerConfig, parseServerConfig } from './config.js'
import { ConfigurationError } from './core/errors.js'

describe('parseServerConfig', () => {
  it('fills every section with defaults', () => {
    expect(parseServerConfig({})).toEqual({
      server: {
        host: '0.0.0.0',
        port: 8765,
        path: '/ws/detect',
        heartbeatIntervalMs: 15_000,
        maxPayloadBytes: 10 * 1024 * 1024,
        idleTimeoutMs: 0
      },
      windowing: {
        sampleRate: 16000,
        chunkDuration: 1.0,
        overlapDuration: 0.5,
        minDuration: 0.5,
        maxWindowDuration: 10
      },
      sessions: { duplicatePolicy: 'reject' },
      classifier: { baseUrl: 'http://127.0.0.1:8000', timeoutMs: 10_000, warmup: true },
      logging: { level: 'info' }
    })
  })

  it('keeps provided values next to defaults', () => {
    const config = parseServerConfig({ server: { port: 9000 }, sessions: { duplicatePolicy: 'replace' } })

    expect(config.server.port).toBe(9000)
    expect(config.server.path).toBe('/ws/detect')
    expect(config.sessions.duplicatePolicy).toBe('replace')
  })

  it('lists every invalid field', () => {
    expect(() => parseServerConfig({ windowing: { chunkDuration: 0.5, overlapDuration: 0.5 } })).toThrow(
      'invalid config in configuration: windowing.overlapDuration: overlapDuration must be smaller than chunkDuration'
    )
    expect(() => parseServerConfig({ sessions: { duplicatePolicy: 'queue' } })).toThrow(ConfigurationError)
    expect(() => parseServerConfig({ server: { path: 'ws' } })).toThrow('server.path: server.path must start with "/"')
    expect(() => parseServerConfig({ windowing: { chunkDuration: 12 } })).toThrow(
      'windowing.chunkDuration: chunkDuration must not exceed maxWindowDuration'
    )
  })
})

describe('loadServerConfig', () => {
  let dir: string | null = null

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true })
      dir = null
    }
  })

  it('uses defaults when no file exists', () => {
    dir = mkdtempSync(path.join(tmpdir(), 'detector-config-'))

    expect(loadServerConfig(dir).server.port).toBe(8765)
  })

  it('prefers the local override file', () => {
    dir = mkdtempSync(path.join(tmpdir(), 'detector-config-'))
    writeFileSync(path.join(dir, 'detector.config.json'), JSON.stringify({ server: { port: 9001 } }))
    writeFileSync(path.join(dir, 'detector.config.local.json'), JSON.stringify({ server: { port: 9002 } }))

    expect(loadServerConfig(dir).server.port).toBe(9002)
  })

  it('names the file that failed validation', () => {
    dir = mkdtempSync(path.join(tmpdir(), 'detector-config-'))
    const file = path.join(dir, 'detector.config.json')
    writeFileSync(file, JSON.stringify({ logging: { level: 'loud' } }))

    expect(() => loadServerConfig(dir ?? '')).toThrow(`invalid config in ${file}: logging.level:`)
  })
})
