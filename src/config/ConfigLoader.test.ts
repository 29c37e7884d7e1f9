import { describe, it, expect, afterEach, vi } from 'vitest'
import { ConfigLoader } from './ConfigLoader'
import fs from 'fs'
import path from 'path'
import os from 'os'

describe('ConfigLoader', () => {
  const testConfigPath = path.join(os.tmpdir(), 'test-buildtrace.config.json')

  afterEach(() => {
    // Clean up test config file
    if (fs.existsSync(testConfigPath)) {
      fs.unlinkSync(testConfigPath)
    }
    vi.restoreAllMocks()
  })

  describe('config loading', () => {
    it('should load default config when no config file exists', () => {
      const loader = new ConfigLoader('/non/existent/path.json', {})
      const config = loader.getConfig()

      const dataDir = path.join(os.homedir(), '.buildtrace', 'data')
      expect(config.storage.dataDir).toBe(dataDir)
      expect(config.warehouse).toEqual({
        kind: 'jsonl',
        path: path.join(dataDir, 'metrics', 'job_results.jsonl'),
        url: undefined,
        timeoutMs: 5000,
      })
      expect(config.predecessor.strategy).toBe('decrement')
      expect(config.report.describer).toBe('geometry')
      expect(config.server).toEqual({ host: '0.0.0.0', port: 8080 })
    })

    it('should load and validate config from file', () => {
      const testConfig = {
        storage: { dataDir: '/srv/buildtrace' },
        warehouse: { kind: 'http', url: 'http://collector.test/rows', timeoutMs: 250 },
        predecessor: { strategy: 'last-known' },
        report: { describer: 'opaque' },
        server: { host: '127.0.0.1', port: 9090 },
      }

      fs.writeFileSync(testConfigPath, JSON.stringify(testConfig))
      const config = new ConfigLoader(testConfigPath, {}).getConfig()

      expect(config.storage.dataDir).toBe('/srv/buildtrace')
      expect(config.warehouse).toEqual({
        kind: 'http',
        path: path.join('/srv/buildtrace', 'metrics', 'job_results.jsonl'),
        url: 'http://collector.test/rows',
        timeoutMs: 250,
      })
      expect(config.predecessor.strategy).toBe('last-known')
      expect(config.report.describer).toBe('opaque')
      expect(config.server).toEqual({ host: '127.0.0.1', port: 9090 })
    })

    it('should apply defaults for missing config fields', () => {
      fs.writeFileSync(testConfigPath, JSON.stringify({ warehouse: { kind: 'none' } }))
      const config = new ConfigLoader(testConfigPath, {}).getConfig()

      expect(config.warehouse.kind).toBe('none')
      expect(config.warehouse.timeoutMs).toBe(5000) // default
      expect(config.predecessor.strategy).toBe('decrement') // default
    })

    it('should handle invalid JSON gracefully', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {})
      fs.writeFileSync(testConfigPath, 'invalid json {')
      const loader = new ConfigLoader(testConfigPath, {})
      expect(loader.getConfig().predecessor.strategy).toBe('decrement')
    })

    it('should handle invalid config schema gracefully', () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
      fs.writeFileSync(testConfigPath, JSON.stringify({ predecessor: { strategy: 'guess' } }))
      const loader = new ConfigLoader(testConfigPath, {})

      expect(loader.getConfig().predecessor.strategy).toBe('decrement')
      expect(consoleError).toHaveBeenCalledTimes(1)
    })
  })

  describe('environment overrides', () => {
    it('should prefer environment values over the file', () => {
      fs.writeFileSync(testConfigPath, JSON.stringify({ storage: { dataDir: '/from/file' } }))
      const config = new ConfigLoader(testConfigPath, {
        BUILDTRACE_DATA_DIR: '/from/env',
        PORT: '3001',
        HOST: 'localhost',
        BUILDTRACE_WAREHOUSE_URL: 'http://collector.test/ingest',
      }).getConfig()

      expect(config.storage.dataDir).toBe('/from/env')
      expect(config.warehouse.path).toBe(path.join('/from/env', 'metrics', 'job_results.jsonl'))
      expect(config.warehouse.kind).toBe('http')
      expect(config.warehouse.url).toBe('http://collector.test/ingest')
      expect(config.server).toEqual({ host: 'localhost', port: 3001 })
    })

    it('should ignore a PORT that is not a number', () => {
      const config = new ConfigLoader('/non/existent/path.json', { PORT: 'eighty' }).getConfig()
      expect(config.server.port).toBe(8080)
    })
  })

  it('should pick up file changes on reload', () => {
    fs.writeFileSync(testConfigPath, JSON.stringify({ report: { describer: 'opaque' } }))
    const loader = new ConfigLoader(testConfigPath, {})
    expect(loader.getConfig().report.describer).toBe('opaque')

    fs.writeFileSync(testConfigPath, JSON.stringify({ report: { describer: 'geometry' } }))
    loader.reloadConfig()
    expect(loader.getConfig().report.describer).toBe('geometry')
  })
})
