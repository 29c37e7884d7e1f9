import fs from 'fs'
import path from 'path'
import os from 'os'
import { z } from 'zod'
import { BuildTraceConfig, BuildTraceConfigSchema, ParsedBuildTraceConfig } from '../contracts'

export class ConfigLoader {
  private static readonly CONFIG_NAMES = ['.buildtrace.config.json', 'buildtrace.config.json']

  private config: BuildTraceConfig

  constructor(
    private configPath?: string,
    private env: NodeJS.ProcessEnv = process.env
  ) {
    this.config = this.loadConfig()
  }

  static defaultDataDir(): string {
    return path.join(os.homedir(), '.buildtrace', 'data')
  }

  private findConfigFile(): string | null {
    // Start from current directory and walk up
    let currentDir = process.cwd()

    while (currentDir !== path.parse(currentDir).root) {
      for (const configName of ConfigLoader.CONFIG_NAMES) {
        const configPath = path.join(currentDir, configName)
        if (fs.existsSync(configPath)) {
          return configPath
        }
      }
      currentDir = path.dirname(currentDir)
    }

    return null
  }

  private readConfigFile(): ParsedBuildTraceConfig {
    const configPath = this.configPath ?? this.findConfigFile()

    if (!configPath || !fs.existsSync(configPath)) {
      return BuildTraceConfigSchema.parse({})
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      return BuildTraceConfigSchema.parse(JSON.parse(rawConfig))
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.error(`Invalid config at ${configPath}:`, error.errors)
      } else if (error instanceof SyntaxError) {
        console.error(`Invalid JSON in config file ${configPath}`)
      } else {
        console.error(`Error loading config from ${configPath}:`, error)
      }

      return BuildTraceConfigSchema.parse({})
    }
  }

  private loadConfig(): BuildTraceConfig {
    const parsed = this.readConfigFile()

    const dataDir = this.env.BUILDTRACE_DATA_DIR || parsed.storage.dataDir || ConfigLoader.defaultDataDir()

    const warehouse: BuildTraceConfig['warehouse'] = {
      kind: parsed.warehouse.kind,
      path: parsed.warehouse.path ?? path.join(dataDir, 'metrics', 'job_results.jsonl'),
      url: parsed.warehouse.url,
      timeoutMs: parsed.warehouse.timeoutMs,
    }
    if (this.env.BUILDTRACE_WAREHOUSE_URL) {
      warehouse.kind = 'http'
      warehouse.url = this.env.BUILDTRACE_WAREHOUSE_URL
    }

    const port = Number(this.env.PORT)

    return {
      storage: { dataDir },
      warehouse,
      predecessor: parsed.predecessor,
      report: parsed.report,
      server: {
        host: this.env.HOST || parsed.server.host,
        port: this.env.PORT && Number.isInteger(port) && port >= 0 ? port : parsed.server.port,
      },
    }
  }

  getConfig(): BuildTraceConfig {
    return this.config
  }

  reloadConfig(): void {
    this.config = this.loadConfig()
  }
}
