import { appendFileSync, mkdirSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'

// Debug logging - only enabled when BUILDTRACE_DEBUG environment variable is set
const DEBUG = process.env.BUILDTRACE_DEBUG === 'true' || process.env.BUILDTRACE_DEBUG === '1'

export const debugLog = (message: Record<string, unknown>): void => {
  if (!DEBUG) return

  const buildtraceDir = join(homedir(), '.buildtrace')
  const logPath = join(buildtraceDir, 'debug.log')

  // Ensure directory exists
  mkdirSync(buildtraceDir, { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}
