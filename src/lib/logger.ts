/**
 * Verbosity levels for CLI output
 *
 * -1 (silent):  Errors only
 *  0 (normal):  Standard output (default)
 *  1 (verbose): + API calls made, local files read/written
 *  2 (debug):   + Request bodies, response data
 *  3 (trace):   + Request timing, connection resolution
 */
export type VerbosityLevel = -1 | 0 | 1 | 2 | 3

export const VERBOSITY = {
  DEBUG: 2,
  NORMAL: 0,
  SILENT: -1,
  TRACE: 3,
  VERBOSE: 1,
} as const satisfies Record<string, VerbosityLevel>

const LEVELS: readonly VerbosityLevel[] = [-1, 0, 1, 2, 3]

function toLevel(value: number): undefined | VerbosityLevel {
  return LEVELS.find(level => level === value)
}

class Logger {
  private level: VerbosityLevel = VERBOSITY.NORMAL
  private timings: Map<string, { label: string; start: number }> = new Map()

  /**
   * Request sent to the dev API (level 1+)
   */
  apiCall(method: string, locator: string): void {
    if (this.level >= VERBOSITY.VERBOSE) {
      console.error(`  → ${method} ${locator}`)
    }
  }

  /**
   * Response received from the dev API (level 1+)
   */
  apiResponse(status: number, statusText: string, durationMs?: number): void {
    if (this.level >= VERBOSITY.VERBOSE) {
      const timing = durationMs === undefined ? '' : ` (${durationMs}ms)`
      console.error(`  ← ${status} ${statusText}${timing}`)
    }
  }

  /**
   * Where a connection setting came from (level 3+)
   */
  configResolution(source: string, value: unknown): void {
    if (this.level >= VERBOSITY.TRACE) {
      console.error(`      Config [${source}]: ${this.truncateJson(value, 100)}`)
    }
  }

  debug(...args: unknown[]): void {
    if (this.level >= VERBOSITY.DEBUG) {
      console.error('    [DEBUG]', ...args)
    }
  }

  /**
   * Always shown, even when silent
   */
  error(...args: unknown[]): void {
    console.error(...args)
  }

  fail(message: string): void {
    if (this.level >= VERBOSITY.NORMAL) {
      console.log(`✗ ${message}`)
    }
  }

  /**
   * Local file read or written (level 1+)
   */
  fileOp(operation: 'read' | 'write', filePath: string): void {
    if (this.level >= VERBOSITY.VERBOSE) {
      console.error(`  ${operation}: ${filePath}`)
    }
  }

  getLevel(): VerbosityLevel {
    return this.level
  }

  info(...args: unknown[]): void {
    if (this.level >= VERBOSITY.NORMAL) {
      console.log(...args)
    }
  }

  isEnabled(level: VerbosityLevel): boolean {
    return this.level >= level
  }

  requestBody(body: unknown): void {
    if (this.level >= VERBOSITY.DEBUG) {
      console.error(`    Body: ${this.truncateJson(body, 500)}`)
    }
  }

  responseData(data: unknown): void {
    if (this.level >= VERBOSITY.DEBUG) {
      console.error(`    Response: ${this.truncateJson(data, 500)}`)
    }
  }

  setLevel(level: VerbosityLevel): void {
    this.level = level
  }

  success(message: string): void {
    if (this.level >= VERBOSITY.NORMAL) {
      console.log(`✓ ${message}`)
    }
  }

  timeEnd(id: string): void {
    if (this.level >= VERBOSITY.TRACE) {
      const entry = this.timings.get(id)
      if (entry) {
        const duration = (performance.now() - entry.start).toFixed(2)
        console.error(`      ⏱ ${entry.label}: ${duration}ms`)
        this.timings.delete(id)
      }
    }
  }

  timeStart(id: string, label: string): void {
    if (this.level >= VERBOSITY.TRACE) {
      this.timings.set(id, { label, start: performance.now() })
    }
  }

  warn(...args: unknown[]): void {
    if (this.level >= VERBOSITY.NORMAL) {
      console.error('Warning:', ...args)
    }
  }

  private truncateJson(data: unknown, maxLength: number): string {
    const json = JSON.stringify(data) ?? String(data)
    if (json.length <= maxLength) return json
    return json.slice(0, maxLength) + '...'
  }
}

export const logger = new Logger()

/**
 * Resolve verbosity level
 * Priority: silent flag > verbose flag > env > config > default
 */
export function resolveVerbosity(
  flagVerbose?: number,
  flagSilent?: boolean,
  configVerbose?: number
): VerbosityLevel {
  if (flagSilent) {
    return VERBOSITY.SILENT
  }

  if (flagVerbose !== undefined && flagVerbose > 0) {
    return toLevel(Math.min(flagVerbose, 3)) ?? VERBOSITY.TRACE
  }

  // CDEV_DEBUG=1 or CDEV_VERBOSE=-1|0|1|2|3
  if (process.env.CDEV_DEBUG === '1' || process.env.CDEV_DEBUG === 'true') {
    return VERBOSITY.DEBUG
  }

  if (process.env.CDEV_VERBOSE) {
    const envLevel = toLevel(Number.parseInt(process.env.CDEV_VERBOSE, 10))
    if (envLevel !== undefined) {
      return envLevel
    }
  }

  if (configVerbose !== undefined) {
    const level = toLevel(configVerbose)
    if (level !== undefined) {
      return level
    }
  }

  return VERBOSITY.NORMAL
}
