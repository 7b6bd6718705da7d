export type LogLevel = "tool" | "result" | "http" | "error" | "info"

const ANSI_COLORS: Record<LogLevel, string> = {
  error: "\x1b[31m",
  http: "\x1b[34m",
  info: "\x1b[37m",
  result: "\x1b[32m",
  tool: "\x1b[36m",
}

const RESET = "\x1b[0m"

let verbose = false
let indentLevel = 0

// stdout carries the protocol stream, so every line goes to stderr
let sink: (line: string) => void = (line) => {
  process.stderr.write(line)
}

export function setVerbose(enabled: boolean) {
  verbose = enabled
}

/**
 * redirect log output; returns a function restoring the previous sink
 */
export function setLogSink(next: (line: string) => void): () => void {
  const previous = sink
  sink = next
  return () => {
    sink = previous
  }
}

function formatValue(value: unknown, maxLength = 100): string {
  if (value === null) return "null"
  if (value === undefined) return "undefined"

  if (typeof value === "string") {
    if (value.length > maxLength) {
      return `"${value.slice(0, maxLength)}..."`
    }
    return `"${value}"`
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return String(value)
  }

  if (Array.isArray(value)) {
    if (value.length === 0) return "[]"
    if (value.length > 5) return `[${value.length} items]`
    return JSON.stringify(value)
  }

  if (typeof value === "object") {
    const str = JSON.stringify(value)
    if (str.length > maxLength) {
      return `${str.slice(0, maxLength)}...`
    }
    return str
  }

  return String(value)
}

function formatParams(params: Record<string, unknown>): string {
  const parts = Object.entries(params).map(
    ([key, value]) => `${key}: ${formatValue(value)}`,
  )
  return `{ ${parts.join(", ")} }`
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>) {
  if (!verbose) return

  const fullMessage = data ? `${message} ${formatParams(data)}` : message
  const color = ANSI_COLORS[level]
  const indentStr = "  ".repeat(indentLevel)
  sink(`${indentStr}${color}[${level}]${RESET} ${fullMessage}\n`)
}

export function logTool(name: string, params: Record<string, unknown>) {
  log("tool", name, params)
  indentLevel = Math.min(indentLevel + 1, 5) // cap at 5 to prevent infinite indentation
}

export function logToolResult(result: unknown, durationMs: number) {
  indentLevel = Math.max(0, indentLevel - 1)

  if (!verbose) return

  const resultStr =
    typeof result === "object" && result !== null
      ? formatValue(result)
      : String(result)

  log("result", `${resultStr} (${durationMs.toFixed(0)}ms)`)
}

export function logHttp(route: string, status: number) {
  log("http", `${route} -> ${status}`)
}

export function logError(message: string, error?: unknown) {
  const errorStr =
    error instanceof Error ? error.message : error ? String(error) : ""
  log("error", errorStr ? `${message}: ${errorStr}` : message)
}

export function logInfo(message: string, data?: Record<string, unknown>) {
  log("info", message, data)
}

export async function timed<T>(
  level: LogLevel,
  description: string,
  fn: () => Promise<T>,
): Promise<T> {
  const start = performance.now()

  try {
    const result = await fn()
    const duration = performance.now() - start
    log(level, `${description} (${duration.toFixed(0)}ms)`)
    return result
  } catch (error) {
    const duration = performance.now() - start
    logError(`${description} failed after ${duration.toFixed(0)}ms`, error)
    throw error
  }
}
