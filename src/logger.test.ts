import { afterAll, afterEach, describe, expect, it } from "vitest"
import {
  logError,
  logInfo,
  logTool,
  logToolResult,
  setLogSink,
  setVerbose,
  timed,
} from "./logger"

describe("logger", () => {
  const lines: string[] = []
  const restore = setLogSink((line) => {
    lines.push(line)
  })

  afterAll(restore)

  afterEach(() => {
    lines.length = 0
    setVerbose(false)
  })

  it("stays quiet unless verbose", () => {
    logInfo("hidden")
    expect(lines).toEqual([])
  })

  it("indents nested tool calls", () => {
    setVerbose(true)
    logTool("search_notes", { query: "cache" })
    logInfo("inside")
    logToolResult("done", 3)

    expect(lines).toEqual([
      '\x1b[36m[tool]\x1b[0m search_notes { query: "cache" }\n',
      "  \x1b[37m[info]\x1b[0m inside\n",
      "\x1b[32m[result]\x1b[0m done (3ms)\n",
    ])
  })

  it("logs and rethrows failures from timed work", async () => {
    setVerbose(true)
    const failure = new Error("nope")

    await expect(
      timed("http", "GET /pages", async () => {
        throw failure
      }),
    ).rejects.toBe(failure)
    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatch(/ GET \/pages failed after \d+ms: nope\n$/)
  })

  it("formats errors without a cause", () => {
    setVerbose(true)
    logError("bare")
    expect(lines).toEqual(["\x1b[31m[error]\x1b[0m bare\n"])
  })
})
