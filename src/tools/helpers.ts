import type { z } from "zod"
import { normalizeNotionId } from "../config/defaults"
import {
  ConfigurationError,
  formatToolError,
  ValidationError,
} from "../errors"
import { logError, logTool, logToolResult } from "../logger"
import type { NotionGateway } from "../notion/client"
import type { AppContext } from "../server/context"
import type { KnowledgeStore } from "../store/persistence"

export type ToolOutcome =
  | { success: true; text: string }
  | { success: false; error: string }

export interface NoteTool<S extends z.AnyZodObject> {
  description: string
  inputSchema: S
  execute: (input: z.infer<S>) => Promise<ToolOutcome>
}

/**
 * run a tool body with logging; any thrown error becomes an error outcome
 */
export async function runTool(
  name: string,
  params: Record<string, unknown>,
  errorContext: string,
  body: () => Promise<string>,
): Promise<ToolOutcome> {
  logTool(name, params)
  const start = performance.now()

  try {
    const text = await body()
    logToolResult({ chars: text.length }, performance.now() - start)
    return { success: true, text }
  } catch (error) {
    logError(`${name} failed`, error)
    logToolResult({ error: "failed" }, performance.now() - start)
    return { error: formatToolError(error, errorContext), success: false }
  }
}

export function requireGateway(ctx: AppContext): NotionGateway {
  if (!ctx.gateway) throw new ConfigurationError("missing-credential")
  return ctx.gateway
}

/**
 * the configured backend, or the reason there is none
 */
export function requireStore(ctx: AppContext): KnowledgeStore {
  requireGateway(ctx)
  if (!ctx.store) throw new ConfigurationError("missing-destination")
  return ctx.store
}

export function requireDatabase(ctx: AppContext): {
  gateway: NotionGateway
  databaseId: string
} {
  const gateway = requireGateway(ctx)
  const { databaseId } = ctx.config.notion
  if (!databaseId) throw new ConfigurationError("missing-database")
  return { databaseId, gateway }
}

const NOTION_ID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/

/**
 * dashed page id from a host-supplied id or url; anything else is rejected
 */
export function requireNoteId(raw: string): string {
  const id = normalizeNotionId(raw)
  if (!NOTION_ID_PATTERN.test(id)) {
    throw new ValidationError(`Invalid note id '${raw.trim()}'.`, [
      "expected a Notion page id (32 hex characters) or page URL",
    ])
  }
  return id
}
