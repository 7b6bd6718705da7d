import { z } from "zod"
import type { AppContext } from "../../server/context"
import type { ToolOutcome } from "../helpers"

const inputSchema = z.object({
  message: z.string().describe("a message to echo back"),
})

const mark = (configured: boolean) =>
  configured ? "✓ Configured" : "✗ Missing"

/**
 * echo plus configuration status; the only tool that works without a key
 */
export const createPingTool = (ctx: AppContext) => ({
  description: "Test tool to verify the MCP server is working correctly",
  execute: async ({
    message,
  }: z.infer<typeof inputSchema>): Promise<ToolOutcome> => {
    const { notion } = ctx.config
    const storage =
      notion.destination?.kind === "structured"
        ? "Database (structured records)"
        : notion.destination?.kind === "freestanding"
          ? "Page (freestanding documents)"
          : "Not configured"

    return {
      success: true,
      text:
        `🏓 Pong! You said: ${message}\n\n` +
        "✅ MCP Server is running!\n" +
        `📝 Notion API Key: ${mark(Boolean(notion.apiKey))}\n` +
        `📄 Parent Page ID: ${mark(Boolean(notion.parentPageId))}\n` +
        `🗄️ Database ID: ${mark(Boolean(notion.databaseId))}\n` +
        `💾 Storage: ${storage}`,
    }
  },
  inputSchema,
})
