import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js"
import { z } from "zod"
import {
  buildClassifyPrompt,
  buildExtractPrompt,
} from "../archetypes/prompts"
import { archetypeForDisplay } from "../archetypes/registry"
import { logInfo } from "../logger"
import type { NoteTool, ToolOutcome } from "../tools/helpers"
import { createNoteTools } from "../tools/notes"
import { SERVER_NAME, VERSION } from "../version"
import type { AppContext } from "./context"

export function toCallToolResult(outcome: ToolOutcome): CallToolResult {
  return outcome.success
    ? { content: [{ text: outcome.text, type: "text" }] }
    : { content: [{ text: outcome.error, type: "text" }], isError: true }
}

function registerNoteTool<S extends z.AnyZodObject>(
  server: McpServer,
  name: string,
  tool: NoteTool<S>,
) {
  server.registerTool(
    name,
    { description: tool.description, inputSchema: tool.inputSchema.shape },
    async (args: unknown) =>
      toCallToolResult(await tool.execute(tool.inputSchema.parse(args))),
  )
}

function registerPrompts(server: McpServer) {
  server.registerPrompt(
    "classify_conversation",
    {
      argsSchema: {
        conversation: z.string().describe("the conversation transcript"),
      },
      description:
        "Instructions for classifying a conversation before classify_conversation",
    },
    ({ conversation }) => ({
      messages: [
        {
          content: { text: buildClassifyPrompt(conversation), type: "text" },
          role: "user",
        },
      ],
    }),
  )

  server.registerPrompt(
    "extract_conversation",
    {
      argsSchema: {
        conversation: z.string().describe("the conversation transcript"),
        conversation_type: z
          .string()
          .describe("type returned by classify_conversation"),
      },
      description:
        "Instructions for extracting the analysis JSON passed to create_notion_notes",
    },
    ({ conversation, conversation_type }) => ({
      messages: [
        {
          content: {
            text: buildExtractPrompt(
              archetypeForDisplay(conversation_type),
              conversation,
            ),
            type: "text",
          },
          role: "user",
        },
      ],
    }),
  )
}

/**
 * create the protocol server with every tool and prompt registered
 */
export function createMcpServer(ctx: AppContext): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: VERSION })
  const tools = createNoteTools(ctx)

  registerNoteTool(server, "ping", tools.ping)
  registerNoteTool(server, "classify_conversation", tools.classify_conversation)
  registerNoteTool(server, "create_notion_notes", tools.create_notion_notes)
  registerNoteTool(server, "update_notion_notes", tools.update_notion_notes)
  registerNoteTool(server, "update_note_status", tools.update_note_status)
  registerNoteTool(server, "search_notes", tools.search_notes)
  registerNoteTool(server, "read_note", tools.read_note)

  registerPrompts(server)
  return server
}

/**
 * serve over stdio until the host closes the stream
 */
export async function startServer(ctx: AppContext): Promise<McpServer> {
  const server = createMcpServer(ctx)
  const transport = new StdioServerTransport()
  await server.connect(transport)

  logInfo("server ready", {
    destination: ctx.config.notion.destination?.kind ?? "none",
    version: VERSION,
  })
  return server
}
