import { z } from "zod"
import { requireArchetype } from "../../archetypes/schema"
import type { AppContext } from "../../server/context"
import {
  DEFAULT_SEARCH_LIMIT,
  formatSearchResults,
  MAX_SEARCH_LIMIT,
  searchNotes,
} from "../../store/query"
import { requireDatabase, runTool } from "../helpers"

const inputSchema = z.object({
  conversation_type: z
    .string()
    .optional()
    .describe("only return notes of this conversation type"),
  limit: z
    .number()
    .int()
    .optional()
    .describe(
      `max notes to fetch (default ${DEFAULT_SEARCH_LIMIT}, at most ${MAX_SEARCH_LIMIT})`,
    ),
  query: z
    .string()
    .describe("keyword matched against note titles and topics; empty lists all"),
})

export const createSearchNotesTool = (ctx: AppContext) => ({
  description:
    "Search notes in the Notion database by keyword (title or topics), " +
    "newest first. Only the most recent page of results is searched.",
  execute: async ({
    conversation_type,
    limit,
    query,
  }: z.infer<typeof inputSchema>) =>
    runTool(
      "search_notes",
      { conversation_type, limit, query },
      "searching notes",
      async () => {
        const { databaseId, gateway } = requireDatabase(ctx)
        const archetype = conversation_type
          ? requireArchetype(conversation_type)
          : undefined

        const results = await searchNotes(gateway, databaseId, {
          archetype,
          limit,
          query,
        })
        return formatSearchResults(results, query)
      },
    ),
  inputSchema,
})
