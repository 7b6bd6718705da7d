import { z } from "zod"
import {
  parseJsonArgument,
  parseSessionAnalysis,
  requireArchetype,
} from "../../archetypes/schema"
import { compileSections, compileUpdate } from "../../blocks/compiler"
import { ValidationError } from "../../errors"
import type { AppContext } from "../../server/context"
import { requireNoteId, requireStore, runTool } from "../helpers"
import { describeSectionCounts } from "./create"

const updateNotesInputSchema = z.object({
  analysis: z
    .string()
    .describe(
      "structured analysis of the new session in JSON format, with the same " +
        "section fields as create_notion_notes (title is optional)",
    ),
  conversation_type: z
    .string()
    .describe("conversation type of the new session"),
  note_id: z.string().describe("id or url of the existing Notion page"),
  session_number: z
    .number()
    .int()
    .positive()
    .default(2)
    .describe("which session this is; reserved for numbered headers"),
})

/**
 * append a dated session to an existing note; never rewrites earlier content
 */
export const createUpdateNotesTool = (ctx: AppContext) => ({
  description:
    "Append a new dated session to an existing Notion note. " +
    "Adds a divider, an 'Update - <date>' heading and the new sections; " +
    "existing content is left untouched. Calling it twice appends twice.",
  execute: async ({
    analysis,
    conversation_type,
    note_id,
    session_number,
  }: z.infer<typeof updateNotesInputSchema>) =>
    runTool(
      "update_notion_notes",
      { conversation_type, note_id, session_number },
      "updating Notion page",
      async () => {
        const store = requireStore(ctx)
        const archetype = requireArchetype(conversation_type)
        const record = parseSessionAnalysis(
          archetype,
          parseJsonArgument("analysis", analysis),
        )

        if (compileSections(archetype, record).length === 0) {
          throw new ValidationError(
            "Analysis has no new section items to append.",
          )
        }

        const pageId = requireNoteId(note_id)
        const blocks = compileUpdate(
          archetype,
          record,
          session_number,
          ctx.now(),
        )
        await store.append(pageId, blocks)

        return (
          "✅ Successfully appended update to Notion page!\n\n" +
          `🆔 **Page ID**: ${pageId}\n` +
          `🧱 **Blocks added**: ${blocks.length}\n\n` +
          "The update includes:\n" +
          describeSectionCounts(archetype, record)
        )
      },
    ),
  inputSchema: updateNotesInputSchema,
})

const updateStatusInputSchema = z.object({
  note_id: z.string().describe("id or url of the database entry"),
  status: z
    .string()
    .trim()
    .min(1)
    .describe("new lifecycle status, e.g. 'In Progress' or 'Done'"),
})

export const createUpdateStatusTool = (ctx: AppContext) => ({
  description:
    "Change the Status property of a note stored in the notes database. " +
    "Only available when NOTION_DATABASE_ID is configured.",
  execute: async ({
    note_id,
    status,
  }: z.infer<typeof updateStatusInputSchema>) =>
    runTool(
      "update_note_status",
      { note_id, status },
      "updating note status",
      async () => {
        const store = requireStore(ctx)
        const pageId = requireNoteId(note_id)
        await store.updateAttributes(pageId, { status })
        return `✅ Status of ${pageId} set to "${status}".`
      },
    ),
  inputSchema: updateStatusInputSchema,
})
