import { z } from "zod"
import type { AppContext } from "../../server/context"
import { readNote } from "../../store/query"
import { requireDatabase, requireNoteId, runTool } from "../helpers"

const inputSchema = z.object({
  note_id: z.string().describe("id or url of the note, as returned by search_notes"),
})

export const createReadNoteTool = (ctx: AppContext) => ({
  description: "Read the full content of a note as formatted text",
  execute: async ({ note_id }: z.infer<typeof inputSchema>) =>
    runTool("read_note", { note_id }, "reading note", async () => {
      const { gateway } = requireDatabase(ctx)
      return readNote(gateway, requireNoteId(note_id))
    }),
  inputSchema,
})
