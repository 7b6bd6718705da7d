import type { AppContext } from "../../server/context"
import { createClassifyTool } from "./classify"
import { createNotesTool } from "./create"
import { createPingTool } from "./ping"
import { createReadNoteTool } from "./read"
import { createSearchNotesTool } from "./search"
import { createUpdateNotesTool, createUpdateStatusTool } from "./update"

/**
 * create all note tools with the given context
 */
export function createNoteTools(ctx: AppContext) {
  return {
    classify_conversation: createClassifyTool(ctx),
    create_notion_notes: createNotesTool(ctx),
    ping: createPingTool(ctx),
    read_note: createReadNoteTool(ctx),
    search_notes: createSearchNotesTool(ctx),
    update_note_status: createUpdateStatusTool(ctx),
    update_notion_notes: createUpdateNotesTool(ctx),
  }
}
