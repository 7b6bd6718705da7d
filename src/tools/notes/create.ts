import { z } from "zod"
import type { Archetype } from "../../archetypes/registry"
import {
  confidenceSchema,
  parseAnalysis,
  parseJsonArgument,
  requireArchetype,
} from "../../archetypes/schema"
import { compileDocument } from "../../blocks/compiler"
import { ValidationError } from "../../errors"
import type { AppContext } from "../../server/context"
import type { AnalysisRecord } from "../../types"
import { requireStore, runTool } from "../helpers"

const inputSchema = z.object({
  analysis: z
    .string()
    .describe(
      "Your structured analysis of the conversation in JSON format. " +
        "The fields should match the conversation_type:\n" +
        "- project_problem_solving: title, summary, key_insights, decisions_made, action_items, topics\n" +
        "- idea_brainstorming: title, summary, core_ideas, interesting_points, follow_up_questions, topics\n" +
        "- learning_educational: title, summary, key_concepts, examples, takeaways, topics\n" +
        "- general_discussion: title, summary, main_points, topics",
    ),
  confidence: confidenceSchema
    .optional()
    .describe("classification confidence, stored on database entries"),
  conversation_type: z
    .string()
    .describe(
      "The conversation type from classify_conversation. " +
        "Must be one of: project_problem_solving, idea_brainstorming, " +
        "learning_educational, general_discussion",
    ),
})

/**
 * "- 3 key insights" lines, one per archetype section
 */
export function describeSectionCounts(
  archetype: Archetype,
  analysis: AnalysisRecord,
): string {
  return archetype.sections
    .map(
      (section) =>
        `- ${analysis.sections[section.key]?.length ?? 0} ${section.label}`,
    )
    .join("\n")
}

export const createNotesTool = (ctx: AppContext) => ({
  description:
    "Create structured notes in Notion based on the classified conversation type. " +
    "This should be called AFTER classify_conversation. " +
    "Extracts relevant information and creates a well-organized Notion page.",
  execute: async ({
    analysis,
    confidence,
    conversation_type,
  }: z.infer<typeof inputSchema>) =>
    runTool(
      "create_notion_notes",
      { confidence, conversation_type },
      "creating Notion page",
      async () => {
        const store = requireStore(ctx)
        const archetype = requireArchetype(conversation_type)
        const record = parseAnalysis(
          archetype,
          parseJsonArgument("analysis", analysis),
        )

        const blocks = compileDocument(archetype, record)
        if (blocks.length === 0) {
          throw new ValidationError(
            "Analysis has no content: provide a summary, topics or at least one section item.",
          )
        }

        const ref = await store.create({
          archetype,
          blocks,
          confidence,
          title: record.title,
          topics: record.topics,
        })

        const savedTo =
          store.destination.kind === "structured"
            ? "Notes database"
            : "Notion page"

        return (
          "✅ Successfully created Notion page!\n\n" +
          `📄 **Title**: ${record.title}\n` +
          `📑 **Type**: ${archetype.displayName}\n` +
          `💾 **Saved to**: ${savedTo}\n` +
          `🔗 **URL**: ${ref.url}\n` +
          `🆔 **Page ID**: ${ref.id}\n\n` +
          "The page includes:\n" +
          describeSectionCounts(archetype, record)
        )
      },
    ),
  inputSchema,
})
