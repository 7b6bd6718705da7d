import { z } from "zod"
import { archetypeForDisplay } from "../../archetypes/registry"
import {
  parseClassification,
  parseJsonArgument,
} from "../../archetypes/schema"
import type { AppContext } from "../../server/context"
import { requireGateway, runTool } from "../helpers"

const inputSchema = z.object({
  classification: z
    .string()
    .describe(
      "Your classification of the conversation in JSON format with fields: " +
        "type (one of: project_problem_solving, idea_brainstorming, learning_educational, general_discussion), " +
        "confidence (high/medium/low), and reasoning (brief explanation).",
    ),
})

/**
 * advisory step: unknown types are shown as general discussion, nothing is written
 */
export const createClassifyTool = (ctx: AppContext) => ({
  description:
    "Classify the type of the current conversation. " +
    "Analyzes the conversation and returns the primary type: " +
    "project_problem_solving, idea_brainstorming, learning_educational, or general_discussion. " +
    "This should be called FIRST before creating Notion notes.",
  execute: async ({ classification }: z.infer<typeof inputSchema>) =>
    runTool(
      "classify_conversation",
      { classification },
      "classifying conversation",
      async () => {
        requireGateway(ctx)

        const parsed = parseClassification(
          parseJsonArgument("classification", classification),
        )
        const archetype = archetypeForDisplay(parsed.type)

        return (
          "✅ Conversation Classified!\n\n" +
          `📑 **Type**: ${archetype.displayName}\n` +
          `🎯 **Confidence**: ${parsed.confidence}\n` +
          `💭 **Reasoning**: ${parsed.reasoning}\n\n` +
          "This conversation will be structured with sections:\n" +
          `${archetype.sections.map((s) => s.key).join(", ")}\n\n` +
          `Use conversation_type "${archetype.id}" when creating the Notion page.`
        )
      },
    ),
  inputSchema,
})
