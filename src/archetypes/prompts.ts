import { ARCHETYPE_IDS, ARCHETYPES, type Archetype } from "./registry"
import { analysisTemplate } from "./schema"

// instructions the host agent follows before calling classify_conversation
export const CLASSIFY_CONVERSATION_PROMPT = `Analyze this conversation and classify its type.

CONVERSATION TYPES:
${ARCHETYPE_IDS.map(
  (id, index) => `${index + 1}. **${id}**: ${ARCHETYPES[id].description}`,
).join("\n")}

Choose the PRIMARY type that best represents the conversation. If the conversation has mixed elements, choose the dominant one.

Return ONLY a valid JSON object with this structure:
{
  "type": "project_problem_solving",
  "confidence": "high",
  "reasoning": "Brief explanation of why this classification was chosen"
}

CONFIDENCE LEVELS:
- "high": Clearly fits one category
- "medium": Has elements of multiple types but one is dominant
- "low": Ambiguous or mixed, defaulting to best guess

IMPORTANT: Return ONLY the JSON object. No markdown, no code blocks, no extra text.`

export function buildClassifyPrompt(conversation: string): string {
  return `${CLASSIFY_CONVERSATION_PROMPT}\n\nCONVERSATION:\n${conversation}`
}

/**
 * extraction instructions with the archetype's JSON field template inlined
 */
export function buildExtractPrompt(
  archetype: Archetype,
  conversation: string,
): string {
  const schema = JSON.stringify(analysisTemplate(archetype), null, 2)

  return `Extract structured knowledge from this conversation based on its type.

CONVERSATION TYPE: ${archetype.id}

Return your analysis in this EXACT JSON format:

${schema}

GUIDELINES:
- Title should be specific and descriptive (max 100 chars)
- Summary should be 2-3 sentences capturing the essence
- Be concise but informative in all sections
- Use empty arrays [] for sections with no content
- Topics should be 3-5 relevant keywords for categorization
- Focus on substance over style

CRITICAL: Return ONLY valid JSON. No markdown, no code blocks, no explanatory text. Just the raw JSON object.

CONVERSATION:
${conversation}`
}
