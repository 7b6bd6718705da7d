import type { ArchetypeId } from "../types"

export interface SectionSpec {
  key: string
  // heading text, decorated with an emoji
  title: string
  // plural noun used when reporting counts ("3 key insights")
  label: string
  // checklist sections render as unchecked to-dos instead of bullets
  style: "bullet" | "checklist"
}

export interface Archetype {
  id: ArchetypeId
  displayName: string
  description: string
  sections: readonly SectionSpec[]
}

/**
 * "project_problem_solving" -> "Project Problem Solving"
 */
export function toDisplayName(id: string): string {
  return id
    .split("_")
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ")
}

function defineArchetype(
  id: ArchetypeId,
  description: string,
  sections: SectionSpec[],
): Archetype {
  return Object.freeze({
    description,
    displayName: toDisplayName(id),
    id,
    sections: Object.freeze(sections.map((s) => Object.freeze(s))),
  })
}

export const ARCHETYPES: Readonly<Record<ArchetypeId, Archetype>> =
  Object.freeze({
    general_discussion: defineArchetype(
      "general_discussion",
      "General Q&A, casual chat, mixed topics, simple queries",
      [
        {
          key: "main_points",
          label: "main points",
          style: "bullet",
          title: "📌 Main Points",
        },
      ],
    ),
    idea_brainstorming: defineArchetype(
      "idea_brainstorming",
      "Exploring ideas, creative discussions, conceptual thinking, what-if scenarios",
      [
        {
          key: "core_ideas",
          label: "core ideas",
          style: "bullet",
          title: "💭 Core Ideas",
        },
        {
          key: "interesting_points",
          label: "interesting points",
          style: "bullet",
          title: "✨ Interesting Points",
        },
        {
          key: "follow_up_questions",
          label: "follow-up questions",
          style: "bullet",
          title: "🤔 Follow-up Questions",
        },
      ],
    ),
    learning_educational: defineArchetype(
      "learning_educational",
      "Learning new concepts, explanations, tutorials, deep dives into topics",
      [
        {
          key: "key_concepts",
          label: "key concepts",
          style: "bullet",
          title: "📚 Key Concepts",
        },
        {
          key: "examples",
          label: "examples",
          style: "bullet",
          title: "💡 Examples",
        },
        {
          key: "takeaways",
          label: "takeaways",
          style: "bullet",
          title: "🎯 Key Takeaways",
        },
      ],
    ),
    project_problem_solving: defineArchetype(
      "project_problem_solving",
      "Technical problem solving, debugging, building projects, implementation discussions",
      [
        {
          key: "key_insights",
          label: "key insights",
          style: "bullet",
          title: "💡 Key Insights",
        },
        {
          key: "decisions_made",
          label: "decisions",
          style: "bullet",
          title: "✅ Decisions Made",
        },
        {
          key: "action_items",
          label: "action items",
          style: "checklist",
          title: "📋 Action Items",
        },
      ],
    ),
  })

export const ARCHETYPE_IDS: readonly ArchetypeId[] = [
  "project_problem_solving",
  "idea_brainstorming",
  "learning_educational",
  "general_discussion",
]

export const FALLBACK_ARCHETYPE: Archetype = ARCHETYPES.general_discussion

export function isValidArchetype(name: string): name is ArchetypeId {
  return Object.hasOwn(ARCHETYPES, name)
}

/**
 * strict lookup used by every write path
 */
export function archetypeOf(name: string): Archetype | undefined {
  return isValidArchetype(name) ? ARCHETYPES[name] : undefined
}

/**
 * permissive lookup for advisory display: unknown names become general discussion
 */
export function archetypeForDisplay(name: string): Archetype {
  return archetypeOf(name) ?? FALLBACK_ARCHETYPE
}

export function isChecklistSection(archetype: Archetype, key: string): boolean {
  return archetype.sections.some(
    (section) => section.key === key && section.style === "checklist",
  )
}
