import {
  type Archetype,
  archetypeOf,
  FALLBACK_ARCHETYPE,
  isChecklistSection,
} from "../archetypes/registry"
import type { AnalysisRecord, ContentBlock } from "../types"
import {
  bullet,
  callout,
  divider,
  heading,
  paragraph,
  SUMMARY_ICON,
  TOPICS_ICON,
  todo,
} from "./builders"

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const

/**
 * day-precision date used in update headers, e.g. "October 05, 2026"
 */
export function formatUpdateDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, "0")
  return `${MONTHS[date.getMonth()]} ${day}, ${date.getFullYear()}`
}

// accepts an archetype id so a stale id still compiles to something renderable
function layoutFor(archetype: Archetype | string): Archetype {
  if (typeof archetype !== "string") return archetype
  return archetypeOf(archetype) ?? FALLBACK_ARCHETYPE
}

/**
 * heading, one block per item, blank separator; empty sections emit nothing
 */
export function compileSections(
  archetype: Archetype | string,
  analysis: AnalysisRecord,
): ContentBlock[] {
  const layout = layoutFor(archetype)
  const blocks: ContentBlock[] = []

  for (const section of layout.sections) {
    const items = analysis.sections[section.key] ?? []
    if (items.length === 0) continue

    const checklist = isChecklistSection(layout, section.key)
    blocks.push(heading(section.title, 2))
    for (const item of items) {
      blocks.push(checklist ? todo(item, false) : bullet(item))
    }
    blocks.push(paragraph())
  }

  return blocks
}

/**
 * full block layout for a new document
 */
export function compileDocument(
  archetype: Archetype | string,
  analysis: AnalysisRecord,
): ContentBlock[] {
  const blocks: ContentBlock[] = []

  if (analysis.summary) {
    blocks.push(callout(analysis.summary, SUMMARY_ICON), paragraph())
  }

  if (analysis.topics.length > 0) {
    blocks.push(
      callout(`Topics: ${analysis.topics.join(", ")}`, TOPICS_ICON),
      paragraph(),
    )
  }

  blocks.push(...compileSections(archetype, analysis))
  return blocks
}

/**
 * blocks appended to an existing document for a follow-up session
 *
 * the session number is reserved for numbering session headers and does not
 * change the output yet.
 */
export function compileUpdate(
  archetype: Archetype | string,
  analysis: AnalysisRecord,
  _sessionNumber = 2,
  now: Date = new Date(),
): ContentBlock[] {
  return [
    divider(),
    paragraph(),
    heading(`Update - ${formatUpdateDate(now)}`, 2),
    paragraph(),
    ...compileSections(archetype, analysis),
  ]
}
