import { z } from "zod"
import { ValidationError } from "../errors"
import type { AnalysisRecord } from "../types"
import { ARCHETYPE_IDS, type Archetype, archetypeOf } from "./registry"

export const confidenceSchema = z.enum(["high", "medium", "low"])

const stringListSchema = z.array(z.string())

const analysisBaseSchema = z.object({
  summary: z.string().default(""),
  title: z
    .string()
    .trim()
    .min(1, "title must not be empty")
    .max(100, "title must be at most 100 characters"),
  topics: stringListSchema.default([]),
})

const sessionBaseSchema = analysisBaseSchema.extend({
  title: z.string().optional(),
})

// classification JSON as produced by the host agent; unknown types are kept
// as-is so the display step can coerce them
export const classificationSchema = z.object({
  confidence: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(confidenceSchema)
    .catch("medium"),
  reasoning: z.string().catch("No reasoning provided"),
  type: z.string().catch("general_discussion"),
})

export type Classification = z.infer<typeof classificationSchema>

/**
 * parse a JSON-encoded tool argument into a plain value
 */
export function parseJsonArgument(name: string, raw: string): unknown {
  try {
    return JSON.parse(raw)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ValidationError(`Failed to parse ${name} JSON.`, [reason])
  }
}

/**
 * strict archetype lookup for write paths
 */
export function requireArchetype(name: string): Archetype {
  const archetype = archetypeOf(name)
  if (!archetype) {
    throw new ValidationError(
      `Invalid conversation type '${name}'. Must be one of: ${ARCHETYPE_IDS.join(", ")}`,
    )
  }
  return archetype
}

function sectionsOf(
  archetype: Archetype,
  raw: Record<string, unknown>,
): Record<string, string[]> {
  const sections: Record<string, string[]> = {}
  const issues: string[] = []

  for (const section of archetype.sections) {
    const parsed = stringListSchema.default([]).safeParse(raw[section.key])
    if (parsed.success) {
      sections[section.key] = parsed.data
    } else {
      issues.push(`${section.key}: expected a list of strings`)
    }
  }

  if (issues.length > 0) {
    throw new ValidationError("Analysis does not match the schema.", issues)
  }
  return sections
}

function parseRecord(
  archetype: Archetype,
  value: unknown,
  requireTitle: boolean,
): AnalysisRecord {
  const objectResult = z.record(z.unknown()).safeParse(value)
  if (!objectResult.success) {
    throw new ValidationError("Analysis must be a JSON object.")
  }

  const base = requireTitle
    ? analysisBaseSchema.safeParse(objectResult.data)
    : sessionBaseSchema.safeParse(objectResult.data)
  if (!base.success) {
    throw ValidationError.fromZod(
      "Analysis does not match the schema.",
      base.error,
    )
  }

  return {
    sections: sectionsOf(archetype, objectResult.data),
    summary: base.data.summary,
    title: base.data.title ?? "",
    topics: base.data.topics,
  }
}

/**
 * validate the analysis for a new document; title is required
 */
export function parseAnalysis(
  archetype: Archetype,
  value: unknown,
): AnalysisRecord {
  return parseRecord(archetype, value, true)
}

/**
 * validate the analysis for an appended session; title may be omitted
 */
export function parseSessionAnalysis(
  archetype: Archetype,
  value: unknown,
): AnalysisRecord {
  return parseRecord(archetype, value, false)
}

export function parseClassification(value: unknown): Classification {
  const parsed = classificationSchema.safeParse(value)
  if (!parsed.success) {
    throw ValidationError.fromZod(
      "Classification does not match the schema.",
      parsed.error,
    )
  }
  return parsed.data
}

/**
 * JSON field template the host agent fills in for an archetype
 */
export function analysisTemplate(archetype: Archetype): Record<string, unknown> {
  // insertion order is the order the host sees
  const template: Record<string, unknown> = {}
  template.title = "string (max 100 chars)"
  template.summary = "string (2-3 sentences)"
  for (const section of archetype.sections) {
    template[section.key] = ["array of strings"]
  }
  template.topics = ["array of 3-5 keywords"]
  return template
}
