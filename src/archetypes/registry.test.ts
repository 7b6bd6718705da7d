import { describe, expect, it } from "vitest"
import {
  ARCHETYPE_IDS,
  ARCHETYPES,
  archetypeForDisplay,
  archetypeOf,
  isChecklistSection,
  isValidArchetype,
  toDisplayName,
} from "./registry"

describe("archetype registry", () => {
  it("defines exactly the four archetypes", () => {
    expect([...ARCHETYPE_IDS].sort()).toEqual(Object.keys(ARCHETYPES).sort())
    expect(ARCHETYPE_IDS).toHaveLength(4)
  })

  it("derives display names from ids", () => {
    expect(toDisplayName("project_problem_solving")).toBe(
      "Project Problem Solving",
    )
    expect(ARCHETYPES.idea_brainstorming.displayName).toBe("Idea Brainstorming")
  })

  it("orders sections the way they are written", () => {
    expect(ARCHETYPES.project_problem_solving.sections.map((s) => s.key)).toEqual(
      ["key_insights", "decisions_made", "action_items"],
    )
    expect(ARCHETYPES.general_discussion.sections.map((s) => s.title)).toEqual([
      "📌 Main Points",
    ])
  })

  it("marks only action items as a checklist", () => {
    const project = ARCHETYPES.project_problem_solving
    expect(isChecklistSection(project, "action_items")).toBe(true)
    expect(isChecklistSection(project, "key_insights")).toBe(false)
    expect(isChecklistSection(ARCHETYPES.learning_educational, "action_items")).toBe(
      false,
    )
  })

  it("rejects unknown names on strict lookup", () => {
    expect(isValidArchetype("learning_educational")).toBe(true)
    expect(isValidArchetype("toString")).toBe(false)
    expect(archetypeOf("recipes")).toBeUndefined()
  })

  it("falls back to general discussion for display", () => {
    expect(archetypeForDisplay("recipes").id).toBe("general_discussion")
    expect(archetypeForDisplay("idea_brainstorming").id).toBe(
      "idea_brainstorming",
    )
  })

  it("is frozen", () => {
    expect(Object.isFrozen(ARCHETYPES)).toBe(true)
    expect(Object.isFrozen(ARCHETYPES.general_discussion.sections)).toBe(true)
  })
})
