import { describe, expect, it } from "vitest"
import { ARCHETYPES } from "../archetypes/registry"
import { compileDocument } from "../blocks/compiler"
import { FakeNotion } from "../testing/fake-notion"
import { createTestGateway, TEST_DATABASE_ID } from "../testing/context"
import { StructuredStore } from "./persistence"
import {
  buildSearchQuery,
  clampSearchLimit,
  formatSearchResults,
  matchesKeyword,
  readNote,
  searchNotes,
} from "./query"

function seedNotes(fake: FakeNotion) {
  fake.seedRecord(TEST_DATABASE_ID, {
    date: "2026-09-01",
    title: "Alpha caching notes",
    topics: ["cache"],
    type: "Learning Educational",
  })
  fake.seedRecord(TEST_DATABASE_ID, {
    date: "2026-10-02",
    title: "Build pipeline",
    topics: ["ci", "cache"],
    type: "Project Problem Solving",
  })
  fake.seedRecord(TEST_DATABASE_ID, {
    date: "2026-10-03",
    title: "Weekend ideas",
    topics: [],
    type: "Idea Brainstorming",
  })
}

describe("clampSearchLimit", () => {
  it("defaults to 10 and caps at 20", () => {
    expect(clampSearchLimit(undefined)).toBe(10)
    expect(clampSearchLimit(50)).toBe(20)
    expect(clampSearchLimit(-3)).toBe(1)
  })
})

describe("buildSearchQuery", () => {
  it("filters on the archetype's display name, newest first", () => {
    expect(buildSearchQuery(ARCHETYPES.learning_educational, 5)).toEqual({
      filter: { property: "Type", select: { equals: "Learning Educational" } },
      pageSize: 5,
      sorts: [{ direction: "descending", property: "Date" }],
    })
  })
})

describe("matchesKeyword", () => {
  const result = {
    date: "2026-10-02",
    id: "x",
    status: "New",
    title: "Build pipeline",
    topics: "ci, cache",
    type: "Project Problem Solving",
    url: "",
  }

  it("matches titles and topics case-insensitively", () => {
    expect(matchesKeyword(result, "PIPE")).toBe(true)
    expect(matchesKeyword(result, "cache")).toBe(true)
    expect(matchesKeyword(result, "docker")).toBe(false)
  })

  it("treats an empty query as a match", () => {
    expect(matchesKeyword(result, "  ")).toBe(true)
  })
})

describe("searchNotes", () => {
  it("returns newest first and filters by keyword", async () => {
    const fake = new FakeNotion()
    seedNotes(fake)

    const results = await searchNotes(createTestGateway(fake), TEST_DATABASE_ID, {
      query: "cache",
    })

    expect(results.map((r) => r.title)).toEqual([
      "Build pipeline",
      "Alpha caching notes",
    ])
  })

  it("sends the type filter to the database", async () => {
    const fake = new FakeNotion()
    seedNotes(fake)

    const results = await searchNotes(createTestGateway(fake), TEST_DATABASE_ID, {
      archetype: ARCHETYPES.idea_brainstorming,
      query: "",
    })

    expect(fake.requests[0]?.body).toEqual({
      filter: { property: "Type", select: { equals: "Idea Brainstorming" } },
      page_size: 10,
      sorts: [{ direction: "descending", property: "Date" }],
    })
    expect(results.map((r) => r.title)).toEqual(["Weekend ideas"])
  })

  it("only sees the page the query returned", async () => {
    const fake = new FakeNotion()
    seedNotes(fake)
    const gateway = createTestGateway(fake)

    const narrow = await searchNotes(gateway, TEST_DATABASE_ID, {
      limit: 2,
      query: "alpha",
    })
    const wide = await searchNotes(gateway, TEST_DATABASE_ID, {
      limit: 3,
      query: "alpha",
    })

    expect(narrow).toEqual([])
    expect(wide.map((r) => r.title)).toEqual(["Alpha caching notes"])
  })
})

describe("readNote", () => {
  it("reads back what was created", async () => {
    const fake = new FakeNotion()
    const gateway = createTestGateway(fake)
    const analysis = {
      sections: { main_points: ["First point", "Second point"] },
      summary: "A short chat.",
      title: "Coffee chat",
      topics: [],
    }
    const ref = await new StructuredStore(gateway, TEST_DATABASE_ID).create({
      archetype: ARCHETYPES.general_discussion,
      blocks: compileDocument(ARCHETYPES.general_discussion, analysis),
      title: analysis.title,
    })

    expect(await readNote(gateway, ref.id)).toBe(
      [
        "# Coffee chat",
        "",
        "> A short chat.",
        "",
        "## 📌 Main Points",
        "- First point",
        "- Second point",
      ].join("\n"),
    )
  })
})

describe("formatSearchResults", () => {
  it("reports an empty search", () => {
    expect(formatSearchResults([], " docker ")).toBe(
      '🔍 No notes found matching "docker".',
    )
    expect(formatSearchResults([], "")).toBe("🔍 No notes found.")
  })

  it("numbers each result", () => {
    expect(
      formatSearchResults(
        [
          {
            date: "2026-10-03",
            id: "abc",
            status: "New",
            title: "Weekend ideas",
            topics: "",
            type: "Idea Brainstorming",
            url: "https://www.notion.so/abc",
          },
        ],
        "",
      ),
    ).toBe(
      [
        "🔍 Found 1 note(s):",
        "",
        "1. **Weekend ideas**",
        "   📑 Type: Idea Brainstorming",
        "   📅 Date: 2026-10-03",
        "   🏷️ Topics: None",
        "   📊 Status: New",
        "   🆔 ID: abc",
        "   🔗 https://www.notion.so/abc",
      ].join("\n"),
    )
  })
})
