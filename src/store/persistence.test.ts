import { describe, expect, it } from "vitest"
import { ARCHETYPES } from "../archetypes/registry"
import { UnsupportedOperationError } from "../errors"
import { FakeNotion } from "../testing/fake-notion"
import {
  createTestGateway,
  TEST_DATABASE_ID,
  TEST_NOW,
} from "../testing/context"
import type { ContentBlock } from "../types"
import {
  createKnowledgeStore,
  FreestandingStore,
  StructuredStore,
} from "./persistence"

const blocks: ContentBlock[] = [
  { kind: "heading", level: 2, text: "📌 Main Points" },
  { kind: "bullet", text: "one" },
]

describe("createKnowledgeStore", () => {
  it("picks the backend from the destination", () => {
    const gateway = createTestGateway(new FakeNotion())
    expect(
      createKnowledgeStore(gateway, { databaseId: "db", kind: "structured" }),
    ).toBeInstanceOf(StructuredStore)
    expect(
      createKnowledgeStore(gateway, { containerId: "p", kind: "freestanding" }),
    ).toBeInstanceOf(FreestandingStore)
  })
})

describe("StructuredStore", () => {
  it("inserts a row with default attributes", async () => {
    const fake = new FakeNotion()
    const store = new StructuredStore(createTestGateway(fake), TEST_DATABASE_ID, {
      now: () => TEST_NOW,
    })

    const ref = await store.create({
      archetype: ARCHETYPES.project_problem_solving,
      blocks,
      title: "Flaky build",
      topics: ["ci"],
    })

    expect(ref.url).toBe(`https://www.notion.so/${ref.id.replaceAll("-", "")}`)
    expect(fake.requests[0]?.body).toMatchObject({
      parent: { database_id: TEST_DATABASE_ID, type: "database_id" },
      properties: {
        Confidence: { select: { name: "Medium" } },
        Date: { date: { start: TEST_NOW.toISOString() } },
        Status: { select: { name: "New" } },
        Title: { title: [{ text: { content: "Flaky build" }, type: "text" }] },
        Topics: { multi_select: [{ name: "ci" }] },
        Type: { select: { name: "Project Problem Solving" } },
      },
    })
    expect(fake.pages.get(ref.id)?.children).toHaveLength(2)
  })

  it("changes attributes in place", async () => {
    const fake = new FakeNotion()
    const row = fake.seedRecord(TEST_DATABASE_ID, {
      date: "2026-10-01",
      title: "Row",
      type: "General Discussion",
    })
    const store = new StructuredStore(createTestGateway(fake), TEST_DATABASE_ID)

    await store.updateAttributes(row.id, { status: "Done" })

    expect(fake.pages.get(row.id)?.properties.Status).toEqual({
      select: { name: "Done" },
      type: "select",
    })
  })

  it("appends again on every call", async () => {
    const fake = new FakeNotion()
    const row = fake.seedRecord(TEST_DATABASE_ID, {
      date: "2026-10-01",
      title: "Row",
      type: "General Discussion",
    })
    const store = new StructuredStore(createTestGateway(fake), TEST_DATABASE_ID)

    await store.append(row.id, blocks)
    await store.append(row.id, blocks)

    expect(fake.pages.get(row.id)?.children).toHaveLength(4)
  })
})

describe("FreestandingStore", () => {
  it("creates a child page with only a title", async () => {
    const fake = new FakeNotion()
    const container = fake.seedPage("Claude Notes")
    const store = new FreestandingStore(createTestGateway(fake), container.id)

    await store.create({
      archetype: ARCHETYPES.general_discussion,
      blocks,
      confidence: "high",
      title: "Chat",
      topics: ["misc"],
    })

    expect(fake.requests[0]?.body).toMatchObject({
      parent: { page_id: container.id, type: "page_id" },
      properties: {
        title: { title: [{ text: { content: "Chat" }, type: "text" }] },
      },
    })
    const created = [...fake.pages.values()].at(-1)
    expect(Object.keys(created?.properties ?? {})).toEqual(["title"])
  })

  it("falls back to the workspace root without a container", async () => {
    const fake = new FakeNotion()
    await new FreestandingStore(createTestGateway(fake)).create({
      blocks,
      title: "Loose",
    })

    expect(fake.requests[0]?.body).toMatchObject({
      parent: { type: "workspace", workspace: true },
    })
  })

  it("has no attributes to update", async () => {
    const fake = new FakeNotion()
    const store = new FreestandingStore(createTestGateway(fake), "p")

    await expect(store.updateAttributes()).rejects.toBeInstanceOf(
      UnsupportedOperationError,
    )
    expect(fake.requests).toHaveLength(0)
  })
})
