import { describe, expect, it } from "vitest"
import { renderBlock } from "../../blocks/render"
import { fromNotionBlock } from "../../notion/codec"
import { blockObjectSchema } from "../../notion/schemas"
import { FakeNotion } from "../../testing/fake-notion"
import {
  createTestContext,
  TEST_API_KEY,
  TEST_DATABASE_ID,
} from "../../testing/context"
import { createUpdateNotesTool, createUpdateStatusTool } from "./update"

function seedRow(fake: FakeNotion) {
  return fake.seedRecord(TEST_DATABASE_ID, {
    date: "2026-10-01",
    title: "Flaky build",
    type: "Project Problem Solving",
  })
}

describe("update_notion_notes", () => {
  it("appends a dated session to the page", async () => {
    const fake = new FakeNotion()
    const row = seedRow(fake)

    const outcome = await createUpdateNotesTool(createTestContext(fake)).execute({
      analysis: JSON.stringify({ key_insights: ["Retries hide the bug"] }),
      conversation_type: "project_problem_solving",
      note_id: `https://www.notion.so/Flaky-build-${row.id.replaceAll("-", "")}`,
      session_number: 2,
    })

    expect(outcome).toEqual({
      success: true,
      text:
        "✅ Successfully appended update to Notion page!\n\n" +
        `🆔 **Page ID**: ${row.id}\n` +
        "🧱 **Blocks added**: 7\n\n" +
        "The update includes:\n" +
        "- 1 key insights\n" +
        "- 0 decisions\n" +
        "- 0 action items",
    })

    const lines = (fake.pages.get(row.id)?.children ?? [])
      .map((raw) => fromNotionBlock(blockObjectSchema.parse(raw)))
      .map((block) => (block ? renderBlock(block) : null))
    expect(lines).toEqual([
      "---",
      null,
      "## Update - October 05, 2026",
      null,
      "## 💡 Key Insights",
      "- Retries hide the bug",
      null,
    ])
  })

  it("accepts any positive session number", () => {
    const { inputSchema } = createUpdateNotesTool(
      createTestContext(new FakeNotion()),
    )
    const input = {
      analysis: "{}",
      conversation_type: "general_discussion",
      note_id: "p",
    }

    expect(inputSchema.parse({ ...input, session_number: 1 }).session_number).toBe(1)
    expect(inputSchema.parse(input).session_number).toBe(2)
    expect(inputSchema.safeParse({ ...input, session_number: 0 }).success).toBe(
      false,
    )
  })

  it("refuses an update with no section items", async () => {
    const fake = new FakeNotion()
    const row = seedRow(fake)

    const outcome = await createUpdateNotesTool(createTestContext(fake)).execute({
      analysis: JSON.stringify({ summary: "nothing new" }),
      conversation_type: "project_problem_solving",
      note_id: row.id,
      session_number: 2,
    })

    expect(outcome).toEqual({
      error:
        "❌ Error updating Notion page: Analysis has no new section items to append.",
      success: false,
    })
    expect(fake.requests).toHaveLength(0)
  })

  it("reports a missing page", async () => {
    const fake = new FakeNotion()
    const missing = "99999999-9999-4999-8999-999999999999"

    const outcome = await createUpdateNotesTool(createTestContext(fake)).execute({
      analysis: JSON.stringify({ main_points: ["x"] }),
      conversation_type: "general_discussion",
      note_id: missing,
      session_number: 3,
    })

    expect(outcome).toEqual({
      error: `❌ Error updating Notion page: Notion API returned 404 - Could not find page with ID: ${missing}.`,
      success: false,
    })
  })
})

describe("update_note_status", () => {
  it("sets the status of a database entry", async () => {
    const fake = new FakeNotion()
    const row = seedRow(fake)

    const outcome = await createUpdateStatusTool(createTestContext(fake)).execute({
      note_id: row.id,
      status: "Done",
    })

    expect(outcome).toEqual({
      success: true,
      text: `✅ Status of ${row.id} set to "Done".`,
    })
    expect(fake.pages.get(row.id)?.properties.Status).toEqual({
      select: { name: "Done" },
      type: "select",
    })
  })

  it("rejects an id that is not a notion id", async () => {
    const fake = new FakeNotion()

    const outcome = await createUpdateStatusTool(createTestContext(fake)).execute({
      note_id: "../../users/me",
      status: "Done",
    })

    expect(outcome).toEqual({
      error:
        "❌ Error updating note status: Invalid note id '../../users/me'.\n\n" +
        "- expected a Notion page id (32 hex characters) or page URL",
      success: false,
    })
    expect(fake.requests).toHaveLength(0)
  })

  it("is unsupported for freestanding pages", async () => {
    const fake = new FakeNotion()
    const container = fake.seedPage("Claude Notes")
    const ctx = createTestContext(fake, {
      apiKey: TEST_API_KEY,
      parentPageId: container.id,
    })

    const outcome = await createUpdateStatusTool(ctx).execute({
      note_id: container.id,
      status: "Done",
    })

    expect(outcome).toEqual({
      error:
        "❌ Error updating note status: updateAttributes is not supported: " +
        "freestanding pages have no record attributes; configure NOTION_DATABASE_ID",
      success: false,
    })
    expect(fake.requests).toHaveLength(0)
  })
})
