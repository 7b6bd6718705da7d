import type {
  Confidence,
  ContentBlock,
  RecordAttributes,
  SearchResult,
} from "../types"
import {
  blockPayloadSchema,
  type NotionBlockObject,
  type NotionPage,
  type PageProperty,
  type RichText,
} from "./schemas"

// notion rejects text objects longer than this
export const MAX_TEXT_LENGTH = 2000

export interface OutgoingRichText {
  type: "text"
  text: { content: string }
}

export type OutgoingBlock = {
  object: "block"
  type: string
} & Record<string, unknown>

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff
}

/**
 * split text into notion-sized rich text segments; empty text keeps one segment
 */
export function toRichText(text: string): OutgoingRichText[] {
  const segments: OutgoingRichText[] = []
  let start = 0
  while (start < text.length) {
    let end = Math.min(start + MAX_TEXT_LENGTH, text.length)
    // keep surrogate pairs in one segment
    if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) {
      end -= 1
    }
    segments.push({ text: { content: text.slice(start, end) }, type: "text" })
    start = end
  }
  return segments.length > 0
    ? segments
    : [{ text: { content: "" }, type: "text" }]
}

export function plainText(richText: readonly RichText[] | undefined): string {
  if (!richText) return ""
  return richText
    .map((segment) => segment.plain_text ?? segment.text?.content ?? "")
    .join("")
}

function textBlock(
  type: string,
  text: string,
  extra: Record<string, unknown> = {},
): OutgoingBlock {
  return {
    object: "block",
    type,
    [type]: { rich_text: toRichText(text), ...extra },
  }
}

export function toNotionBlock(block: ContentBlock): OutgoingBlock {
  switch (block.kind) {
    case "heading":
      return textBlock(`heading_${block.level}`, block.text)
    case "paragraph":
      return textBlock("paragraph", block.text)
    case "bullet":
      return textBlock("bulleted_list_item", block.text)
    case "todo":
      return textBlock("to_do", block.text, { checked: block.checked })
    case "callout":
      return textBlock("callout", block.text, {
        icon: { emoji: block.icon, type: "emoji" },
      })
    case "divider":
      return { divider: {}, object: "block", type: "divider" }
  }
}

/**
 * decode a fetched block; block types we never write come back as null
 */
export function fromNotionBlock(raw: NotionBlockObject): ContentBlock | null {
  if (raw.type === "divider") return { kind: "divider" }

  const payload = blockPayloadSchema.safeParse(raw[raw.type])
  if (!payload.success) return null

  const text = plainText(payload.data.rich_text)

  switch (raw.type) {
    case "heading_1":
      return { kind: "heading", level: 1, text }
    case "heading_2":
      return { kind: "heading", level: 2, text }
    case "heading_3":
      return { kind: "heading", level: 3, text }
    case "paragraph":
      return { kind: "paragraph", text }
    case "bulleted_list_item":
      return { kind: "bullet", text }
    case "to_do":
      return { checked: payload.data.checked ?? false, kind: "todo", text }
    case "callout":
      return { icon: payload.data.icon?.emoji ?? "", kind: "callout", text }
    default:
      return null
  }
}

export function fromNotionBlocks(
  raw: readonly NotionBlockObject[],
): ContentBlock[] {
  const blocks: ContentBlock[] = []
  for (const item of raw) {
    const block = fromNotionBlock(item)
    if (block) blocks.push(block)
  }
  return blocks
}

export function formatConfidence(confidence: Confidence): string {
  return confidence.charAt(0).toUpperCase() + confidence.slice(1)
}

// multi-select option names may not contain commas
function toTopicOptions(topics: readonly string[]): Array<{ name: string }> {
  const names = new Set<string>()
  for (const topic of topics) {
    const name = topic.replaceAll(",", " ").trim()
    if (name) names.add(name)
  }
  return [...names].map((name) => ({ name }))
}

export function titleProperty(title: string) {
  return { title: toRichText(title) }
}

/**
 * map record attributes onto notion database properties
 */
export function attributeProperties(
  attributes: RecordAttributes,
): Record<string, unknown> {
  const properties: Record<string, unknown> = {}
  if (attributes.type !== undefined) {
    properties.Type = { select: { name: attributes.type } }
  }
  if (attributes.date !== undefined) {
    properties.Date = { date: { start: attributes.date } }
  }
  if (attributes.topics !== undefined) {
    properties.Topics = { multi_select: toTopicOptions(attributes.topics) }
  }
  if (attributes.status !== undefined) {
    properties.Status = { select: { name: attributes.status } }
  }
  if (attributes.confidence !== undefined) {
    properties.Confidence = {
      select: { name: formatConfidence(attributes.confidence) },
    }
  }
  return properties
}

function findTitleProperty(page: NotionPage): PageProperty | undefined {
  return Object.values(page.properties).find((prop) => prop.type === "title")
}

export function pageTitle(page: NotionPage): string {
  const title = plainText(findTitleProperty(page)?.title)
  return title || "Untitled"
}

/**
 * project a database row into a search result
 */
export function toSearchResult(page: NotionPage): SearchResult {
  const props = page.properties
  const topics = props.Topics?.multi_select?.map((t) => t.name) ?? []

  return {
    date: props.Date?.date?.start ?? "Unknown",
    id: page.id,
    status: props.Status?.select?.name ?? "Unknown",
    title: pageTitle(page),
    topics: topics.join(", "),
    type: props.Type?.select?.name ?? "Unknown",
    url: page.url,
  }
}
