import type { Archetype } from "../archetypes/registry"
import { renderDocument } from "../blocks/render"
import type { NotionGateway, QueryRequest } from "../notion/client"
import { fromNotionBlocks, pageTitle, toSearchResult } from "../notion/codec"
import type { SearchResult, StoredDocument } from "../types"

export const MAX_SEARCH_LIMIT = 20
export const DEFAULT_SEARCH_LIMIT = 10

export interface SearchOptions {
  query: string
  archetype?: Archetype
  limit?: number
}

export function clampSearchLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) {
    return DEFAULT_SEARCH_LIMIT
  }
  return Math.max(1, Math.min(Math.floor(limit), MAX_SEARCH_LIMIT))
}

/**
 * newest first, optionally restricted to one archetype's display name
 */
export function buildSearchQuery(
  archetype: Archetype | undefined,
  limit: number | undefined,
): QueryRequest {
  return {
    filter: archetype
      ? { property: "Type", select: { equals: archetype.displayName } }
      : undefined,
    pageSize: clampSearchLimit(limit),
    sorts: [{ direction: "descending", property: "Date" }],
  }
}

/**
 * case-insensitive substring match on the title or the joined topics
 */
export function matchesKeyword(result: SearchResult, query: string): boolean {
  const needle = query.trim().toLowerCase()
  if (!needle) return true
  return (
    result.title.toLowerCase().includes(needle) ||
    result.topics.toLowerCase().includes(needle)
  )
}

/**
 * query the notes database and filter the returned page locally
 *
 * notion has no full-text search over properties, so the keyword filter only
 * sees the single page the query returned. matches ranked below that page are
 * not found; this is a known limitation, not a paging bug.
 */
export async function searchNotes(
  gateway: NotionGateway,
  databaseId: string,
  options: SearchOptions,
): Promise<SearchResult[]> {
  const result = await gateway.queryDatabase(
    databaseId,
    buildSearchQuery(options.archetype, options.limit),
  )
  return result.results
    .map(toSearchResult)
    .filter((item) => matchesKeyword(item, options.query))
}

export async function fetchNote(
  gateway: NotionGateway,
  documentId: string,
): Promise<StoredDocument> {
  const { page, blocks } = await gateway.fetchPage(documentId)
  return {
    blocks: fromNotionBlocks(blocks),
    id: page.id,
    title: pageTitle(page),
    url: page.url,
  }
}

export async function readNote(
  gateway: NotionGateway,
  documentId: string,
): Promise<string> {
  const note = await fetchNote(gateway, documentId)
  return renderDocument(note.title, note.blocks)
}

export function formatSearchResults(
  results: readonly SearchResult[],
  query: string,
): string {
  if (results.length === 0) {
    return query.trim()
      ? `🔍 No notes found matching "${query.trim()}".`
      : "🔍 No notes found."
  }

  const header = query.trim()
    ? `🔍 Found ${results.length} note(s) matching "${query.trim()}":`
    : `🔍 Found ${results.length} note(s):`

  const entries = results.map((result, index) =>
    [
      `${index + 1}. **${result.title}**`,
      `   📑 Type: ${result.type}`,
      `   📅 Date: ${result.date}`,
      `   🏷️ Topics: ${result.topics || "None"}`,
      `   📊 Status: ${result.status}`,
      `   🆔 ID: ${result.id}`,
      `   🔗 ${result.url}`,
    ].join("\n"),
  )

  return [header, ...entries].join("\n\n")
}
