import type { z } from "zod"
import { RemoteError } from "../errors"
import { logError, logHttp, timed } from "../logger"
import type { OutgoingBlock } from "./codec"
import {
  blockChildrenSchema,
  errorBodySchema,
  type NotionBlockObject,
  type NotionPage,
  pageSchema,
  type QueryResult,
  queryResultSchema,
} from "./schemas"

// documented maximum page size for database queries and child listings
export const MAX_PAGE_SIZE = 100

export type FetchLike = (
  input: string,
  init: {
    method: string
    headers: Record<string, string>
    body?: string
  },
) => Promise<Response>

export interface NotionGatewayOptions {
  apiKey: string
  baseUrl: string
  notionVersion: string
  // injected in tests; defaults to the global fetch
  fetch?: FetchLike
}

export type PageParent =
  | { type: "page_id"; page_id: string }
  | { type: "workspace"; workspace: true }
  | { type: "database_id"; database_id: string }

export interface CreatePageRequest {
  parent: PageParent
  properties: Record<string, unknown>
  children: OutgoingBlock[]
}

export interface QueryRequest {
  filter?: Record<string, unknown>
  sorts?: Array<Record<string, unknown>>
  pageSize?: number
}

export interface FetchedPage {
  page: NotionPage
  blocks: NotionBlockObject[]
}

type Method = "GET" | "POST" | "PATCH"

export function clampPageSize(requested: number | undefined): number {
  if (requested === undefined || !Number.isFinite(requested)) return 10
  return Math.max(1, Math.min(Math.floor(requested), MAX_PAGE_SIZE))
}

function parseErrorBody(text: string): string | undefined {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch {
    return undefined
  }
  const parsed = errorBodySchema.safeParse(json)
  return parsed.success ? parsed.data.message : undefined
}

async function readErrorMessage(response: Response): Promise<string> {
  const text = await response.text()
  return (
    parseErrorBody(text) ??
    (text.trim() || response.statusText || "Unknown error")
  )
}

async function readJson(response: Response, route: string): Promise<unknown> {
  try {
    return await response.json()
  } catch (error) {
    logError(`invalid JSON response from ${route}`, error)
    throw new RemoteError(response.status, `invalid JSON response from ${route}`)
  }
}

/**
 * thin wrapper over the notion rest api
 *
 * ids are encoded as single path segments, so a malformed id cannot reach
 * another endpoint.
 *
 * one outbound request per call (fetch composes two), no retries.
 */
export class NotionGateway {
  private readonly apiKey: string
  private readonly baseUrl: string
  private readonly notionVersion: string
  private readonly fetchFn: FetchLike

  constructor(options: NotionGatewayOptions) {
    this.apiKey = options.apiKey
    this.baseUrl = options.baseUrl.replace(/\/+$/, "")
    this.notionVersion = options.notionVersion
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
  }

  async createPage(request: CreatePageRequest): Promise<NotionPage> {
    return this.request("POST", "/pages", pageSchema, request)
  }

  async queryDatabase(
    databaseId: string,
    query: QueryRequest = {},
  ): Promise<QueryResult> {
    const body: Record<string, unknown> = {
      page_size: clampPageSize(query.pageSize),
    }
    if (query.filter) body.filter = query.filter
    if (query.sorts && query.sorts.length > 0) body.sorts = query.sorts

    return this.request(
      "POST",
      `/databases/${encodeURIComponent(databaseId)}/query`,
      queryResultSchema,
      body,
    )
  }

  /**
   * page properties plus its first page of child blocks
   */
  async fetchPage(pageId: string): Promise<FetchedPage> {
    const id = encodeURIComponent(pageId)
    const page = await this.request("GET", `/pages/${id}`, pageSchema)
    const children = await this.request(
      "GET",
      `/blocks/${id}/children?page_size=${MAX_PAGE_SIZE}`,
      blockChildrenSchema,
    )
    return { blocks: children.results, page }
  }

  async appendChildren(
    blockId: string,
    children: OutgoingBlock[],
  ): Promise<NotionBlockObject[]> {
    const result = await this.request(
      "PATCH",
      `/blocks/${encodeURIComponent(blockId)}/children`,
      blockChildrenSchema,
      { children },
    )
    return result.results
  }

  async updatePageProperties(
    pageId: string,
    properties: Record<string, unknown>,
  ): Promise<NotionPage> {
    const id = encodeURIComponent(pageId)
    return this.request("PATCH", `/pages/${id}`, pageSchema, {
      properties,
    })
  }

  private async request<T>(
    method: Method,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown,
  ): Promise<T> {
    const route = `${method} ${path.split("?")[0]}`

    return timed("http", route, async () => {
      const response = await this.fetchFn(`${this.baseUrl}${path}`, {
        body: body === undefined ? undefined : JSON.stringify(body),
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
          "Notion-Version": this.notionVersion,
        },
        method,
      })

      logHttp(route, response.status)

      if (!response.ok) {
        const message = await readErrorMessage(response)
        throw new RemoteError(response.status, message)
      }

      const parsed = schema.safeParse(await readJson(response, route))
      if (!parsed.success) {
        logError(`unexpected response shape from ${route}`, parsed.error)
        throw new RemoteError(
          response.status,
          `unexpected response shape from ${route}`,
        )
      }
      return parsed.data
    })
  }
}
