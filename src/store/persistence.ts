import type { Archetype } from "../archetypes/registry"
import { UnsupportedOperationError } from "../errors"
import { logInfo } from "../logger"
import type { NotionGateway, PageParent } from "../notion/client"
import { attributeProperties, titleProperty, toNotionBlock } from "../notion/codec"
import type {
  Confidence,
  ContentBlock,
  Destination,
  DocumentRef,
  RecordAttributes,
} from "../types"

export const DEFAULT_STATUS = "New"
export const DEFAULT_RECORD_TYPE = "General Discussion"

export interface CreateDocumentInput {
  title: string
  blocks: readonly ContentBlock[]
  // the following are only stored by the structured backend
  archetype?: Archetype
  topics?: readonly string[]
  confidence?: Confidence
}

/**
 * capability shared by both backends; a document is created once and then
 * only grows (append) or, for records, has its attributes changed
 */
export interface KnowledgeStore {
  readonly destination: Destination
  create(input: CreateDocumentInput): Promise<DocumentRef>
  // not idempotent: appending twice writes the blocks twice
  append(documentId: string, blocks: readonly ContentBlock[]): Promise<void>
  updateAttributes(
    documentId: string,
    attributes: RecordAttributes,
  ): Promise<void>
}

export interface StoreOptions {
  now?: () => Date
}

/**
 * documents parented under a fixed page, or the workspace root
 */
export class FreestandingStore implements KnowledgeStore {
  readonly destination: Destination

  constructor(
    private readonly gateway: NotionGateway,
    private readonly containerId?: string,
  ) {
    this.destination = { containerId, kind: "freestanding" }
  }

  async create(input: CreateDocumentInput): Promise<DocumentRef> {
    const parent: PageParent = this.containerId
      ? { page_id: this.containerId, type: "page_id" }
      : { type: "workspace", workspace: true }

    const page = await this.gateway.createPage({
      children: input.blocks.map(toNotionBlock),
      parent,
      properties: { title: titleProperty(input.title) },
    })

    logInfo("created page", { id: page.id })
    return { id: page.id, url: page.url }
  }

  async append(
    documentId: string,
    blocks: readonly ContentBlock[],
  ): Promise<void> {
    await this.gateway.appendChildren(documentId, blocks.map(toNotionBlock))
  }

  async updateAttributes(): Promise<void> {
    throw new UnsupportedOperationError(
      "updateAttributes",
      "freestanding pages have no record attributes; configure NOTION_DATABASE_ID",
    )
  }
}

/**
 * rows inserted into a notes database with queryable attributes
 */
export class StructuredStore implements KnowledgeStore {
  readonly destination: Destination
  private readonly now: () => Date

  constructor(
    private readonly gateway: NotionGateway,
    private readonly databaseId: string,
    options: StoreOptions = {},
  ) {
    this.destination = { databaseId, kind: "structured" }
    this.now = options.now ?? (() => new Date())
  }

  async create(input: CreateDocumentInput): Promise<DocumentRef> {
    const properties = {
      Title: titleProperty(input.title),
      ...attributeProperties({
        confidence: input.confidence ?? "medium",
        date: this.now().toISOString(),
        status: DEFAULT_STATUS,
        topics: input.topics ? [...input.topics] : [],
        type: input.archetype?.displayName ?? DEFAULT_RECORD_TYPE,
      }),
    }

    const page = await this.gateway.createPage({
      children: input.blocks.map(toNotionBlock),
      parent: { database_id: this.databaseId, type: "database_id" },
      properties,
    })

    logInfo("created database entry", { id: page.id })
    return { id: page.id, url: page.url }
  }

  async append(
    documentId: string,
    blocks: readonly ContentBlock[],
  ): Promise<void> {
    await this.gateway.appendChildren(documentId, blocks.map(toNotionBlock))
  }

  async updateAttributes(
    documentId: string,
    attributes: RecordAttributes,
  ): Promise<void> {
    await this.gateway.updatePageProperties(
      documentId,
      attributeProperties(attributes),
    )
  }
}

export function createKnowledgeStore(
  gateway: NotionGateway,
  destination: Destination,
  options: StoreOptions = {},
): KnowledgeStore {
  switch (destination.kind) {
    case "structured":
      return new StructuredStore(gateway, destination.databaseId, options)
    case "freestanding":
      return new FreestandingStore(gateway, destination.containerId)
  }
}
