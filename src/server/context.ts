import type { RuntimeConfig } from "../config"
import { type FetchLike, NotionGateway } from "../notion/client"
import { createKnowledgeStore, type KnowledgeStore } from "../store/persistence"

/**
 * shared context containing all dependencies, built once at startup
 */
export interface AppContext {
  config: RuntimeConfig
  // null without an api key
  gateway: NotionGateway | null
  // null without an api key or a destination
  store: KnowledgeStore | null
  now: () => Date
}

/**
 * create a context object to pass through the tools
 */
export function createAppContext(
  config: RuntimeConfig,
  options: {
    fetch?: FetchLike
    now?: () => Date
  } = {},
): AppContext {
  const now = options.now ?? (() => new Date())
  const { apiKey, baseUrl, destination, version } = config.notion

  const gateway = apiKey
    ? new NotionGateway({
        apiKey,
        baseUrl,
        fetch: options.fetch,
        notionVersion: version,
      })
    : null

  const store =
    gateway && destination
      ? createKnowledgeStore(gateway, destination, { now })
      : null

  return { config, gateway, now, store }
}
