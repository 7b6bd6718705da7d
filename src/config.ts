import type { ResolvedConfig } from "./config/schema"
import type { Destination } from "./types"

/**
 * runtime configuration, resolved once at startup and never mutated
 */
export interface RuntimeConfig {
  notion: {
    apiKey?: string
    baseUrl: string
    version: string
    parentPageId?: string
    databaseId?: string
    // null when neither a parent page nor a database is configured
    destination: Destination | null
  }
  verbose: boolean
}

/**
 * pick the persistence backend; a database wins over a parent page
 */
export function resolveDestination(
  parentPageId?: string,
  databaseId?: string,
): Destination | null {
  if (databaseId) return { databaseId, kind: "structured" }
  if (parentPageId) return { containerId: parentPageId, kind: "freestanding" }
  return null
}

export function createRuntimeConfig(resolved: ResolvedConfig): RuntimeConfig {
  const { notion } = resolved
  return Object.freeze({
    notion: Object.freeze({
      apiKey: notion.apiKey,
      baseUrl: notion.baseUrl,
      databaseId: notion.databaseId,
      destination: resolveDestination(notion.parentPageId, notion.databaseId),
      parentPageId: notion.parentPageId,
      version: notion.apiVersion,
    }),
    verbose: resolved.logging.verbose,
  })
}

// re-export from config modules for external use
export {
  DEFAULT_NOTION_BASE_URL,
  DEFAULT_NOTION_VERSION,
  normalizeNotionId,
} from "./config/defaults"
/** @public */
export { defineConfig } from "./config/index"
export { findConfigFile, type LoadConfigOptions, loadConfig } from "./config/loader"
export type { DistillerUserConfig, ResolvedConfig } from "./config/schema"
