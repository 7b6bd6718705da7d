// public exports for user configuration
// users can import from "notion-distiller/config" in their distiller.config.js

import type { DistillerUserConfig } from "./schema"

export {
  DEFAULT_NOTION_BASE_URL,
  DEFAULT_NOTION_VERSION,
  normalizeNotionId,
} from "./defaults"
export { findConfigFile, type LoadConfigOptions, loadConfig } from "./loader"
export type { DistillerUserConfig, ResolvedConfig } from "./schema"
export { distillerConfigSchema } from "./schema"

/**
 * helper for defining a typed config file
 *
 * @example
 * ```ts
 * // distiller.config.js
 * import { defineConfig } from "notion-distiller/config"
 *
 * export default defineConfig({
 *   notion: { databaseId: "0123456789abcdef0123456789abcdef" },
 * })
 * ```
 */
export function defineConfig(config: DistillerUserConfig): DistillerUserConfig {
  return config
}
