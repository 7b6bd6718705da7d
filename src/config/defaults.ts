// default configuration values for the distiller

export const DEFAULT_NOTION_BASE_URL = "https://api.notion.com/v1"
export const DEFAULT_NOTION_VERSION = "2022-06-28"

export const CONFIG_FILENAMES = [
  "distiller.config.json",
  "distiller.config.js",
  "distiller.config.mjs",
]

/**
 * normalize a notion id or page url to the dashed uuid form
 *
 * strings without a trailing 32-hex id are returned trimmed but otherwise as-is
 */
export function normalizeNotionId(input: string): string {
  const trimmed = input.trim()
  const withoutQuery = trimmed.split(/[?#]/)[0] ?? trimmed
  const compact = withoutQuery.replace(/-/g, "")
  const match = /([0-9a-fA-F]{32})$/.exec(compact)
  if (!match?.[1]) return trimmed

  const hex = match[1].toLowerCase()
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join("-")
}
