import { existsSync } from "node:fs"
import { readFile } from "node:fs/promises"
import { dirname, join, resolve } from "node:path"
import { pathToFileURL } from "node:url"
import { z } from "zod"
import { logError } from "../logger"
import {
  CONFIG_FILENAMES,
  DEFAULT_NOTION_BASE_URL,
  DEFAULT_NOTION_VERSION,
  normalizeNotionId,
} from "./defaults"
import {
  type DistillerUserConfig,
  distillerConfigSchema,
  type ResolvedConfig,
} from "./schema"

/**
 * find the config file by searching up from the given directory
 */
export function findConfigFile(startDir: string): string | null {
  let current = resolve(startDir)

  while (true) {
    for (const filename of CONFIG_FILENAMES) {
      const candidate = join(current, filename)
      if (existsSync(candidate)) {
        return candidate
      }
    }
    const parent = dirname(current)
    if (parent === current) return null
    current = parent
  }
}

const moduleSchema = z.object({ default: z.unknown() }).passthrough()

/**
 * load a config file without validating it
 */
async function loadConfigFile(path: string): Promise<unknown> {
  try {
    if (path.endsWith(".js") || path.endsWith(".mjs")) {
      const mod = moduleSchema.safeParse(await import(pathToFileURL(path).href))
      return mod.success ? mod.data.default : null
    }

    const content = await readFile(path, "utf-8")
    return JSON.parse(content)
  } catch (error) {
    logError(`failed to load config from ${path}`, error)
    return null
  }
}

export interface LoadConfigOptions {
  // starting directory for config search
  startDir: string
  // explicit config file path (overrides search)
  configPath?: string
  // environment to read; defaults to process.env
  env?: NodeJS.ProcessEnv
  // cli overrides
  overrides?: Partial<{
    verbose: boolean
  }>
}

function readEnv(env: NodeJS.ProcessEnv) {
  // empty strings count as unset
  const value = (key: string) => env[key]?.trim() || undefined
  return {
    apiKey: value("NOTION_API_KEY"),
    apiVersion: value("NOTION_VERSION"),
    baseUrl: value("NOTION_API_URL"),
    databaseId: value("NOTION_DATABASE_ID"),
    parentPageId: value("NOTION_PARENT_PAGE_ID"),
    verbose: value("DISTILLER_VERBOSE"),
  }
}

async function loadUserConfigFromFile(
  configFile: string | null,
): Promise<DistillerUserConfig> {
  if (!configFile) return {}

  const loaded = await loadConfigFile(configFile)
  if (!loaded) return {}

  const parsed = distillerConfigSchema.safeParse(loaded)
  if (parsed.success) {
    return parsed.data
  }

  logError(`invalid config file ${configFile}`, parsed.error.message)
  return {}
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined
  return ["1", "true", "yes", "on"].includes(value.toLowerCase())
}

function resolveNotionConfig(
  userConfig: DistillerUserConfig,
  env: ReturnType<typeof readEnv>,
): ResolvedConfig["notion"] {
  const parentPageId = env.parentPageId ?? userConfig.notion?.parentPageId
  const databaseId = env.databaseId ?? userConfig.notion?.databaseId

  return {
    apiKey: env.apiKey ?? userConfig.notion?.apiKey,
    apiVersion:
      env.apiVersion ?? userConfig.notion?.apiVersion ?? DEFAULT_NOTION_VERSION,
    baseUrl:
      env.baseUrl ?? userConfig.notion?.baseUrl ?? DEFAULT_NOTION_BASE_URL,
    databaseId: databaseId ? normalizeNotionId(databaseId) : undefined,
    parentPageId: parentPageId ? normalizeNotionId(parentPageId) : undefined,
  }
}

/**
 * load and resolve the full configuration
 *
 * priority: cli args > environment > config file > defaults
 */
export async function loadConfig(
  options: LoadConfigOptions,
): Promise<ResolvedConfig> {
  const { startDir, configPath, overrides } = options

  const env = readEnv(options.env ?? process.env)
  const configFile = configPath
    ? resolve(startDir, configPath)
    : findConfigFile(startDir)
  const userConfig = await loadUserConfigFromFile(configFile)

  return {
    configFile,
    logging: {
      verbose:
        overrides?.verbose ??
        parseFlag(env.verbose) ??
        userConfig.logging?.verbose ??
        false,
    },
    notion: resolveNotionConfig(userConfig, env),
  }
}
