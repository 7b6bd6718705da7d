import { config as loadDotenv } from "dotenv"
import { createRuntimeConfig, loadConfig } from "../config"
import { setVerbose } from "../logger"
import { type AppContext, createAppContext } from "../server/context"
import type { ToolOutcome } from "../tools/helpers"

export interface CommonArgs {
  config?: string
  verbose?: boolean
}

export const commonOptions = {
  config: {
    alias: "c",
    describe: "path to distiller config file",
    type: "string",
  },
  verbose: {
    describe: "log tool calls and notion requests to stderr",
    type: "boolean",
  },
} as const

/**
 * load .env, resolve configuration once and build the shared context
 */
export async function bootstrap(args: CommonArgs): Promise<AppContext> {
  loadDotenv()

  const resolvedConfig = await loadConfig({
    configPath: args.config,
    overrides: { verbose: args.verbose },
    startDir: process.cwd(),
  })
  const runtimeConfig = createRuntimeConfig(resolvedConfig)
  setVerbose(runtimeConfig.verbose)

  return createAppContext(runtimeConfig)
}

/**
 * print a tool outcome for a one-shot cli command
 */
export function printOutcome(outcome: ToolOutcome) {
  if (outcome.success) {
    console.log(outcome.text)
  } else {
    console.error(outcome.error)
    process.exitCode = 1
  }
}
