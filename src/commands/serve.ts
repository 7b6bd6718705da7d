import type { CommandModule } from "yargs"
import { startServer } from "../server"
import { bootstrap, type CommonArgs, commonOptions } from "./utils"

export const serveCommand: CommandModule<object, CommonArgs> = {
  builder: commonOptions,
  command: "serve",
  describe: "start the model context protocol server on stdio",

  handler: async (args) => {
    const ctx = await bootstrap(args)

    // stdout belongs to the protocol; status goes to stderr
    if (!ctx.config.notion.apiKey) {
      console.error(
        "warning: NOTION_API_KEY is not set; only the ping tool will work",
      )
    } else if (!ctx.config.notion.destination) {
      console.error(
        "warning: neither NOTION_PARENT_PAGE_ID nor NOTION_DATABASE_ID is set; notes cannot be created",
      )
    }

    await startServer(ctx)
  },
}
