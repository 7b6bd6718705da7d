import type { CommandModule } from "yargs"
import { createPingTool } from "../tools/notes/ping"
import {
  bootstrap,
  type CommonArgs,
  commonOptions,
  printOutcome,
} from "./utils"

export const statusCommand: CommandModule<object, CommonArgs> = {
  builder: commonOptions,
  command: "status",
  describe: "show which credentials and destinations are configured",

  handler: async (args) => {
    const ctx = await bootstrap(args)
    printOutcome(await createPingTool(ctx).execute({ message: "status" }))
  },
}
