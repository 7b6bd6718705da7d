import type { CommandModule } from "yargs"
import { createReadNoteTool } from "../tools/notes/read"
import {
  bootstrap,
  type CommonArgs,
  commonOptions,
  printOutcome,
} from "./utils"

export interface ReadArgs extends CommonArgs {
  id: string
}

export const readCommand: CommandModule<object, ReadArgs> = {
  builder: {
    ...commonOptions,
    id: {
      demandOption: true,
      describe: "note id or url",
      type: "string",
    },
  },
  command: "read <id>",
  describe: "print a note as formatted text",

  handler: async (args) => {
    const ctx = await bootstrap(args)
    printOutcome(await createReadNoteTool(ctx).execute({ note_id: args.id }))
  },
}
