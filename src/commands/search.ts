import type { CommandModule } from "yargs"
import { ARCHETYPE_IDS } from "../archetypes/registry"
import { DEFAULT_SEARCH_LIMIT, MAX_SEARCH_LIMIT } from "../store/query"
import { createSearchNotesTool } from "../tools/notes/search"
import {
  bootstrap,
  type CommonArgs,
  commonOptions,
  printOutcome,
} from "./utils"

export interface SearchArgs extends CommonArgs {
  query: string
  type?: string
  limit: number
}

export const searchCommand: CommandModule<object, SearchArgs> = {
  builder: {
    ...commonOptions,
    limit: {
      default: DEFAULT_SEARCH_LIMIT,
      describe: `max notes to fetch (at most ${MAX_SEARCH_LIMIT})`,
      type: "number",
    },
    query: {
      demandOption: true,
      describe: "keyword matched against titles and topics",
      type: "string",
    },
    type: {
      choices: ARCHETYPE_IDS,
      describe: "only return notes of this conversation type",
      type: "string",
    },
  },
  command: "search <query>",
  describe: "search notes in the notion database",

  handler: async (args) => {
    const ctx = await bootstrap(args)
    printOutcome(
      await createSearchNotesTool(ctx).execute({
        conversation_type: args.type,
        limit: args.limit,
        query: args.query,
      }),
    )
  },
}
