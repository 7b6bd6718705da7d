#!/usr/bin/env tsx

import yargs from "yargs"
import { hideBin } from "yargs/helpers"

import { readCommand } from "./commands/read"
import { searchCommand } from "./commands/search"
import { serveCommand } from "./commands/serve"
import { statusCommand } from "./commands/status"

await yargs(hideBin(process.argv))
  .scriptName("notion-distiller")
  .command(serveCommand)
  .command(statusCommand)
  .command(searchCommand)
  .command(readCommand)
  .demandCommand(1, "you must specify a command")
  .strict()
  .help()
  .parse()
