#!/usr/bin/env node
import { Command } from "commander";

import { attachScanCommand } from "./commands/scan";

export interface RootOptions {
  logLevel?: string;
}

async function main() {
  const program = new Command();

  program
    .name("mv-people")
    .description("Scan photo folders for people and archive the matches interactively")
    .version("0.1.0")
    .option("--log-level <level>", "Diagnostic log level (debug, info, warn, error, silent)");

  attachScanCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
