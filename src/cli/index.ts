#!/usr/bin/env node

/**
 * Ledger mirror sync CLI
 *
 * Run syncs by hand, inspect the mirror and its transaction log, and work the
 * hygiene and approval views.
 */

import { Command } from "commander";

import { registerCredentialsCommand } from "./commands/credentials.js";
import { registerDbCommand } from "./commands/db.js";
import { registerRecordsCommand } from "./commands/records.js";
import { registerSyncCommand } from "./commands/sync.js";
import { registerViewsCommand } from "./commands/views.js";

const program = new Command();

program
  .name("ledger-sync")
  .description("Tenant ledger mirror with multi-rail sync")
  .version("0.1.0");

// Register all commands
registerDbCommand(program);
registerCredentialsCommand(program);
registerSyncCommand(program);
registerRecordsCommand(program);
registerViewsCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
