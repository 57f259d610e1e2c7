#!/usr/bin/env node

/**
 * ODK Sync CLI
 *
 * Pulls ODK Central submissions into a relational database, re-hosts their
 * images in object storage and maintains the unified reporting table.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerImagesCommand } from "./commands/images.js";
import { registerSyncCommand } from "./commands/sync.js";
import { registerUnifiedCommand } from "./commands/unified.js";
import { registerUrlsCommand } from "./commands/urls.js";

const program = new Command();

program
  .name("odk-sync")
  .description("ODK Central submission sync and unified table builder")
  .version("0.1.0");

// Register all commands
registerDbCommand(program);
registerSyncCommand(program);
registerUnifiedCommand(program);
registerUrlsCommand(program);
registerImagesCommand(program);

// Show help by default
program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
