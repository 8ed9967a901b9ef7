#!/usr/bin/env node

/**
 * School Roster Sync CLI
 *
 * Reconciles a remote school-management system with a nightly snapshot
 * extract of the student information system.
 */

import { Command } from "commander";

import { registerOrderCommand } from "./commands/order.js";
import { registerSyncCommand } from "./commands/sync.js";
import { registerValidateCommand } from "./commands/validate.js";

const program = new Command();

program
  .name("roster-sync")
  .description("Sync school roster extracts into a remote school-management API")
  .version("0.1.0");

registerSyncCommand(program);
registerValidateCommand(program);
registerOrderCommand(program);

program.action(() => {
  program.outputHelp();
});

program.parse();
