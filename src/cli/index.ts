#!/usr/bin/env node

/**
 * Real Time Prices Loader CLI
 *
 * Loads modeled food, energy and currency prices and publishes one dataset
 * per country to a data catalog.
 */

import { Command } from "commander";

import { registerConfigCommand } from "./commands/config.js";
import { registerModelsCommand } from "./commands/models.js";
import { registerRunCommand } from "./commands/run.js";

const program = new Command();

program
  .name("rtp-loader")
  .description("Real Time Prices loader: API to per-country catalog datasets")
  .version("0.1.0");

registerRunCommand(program);
registerModelsCommand(program);
registerConfigCommand(program);

// Show help by default
program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
