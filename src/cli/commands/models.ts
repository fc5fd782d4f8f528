/**
 * Models command - List configured indicator models
 */

import { loadConfig } from "../../config.js";
import { displayModelsTable, printError } from "../utils/display.js";

import type { Command } from "commander";

export function registerModelsCommand(program: Command): void {
  program
    .command("models")
    .description("List configured indicator models and their endpoints")
    .action(() => {
      try {
        displayModelsTable(loadConfig());
      } catch (error) {
        printError(error instanceof Error ? error.message : "Unknown error");
        process.exitCode = 1;
      }
    });
}
