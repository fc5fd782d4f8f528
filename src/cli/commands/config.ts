import chalk from "chalk";

import { loadConfig, loadDatasetStatic } from "../../config.js";
import { printError } from "../utils/display.js";

import type { Command } from "commander";

export function registerConfigCommand(program: Command): void {
  program
    .command("config")
    .description("Validate the configuration files and print them")
    .action(() => {
      try {
        const config = loadConfig();
        const staticMeta = loadDatasetStatic();

        console.log(chalk.bold("\nProject configuration:\n"));
        console.log(JSON.stringify(config, null, 2));
        console.log(chalk.bold("\nStatic dataset metadata:\n"));
        console.log(JSON.stringify(staticMeta, null, 2));
        console.log(chalk.green("\nConfiguration is valid"));
      } catch (error) {
        printError(error instanceof Error ? error.message : "Unknown error");
        process.exitCode = 1;
      }
    });
}
