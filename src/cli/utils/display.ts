/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { ProjectConfig } from "../../config.js";
import type { RunSummary } from "../../services/pipeline/runner.js";

/**
 * Display configured models in a formatted table
 */
export function displayModelsTable(config: ProjectConfig): void {
  const table = new CliTable3({
    head: [chalk.cyan("Model"), chalk.cyan("Label"), chalk.cyan("Endpoint")],
    colWidths: [12, 12, 80],
    wordWrap: true,
  });

  for (const [model, entry] of Object.entries(config.models)) {
    table.push([chalk.green(model), entry.label, `${config.base_url}${entry.path}`]);
  }

  console.log(table.toString());
}

/**
 * Display the datasets a run published, followed by what it skipped
 */
export function displayRunSummary(summary: RunSummary): void {
  if (summary.published.length > 0) {
    const table = new CliTable3({
      head: [
        chalk.cyan("ISO3"),
        chalk.cyan("Dataset"),
        chalk.cyan("Action"),
        chalk.cyan("Resources"),
        chalk.cyan("Rows"),
      ],
      colWidths: [8, 45, 10, 11, 10],
      wordWrap: true,
    });

    for (const dataset of summary.published) {
      table.push([
        dataset.countryCode,
        dataset.name,
        dataset.action,
        String(dataset.resources),
        String(dataset.rows),
      ]);
    }

    console.log(table.toString());
  }

  console.log(
    `\n${chalk.bold("Groups:")} ${String(summary.groups)}  ` +
      `${chalk.green("Published:")} ${String(summary.published.length)}  ` +
      `${chalk.yellow("Skipped:")} ${String(summary.skipped.length)}  ` +
      `${chalk.red("Failed:")} ${String(summary.failed.length)}`
  );

  if (summary.skipped.length > 0) {
    printWarning(`Skipped countries: ${summary.skipped.join(", ")}`);
  }

  for (const failure of summary.failed.slice(0, 20)) {
    printError(`${failure.countryCode}: ${failure.error}`);
  }
  if (summary.failed.length > 20) {
    console.log(
      chalk.gray(`  ... and ${String(summary.failed.length - 20)} more`)
    );
  }
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}
