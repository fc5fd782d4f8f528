import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";

import { InvalidArgumentError, type Command } from "commander";
import ora from "ora";

import {
  getModelConfig,
  listModels,
  loadConfig,
  loadDatasetStatic,
} from "../../config.js";
import { ConfigError } from "../../errors.js";
import { HttpRetriever } from "../../scraper/client.js";
import {
  CkanCatalog,
  LocalCatalog,
  type CatalogPublisher,
} from "../../services/catalog/index.js";
import { runPipeline } from "../../services/pipeline/index.js";
import { IsoCountryLookup } from "../../utils/countries.js";
import { displayRunSummary } from "../utils/display.js";

import type { FlushPolicy } from "../../types/index.js";

interface RunCommandOptions {
  models?: string;
  maxRecords?: number;
  flushPolicy: FlushPolicy;
  flushThreshold?: number;
  countries?: string;
  dryRun?: boolean;
  outDir: string;
  save?: boolean;
  useSaved?: boolean;
  keepFiles?: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function parseFlushPolicy(value: string): FlushPolicy {
  if (value === "threshold" || value === "none") {
    return value;
  }
  throw new InvalidArgumentError('Expected "threshold" or "none".');
}

export function parseList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Fetch all models, build one dataset per country and publish")
    .option("-m, --models <list>", "Comma-separated models (default: all)")
    .option(
      "--max-records <n>",
      "Stop each model after this many records",
      parsePositiveInt
    )
    .option(
      "--flush-policy <policy>",
      "Emit large countries early (threshold) or once at the end (none); " +
        "each early emission republishes the dataset and replaces its " +
        "resources, so use none when publishing to a catalog",
      parseFlushPolicy,
      "threshold"
    )
    .option(
      "--flush-threshold <n>",
      "Buffered records per country before an early flush",
      parsePositiveInt
    )
    .option("-c, --countries <list>", "Only publish these ISO3 codes")
    .option("--dry-run", "Write JSON manifests instead of publishing")
    .option("-o, --out-dir <dir>", "Output directory for dry runs", "output")
    .option("--save", "Save downloaded API responses")
    .option("--use-saved", "Read API responses saved by an earlier --save run")
    .option("--keep-files", "Keep the temporary CSV directory")
    .action(async (options: RunCommandOptions) => {
      const spinner = ora("Loading configuration...").start();
      let tempDir: string | undefined;

      try {
        const config = loadConfig();
        const staticMeta = loadDatasetStatic();
        const models = parseList(options.models);
        const selected = models.length > 0 ? models : listModels(config);
        for (const model of selected) {
          getModelConfig(config, model);
        }

        const owner = {
          ownerOrg: process.env.CATALOG_OWNER_ORG,
          maintainer: process.env.CATALOG_MAINTAINER,
        };

        let publisher: CatalogPublisher;
        let workDir: string;
        if (options.dryRun === true) {
          const outDir = resolve(options.outDir);
          publisher = new LocalCatalog(outDir, staticMeta, owner);
          workDir = outDir;
        } else {
          const baseUrl = process.env.CATALOG_URL;
          if (baseUrl === undefined || baseUrl === "") {
            throw new ConfigError(
              "CATALOG_URL is not set (use --dry-run to write manifests locally)"
            );
          }
          publisher = new CkanCatalog({
            baseUrl,
            apiKey: process.env.CATALOG_API_KEY,
            staticMeta,
            ...owner,
          });
          tempDir = await mkdtemp(join(tmpdir(), "rtp-loader-"));
          workDir = tempDir;
        }

        spinner.text = `Fetching ${selected.join(", ")}...`;

        const summary = await runPipeline(
          {
            config,
            retriever: new HttpRetriever({
              save: options.save,
              useSaved: options.useSaved,
            }),
            countries: new IsoCountryLookup(config.country_names),
            publisher,
            workDir,
          },
          {
            models: selected,
            maxRecords: options.maxRecords,
            flushPolicy: options.flushPolicy,
            flushThreshold: options.flushThreshold,
            countryCodes: parseList(options.countries),
            onProgress: (progress) => {
              spinner.text = `Country ${String(progress.groups)} (${progress.currentCountry}), ${String(progress.published)} published`;
            },
          }
        );

        spinner.succeed(
          `Published ${String(summary.published.length)} datasets`
        );
        displayRunSummary(summary);
        if (summary.failed.length > 0) {
          process.exitCode = 1;
        }
      } catch (error) {
        spinner.fail(`Failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      } finally {
        if (tempDir !== undefined && options.keepFiles !== true) {
          await rm(tempDir, { recursive: true, force: true });
        } else if (tempDir !== undefined) {
          console.log(`CSV files kept in ${tempDir}`);
        }
      }
    });
}
