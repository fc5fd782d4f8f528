/**
 * Pipeline runner
 *
 * Pulls country groups from the aggregator, assembles a dataset for each
 * and hands it to the publisher. A country that cannot be resolved or
 * published is logged and skipped; transport and configuration errors end
 * the run.
 */

import { CatalogError } from "../../errors.js";
import { pipelineLogger } from "../../logger.js";
import { CountryAggregator, type AggregatorOptions } from "./aggregator.js";
import { DatasetAssembler } from "./assembler.js";
import { fetchRecords } from "./fetcher.js";

import type { ProjectConfig } from "../../config.js";
import type { Retriever } from "../../scraper/client.js";
import type { Model } from "../../types/index.js";
import type { CountryLookup } from "../../utils/countries.js";
import type { CatalogPublisher, PublishResult } from "../catalog/types.js";

// ============================================================================
// Types
// ============================================================================

export interface PipelineDeps {
  config: ProjectConfig;
  retriever: Retriever;
  countries: CountryLookup;
  publisher: CatalogPublisher;
  workDir: string;
}

export interface RunOptions extends AggregatorOptions {
  models: Model[];
  maxRecords?: number;
  /** Only publish these ISO3 codes */
  countryCodes?: string[];
  onProgress?: (progress: RunProgress) => void;
}

export interface RunProgress {
  groups: number;
  published: number;
  currentCountry: string;
}

export interface PublishedDataset extends PublishResult {
  countryCode: string;
  resources: number;
  rows: number;
}

export interface RunSummary {
  groups: number;
  published: PublishedDataset[];
  skipped: string[];
  failed: { countryCode: string; error: string }[];
}

// ============================================================================
// Runner
// ============================================================================

export async function runPipeline(
  deps: PipelineDeps,
  options: RunOptions
): Promise<RunSummary> {
  const { config, retriever, countries, publisher, workDir } = deps;

  const aggregator = new CountryAggregator(
    (model, maxRecords) => fetchRecords(config, retriever, model, maxRecords),
    options
  );
  const assembler = new DatasetAssembler(config, countries, workDir);
  const allowed =
    options.countryCodes !== undefined && options.countryCodes.length > 0
      ? new Set(options.countryCodes.map((code) => code.toUpperCase()))
      : undefined;

  const summary: RunSummary = {
    groups: 0,
    published: [],
    skipped: [],
    failed: [],
  };

  for await (const group of aggregator.aggregate(
    options.models,
    options.maxRecords
  )) {
    const { countryCode } = group;
    if (allowed !== undefined && !allowed.has(countryCode.toUpperCase())) {
      continue;
    }

    summary.groups++;
    options.onProgress?.({
      groups: summary.groups,
      published: summary.published.length,
      currentCountry: countryCode,
    });

    const draft = await assembler.generateDataset(countryCode, group.models);
    if (draft === null) {
      summary.skipped.push(countryCode);
      continue;
    }

    try {
      const result = await publisher.publish(draft);
      summary.published.push({
        ...result,
        countryCode,
        resources: draft.resources.length,
        rows: draft.resources.reduce((acc, r) => acc + r.rowCount, 0),
      });
    } catch (error) {
      if (!(error instanceof CatalogError)) {
        throw error;
      }
      pipelineLogger.error(
        { countryCode, action: error.action, error: error.message },
        "Failed to publish dataset"
      );
      summary.failed.push({ countryCode, error: error.message });
    }
  }

  pipelineLogger.info(
    {
      groups: summary.groups,
      published: summary.published.length,
      skipped: summary.skipped.length,
      failed: summary.failed.length,
    },
    "Pipeline finished"
  );

  return summary;
}
