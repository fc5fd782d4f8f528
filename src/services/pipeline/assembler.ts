import slugify from "@sindresorhus/slugify";

import { getModelConfig, type ProjectConfig } from "../../config.js";
import { LocationError } from "../../errors.js";
import { pipelineLogger } from "../../logger.js";
import { writeCsv } from "../../utils/csv.js";
import { getDateRange } from "./dates.js";

import type {
  DatasetDraft,
  Model,
  PriceRecord,
  ResourceDraft,
} from "../../types/index.js";
import type { CountryLookup } from "../../utils/countries.js";

/**
 * "food" -> "Food", "CURRENCY" -> "Currency"
 */
export function capitalize(value: string): string {
  if (value === "") return value;
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

export function resourceName(model: Model, countryName: string): string {
  return `Real Time ${capitalize(model)} Prices for ${countryName}`;
}

/**
 * Builds one dataset draft per country, writing a CSV per model into the
 * working directory
 */
export class DatasetAssembler {
  constructor(
    private readonly config: ProjectConfig,
    private readonly countries: CountryLookup,
    private readonly workDir: string
  ) {}

  async generateDataset(
    countryCode: string,
    models: Map<Model, PriceRecord[]>
  ): Promise<DatasetDraft | null> {
    const countryName = this.countries.getName(countryCode);
    if (countryName === undefined) {
      pipelineLogger.warn({ countryCode }, `Unknown ISO3: ${countryCode}`);
      return null;
    }

    const title = `${countryName} - ${this.config.title}`;
    const name = slugify(title);

    let location: string;
    try {
      location = this.countries.getLocation(countryCode);
    } catch (error) {
      if (error instanceof LocationError) {
        pipelineLogger.error(
          { countryCode, countryName },
          `Couldn't find country ${countryName}, skipping`
        );
        return null;
      }
      throw error;
    }

    const timePeriod = getDateRange(
      [...models.values()].flatMap((records) => records)
    );

    const resources: ResourceDraft[] = [];
    for (const [model, records] of models) {
      const first = records[0];
      if (first === undefined) continue;

      const { description } = getModelConfig(this.config, model);
      const resource = resourceName(model, countryName);
      const filePath = await writeCsv(
        this.workDir,
        `${slugify(resource)}.csv`,
        Object.keys(first),
        records
      );

      resources.push({
        name: resource,
        description,
        format: "csv",
        model,
        filePath,
        rowCount: records.length,
      });
    }

    pipelineLogger.debug(
      { countryCode, name, resources: resources.length, timePeriod },
      "Assembled dataset"
    );

    return {
      name,
      title,
      countryCode,
      countryName,
      location,
      timePeriod,
      tags: [...this.config.tags],
      subnational: true,
      resources,
    };
  }
}
