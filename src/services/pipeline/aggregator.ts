/**
 * Country Aggregator
 *
 * Drains one record stream per model, in order, and buckets the records by
 * country. Under the "threshold" policy a country whose buffered records
 * (summed over every model seen so far) reach the threshold is emitted
 * straight away and its bucket dropped, so the same country can be emitted
 * more than once in a run: once per threshold crossing plus once at the end
 * if anything is left. Under "none" every country is emitted exactly once,
 * after all streams are drained.
 */

import { pipelineLogger } from "../../logger.js";
import {
  COUNTRY_FIELD,
  DATE_FIELD,
  UNKNOWN_COUNTRY,
  type CountryGroup,
  type FlushPolicy,
  type Model,
  type PriceRecord,
} from "../../types/index.js";
import { normalizeDate } from "./dates.js";

export const DEFAULT_FLUSH_THRESHOLD = 10_000;

export type RecordSource = (
  model: Model,
  maxRecords?: number
) => AsyncIterable<PriceRecord>;

export interface AggregatorOptions {
  flushPolicy?: FlushPolicy;
  flushThreshold?: number;
}

interface CountryBucket {
  models: Map<Model, PriceRecord[]>;
  size: number;
}

/**
 * Partition key of a record; absent or blank codes share one bucket
 */
export function countryCodeOf(record: PriceRecord): string {
  const value = record[COUNTRY_FIELD];
  if (value === null || value === undefined) return UNKNOWN_COUNTRY;
  const code = String(value).trim();
  return code === "" ? UNKNOWN_COUNTRY : code;
}

export class CountryAggregator {
  private readonly buckets = new Map<string, CountryBucket>();
  private readonly flushPolicy: FlushPolicy;
  private readonly flushThreshold: number;

  constructor(
    private readonly source: RecordSource,
    options: AggregatorOptions = {}
  ) {
    this.flushPolicy = options.flushPolicy ?? "threshold";
    this.flushThreshold = options.flushThreshold ?? DEFAULT_FLUSH_THRESHOLD;

    if (!Number.isInteger(this.flushThreshold) || this.flushThreshold < 1) {
      throw new RangeError(
        `Flush threshold must be a positive integer, got ${String(this.flushThreshold)}`
      );
    }
  }

  /**
   * Number of records currently buffered for a country
   */
  bufferedCount(countryCode: string): number {
    return this.buckets.get(countryCode)?.size ?? 0;
  }

  async *aggregate(
    models: Model[],
    maxRecords?: number
  ): AsyncGenerator<CountryGroup> {
    this.buckets.clear();

    for (const model of models) {
      let count = 0;

      for await (const record of this.source(model, maxRecords)) {
        record[DATE_FIELD] = normalizeDate(record[DATE_FIELD]);
        const countryCode = countryCodeOf(record);
        const bucket = this.add(countryCode, model, record);
        count++;

        if (
          this.flushPolicy === "threshold" &&
          bucket.size >= this.flushThreshold
        ) {
          pipelineLogger.info(
            { countryCode, records: bucket.size },
            "Country buffer reached threshold, flushing"
          );
          this.buckets.delete(countryCode);
          yield this.toGroup(countryCode, bucket);
        }
      }

      pipelineLogger.info({ model, records: count }, "Model stream drained");
    }

    for (const [countryCode, bucket] of this.buckets) {
      if (bucket.size === 0) continue;
      yield this.toGroup(countryCode, bucket);
    }
    this.buckets.clear();
  }

  private add(
    countryCode: string,
    model: Model,
    record: PriceRecord
  ): CountryBucket {
    let bucket = this.buckets.get(countryCode);
    if (bucket === undefined) {
      bucket = { models: new Map(), size: 0 };
      this.buckets.set(countryCode, bucket);
    }

    const records = bucket.models.get(model);
    if (records === undefined) {
      bucket.models.set(model, [record]);
    } else {
      records.push(record);
    }
    bucket.size++;

    return bucket;
  }

  private toGroup(countryCode: string, bucket: CountryBucket): CountryGroup {
    const models = new Map<Model, PriceRecord[]>();
    for (const [model, records] of bucket.models) {
      if (records.length > 0) models.set(model, records);
    }
    return { countryCode, models };
  }
}
