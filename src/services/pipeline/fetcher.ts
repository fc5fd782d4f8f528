import { getModelConfig, type ProjectConfig } from "../../config.js";
import { apiLogger } from "../../logger.js";
import { buildPageUrl, type Retriever } from "../../scraper/client.js";

import type {
  ApiPage,
  FieldValue,
  Model,
  PriceRecord,
} from "../../types/index.js";

export const PAGE_SIZE = 1000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toFieldValue(value: unknown): FieldValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  return value === undefined ? null : JSON.stringify(value);
}

// Keeps key order, nested values are flattened to JSON text
function toPriceRecord(value: Record<string, unknown>): PriceRecord {
  const record: PriceRecord = {};
  for (const [key, field] of Object.entries(value)) {
    record[key] = toFieldValue(field);
  }
  return record;
}

/**
 * Read the parts of a page response the fetcher relies on. Anything that
 * is not an object, or has no `data` list, counts as an empty page.
 */
export function readPage(response: unknown): ApiPage {
  if (!isRecord(response)) {
    return {};
  }

  const page: ApiPage = {};
  if (typeof response.total === "number") {
    page.total = response.total;
  }
  if (Array.isArray(response.data)) {
    page.data = response.data.filter(isRecord).map(toPriceRecord);
  }
  return page;
}

/**
 * Iterate every record of a model endpoint, one page at a time.
 *
 * The total is unknown until the first page arrives. When `maxRecords` is
 * given it replaces the server's total, which bounds the run to roughly
 * that many records (whole pages are still yielded).
 */
export async function* fetchRecords(
  config: ProjectConfig,
  retriever: Retriever,
  model: Model,
  maxRecords?: number
): AsyncGenerator<PriceRecord> {
  const { path } = getModelConfig(config, model);
  const limit = PAGE_SIZE;
  let offset = 0;
  let total = maxRecords;

  for (;;) {
    const url = buildPageUrl(config.base_url, path, limit, offset);
    const page = readPage(await retriever.downloadJson(url));

    if (total === undefined) {
      total = page.total ?? 0;
      apiLogger.info({ model, total }, "Fetching model records");
    }

    const batch = page.data ?? [];
    apiLogger.debug(
      { model, offset, batchSize: batch.length },
      "Fetched page"
    );
    if (batch.length === 0) {
      break;
    }

    yield* batch;

    offset += limit;
    if (offset >= total) {
      break;
    }
  }
}
