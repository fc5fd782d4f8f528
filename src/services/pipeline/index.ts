// Pipeline - Re-exports
export {
  parseDate,
  normalizeDate,
  getDateRange,
  formatTimePeriod,
  type DateParseResult,
} from "./dates.js";
export { fetchRecords, readPage, PAGE_SIZE } from "./fetcher.js";
export {
  CountryAggregator,
  countryCodeOf,
  DEFAULT_FLUSH_THRESHOLD,
  type AggregatorOptions,
  type RecordSource,
} from "./aggregator.js";
export { DatasetAssembler, capitalize, resourceName } from "./assembler.js";
export {
  runPipeline,
  type PipelineDeps,
  type RunOptions,
  type RunSummary,
  type PublishedDataset,
} from "./runner.js";
