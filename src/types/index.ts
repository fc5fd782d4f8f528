/**
 * Types for the Real Time Prices API and the datasets built from it
 */

// ============================================================================
// Remote API
// ============================================================================

export type FieldValue = string | number | boolean | null;

/**
 * One observation as delivered by the API. Key order is significant: it
 * becomes the CSV header of the resource the record ends up in.
 */
export type PriceRecord = Record<string, FieldValue>;

export interface ApiPage {
  total?: number;
  data?: PriceRecord[];
}

/** Indicator collection identifier, e.g. "food", "energy", "currency" */
export type Model = string;

export const COUNTRY_FIELD = "ISO3";
export const DATE_FIELD = "DATES";
export const UNKNOWN_COUNTRY = "Unknown";

// ============================================================================
// Aggregation
// ============================================================================

export interface CountryGroup {
  countryCode: string;
  /** Records per model, in order of the model's first appearance */
  models: Map<Model, PriceRecord[]>;
}

export type FlushPolicy = "threshold" | "none";

// ============================================================================
// Dataset drafts
// ============================================================================

export interface TimePeriod {
  start?: string;
  end?: string;
}

export interface ResourceDraft {
  name: string;
  description: string;
  format: "csv";
  model: Model;
  filePath: string;
  rowCount: number;
}

export interface DatasetDraft {
  name: string;
  title: string;
  countryCode: string;
  countryName: string;
  location: string;
  timePeriod: TimePeriod;
  tags: string[];
  subnational: boolean;
  resources: ResourceDraft[];
}
