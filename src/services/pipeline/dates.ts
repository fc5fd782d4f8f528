import { format, isValid, parse, parseISO } from "date-fns";

import { DATE_FIELD } from "../../types/index.js";

import type { FieldValue, PriceRecord, TimePeriod } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type DateParseResult =
  | { kind: "date"; date: Date; iso: string }
  | { kind: "raw"; raw: string }
  | { kind: "missing" };

const ISO_DATE = "yyyy-MM-dd";

const FALLBACK_FORMATS = [
  "yyyy-MM-dd HH:mm:ss",
  "dd/MM/yyyy",
  "MMM yyyy",
  "MMMM yyyy",
  "yyyy-MM",
];

// Years outside this window come from a misread format, not real data
const MIN_YEAR = 1900;
const MAX_YEAR = 2100;

// Zone designator trailing a time of day: "Z", "+02", "-05:00", "+0530"
const ZONE_SUFFIX = /(\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)\s*(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Drop the zone so the calendar day written in the value is the one kept,
 * whatever the host's time zone
 */
function wallClock(text: string): string {
  return text.replace(ZONE_SUFFIX, "$1");
}

function plausible(date: Date): boolean {
  if (!isValid(date)) return false;
  const year = date.getFullYear();
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

function toResult(date: Date): DateParseResult {
  return { kind: "date", date, iso: format(date, ISO_DATE) };
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Best-effort parse of a date value. Never throws: text that matches no
 * known form comes back as `raw` so callers keep the original value.
 */
export function parseDate(
  value: FieldValue | undefined,
  dateFormat?: string
): DateParseResult {
  if (value === null || value === undefined || typeof value === "boolean") {
    return { kind: "missing" };
  }

  const text = String(value).trim();
  if (text === "") {
    return { kind: "missing" };
  }

  const reference = new Date(2000, 0, 1);

  if (dateFormat !== undefined) {
    const custom = parse(text, dateFormat, reference);
    if (plausible(custom)) return toResult(custom);
  }

  const iso = parseISO(wallClock(text));
  if (plausible(iso)) return toResult(iso);

  for (const fallback of FALLBACK_FORMATS) {
    const parsed = parse(text, fallback, reference);
    if (plausible(parsed)) return toResult(parsed);
  }

  return { kind: "raw", raw: text };
}

/**
 * Canonical field value for a date: `YYYY-MM-DD` when it parses, the
 * original text when it does not, null when absent.
 */
export function normalizeDate(
  value: FieldValue | undefined,
  dateFormat?: string
): FieldValue {
  const result = parseDate(value, dateFormat);
  switch (result.kind) {
    case "date":
      return result.iso;
    case "raw":
      return result.raw;
    case "missing":
      return null;
  }
}

// ============================================================================
// Ranges
// ============================================================================

/**
 * Earliest and latest parseable date over a set of records. Records whose
 * date is missing or unparseable do not take part.
 */
export function getDateRange(
  records: Iterable<PriceRecord>,
  field = DATE_FIELD
): TimePeriod {
  let start: string | undefined;
  let end: string | undefined;

  for (const record of records) {
    const result = parseDate(record[field]);
    if (result.kind !== "date") continue;

    if (start === undefined || result.iso < start) start = result.iso;
    if (end === undefined || result.iso > end) end = result.iso;
  }

  return { start, end };
}

/**
 * Render a time period as a catalog date range, from the start of the
 * first day to the end of the last
 */
export function formatTimePeriod(period: TimePeriod): string | undefined {
  if (period.start === undefined || period.end === undefined) {
    return undefined;
  }
  return `[${period.start}T00:00:00 TO ${period.end}T23:59:59]`;
}
