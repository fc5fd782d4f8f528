import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { stringify } from "csv-stringify/sync";

import type { FieldValue, PriceRecord } from "../types/index.js";

function cell(value: FieldValue | undefined): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

/**
 * Render rows as CSV text, one column per header in header order
 */
export function toCsv(headers: string[], rows: Iterable<PriceRecord>): string {
  const lines: string[][] = [headers];
  for (const row of rows) {
    lines.push(headers.map((header) => cell(row[header])));
  }
  return stringify(lines, { record_delimiter: "unix" });
}

/**
 * Write rows to `<folder>/<filename>` and return the file path
 */
export async function writeCsv(
  folder: string,
  filename: string,
  headers: string[],
  rows: Iterable<PriceRecord>
): Promise<string> {
  await mkdir(folder, { recursive: true });
  const filePath = join(folder, filename);
  await writeFile(filePath, toCsv(headers, rows), "utf8");
  return filePath;
}
