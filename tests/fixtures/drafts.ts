import type { DatasetDraft } from "../../src/types/index.js";

export function afghanistanDraft(
  filePaths: { energy: string; currency: string } = {
    energy: "/tmp/energy.csv",
    currency: "/tmp/currency.csv",
  }
): DatasetDraft {
  return {
    name: "afghanistan-real-time-prices",
    title: "Afghanistan - Real Time Prices",
    countryCode: "AFG",
    countryName: "Afghanistan",
    location: "afg",
    timePeriod: { start: "2007-01-01", end: "2025-07-01" },
    tags: ["energy", "food security"],
    subnational: true,
    resources: [
      {
        name: "Real Time Energy Prices for Afghanistan",
        description: "Modeled monthly energy price estimates",
        format: "csv",
        model: "energy",
        filePath: filePaths.energy,
        rowCount: 2,
      },
      {
        name: "Real Time Currency Prices for Afghanistan",
        description: "Modeled monthly currency exchange rate estimates",
        format: "csv",
        model: "currency",
        filePath: filePaths.currency,
        rowCount: 3,
      },
    ],
  };
}
