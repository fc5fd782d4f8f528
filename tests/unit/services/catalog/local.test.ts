import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { LocalCatalog } from "../../../../src/services/catalog/local.js";
import { afghanistanDraft } from "../../../fixtures/drafts.js";

// Mock the logger
vi.mock("../../../../src/logger.js", () => ({
  catalogLogger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe("services/catalog/local", () => {
  let outDir: string;

  beforeEach(async () => {
    outDir = await mkdtemp(join(tmpdir(), "local-catalog-test-"));
  });

  afterEach(async () => {
    await rm(outDir, { recursive: true, force: true });
  });

  it("should write a manifest named after the dataset", async () => {
    const catalog = new LocalCatalog(join(outDir, "manifests"), {
      license_id: "cc-by",
    });

    const result = await catalog.publish(afghanistanDraft());

    const target = join(outDir, "manifests", "afghanistan-real-time-prices.json");
    expect(result).toEqual({
      name: "afghanistan-real-time-prices",
      action: "written",
      target,
    });

    const manifest: unknown = JSON.parse(await readFile(target, "utf8"));
    expect(manifest).toEqual({
      package: {
        license_id: "cc-by",
        name: "afghanistan-real-time-prices",
        title: "Afghanistan - Real Time Prices",
        dataset_date: "[2007-01-01T00:00:00 TO 2025-07-01T23:59:59]",
        tags: [{ name: "energy" }, { name: "food security" }],
        groups: [{ name: "afg" }],
        subnational: "1",
      },
      resources: [
        {
          name: "Real Time Energy Prices for Afghanistan",
          description: "Modeled monthly energy price estimates",
          format: "csv",
          resource_type: "file.upload",
          url_type: "upload",
          file: "/tmp/energy.csv",
          rows: 2,
        },
        {
          name: "Real Time Currency Prices for Afghanistan",
          description: "Modeled monthly currency exchange rate estimates",
          format: "csv",
          resource_type: "file.upload",
          url_type: "upload",
          file: "/tmp/currency.csv",
          rows: 3,
        },
      ],
    });
  });
});
