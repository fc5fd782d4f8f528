import { describe, it, expect, vi } from "vitest";

import {
  CountryAggregator,
  countryCodeOf,
  DEFAULT_FLUSH_THRESHOLD,
} from "../../../../src/services/pipeline/aggregator.js";
import { priceRecord } from "../../../fixtures/prices.js";
import { recordSource } from "../../../mocks/retriever.js";

import type { CountryGroup, PriceRecord } from "../../../../src/types/index.js";

// Mock the logger
vi.mock("../../../../src/logger.js", () => ({
  pipelineLogger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

async function collect(
  iterable: AsyncIterable<CountryGroup>
): Promise<CountryGroup[]> {
  const groups: CountryGroup[] = [];
  for await (const group of iterable) {
    groups.push(group);
  }
  return groups;
}

function summarize(groups: CountryGroup[]): [string, Record<string, number>][] {
  return groups.map((group) => [
    group.countryCode,
    Object.fromEntries(
      [...group.models].map(([model, records]) => [model, records.length])
    ),
  ]);
}

const r = (iso3: string | null, id: number): PriceRecord =>
  priceRecord(iso3, "2020-01-01", { id });

describe("services/pipeline/aggregator", () => {
  describe("countryCodeOf", () => {
    it("should read the ISO3 field", () => {
      expect(countryCodeOf(r("AFG", 1))).toBe("AFG");
    });

    it("should fall back to Unknown for absent or blank codes", () => {
      expect(countryCodeOf({ DATES: "2020-01-01" })).toBe("Unknown");
      expect(countryCodeOf(r(null, 1))).toBe("Unknown");
      expect(countryCodeOf(r("  ", 1))).toBe("Unknown");
    });
  });

  describe("aggregate", () => {
    it("should group records by country across models", async () => {
      const aggregator = new CountryAggregator(
        recordSource({
          food: [r("AFG", 1), r("YEM", 2)],
          energy: [r("AFG", 3)],
        })
      );

      const groups = await collect(aggregator.aggregate(["food", "energy"]));

      expect(summarize(groups)).toEqual([
        ["AFG", { food: 1, energy: 1 }],
        ["YEM", { food: 1 }],
      ]);
    });

    it("should keep models in order of first appearance per country", async () => {
      const aggregator = new CountryAggregator(
        recordSource({
          food: [r("YEM", 1)],
          energy: [r("AFG", 2)],
          currency: [r("AFG", 3), r("YEM", 4)],
        })
      );

      const groups = await collect(
        aggregator.aggregate(["food", "energy", "currency"])
      );

      expect(groups.map((g) => [g.countryCode, [...g.models.keys()]])).toEqual(
        [
          ["YEM", ["food", "currency"]],
          ["AFG", ["energy", "currency"]],
        ]
      );
    });

    it("should normalize dates before bucketing", async () => {
      const aggregator = new CountryAggregator(
        recordSource({
          food: [priceRecord("AFG", "01/07/2025"), priceRecord("AFG", "n/a")],
        })
      );

      const [group] = await collect(aggregator.aggregate(["food"]));

      expect(group?.models.get("food")?.map((rec) => rec.DATES)).toEqual([
        "2025-07-01",
        "n/a",
      ]);
    });

    it("should bucket records without a country under Unknown", async () => {
      const aggregator = new CountryAggregator(
        recordSource({ food: [r(null, 1), r("AFG", 2), r("", 3)] })
      );

      const groups = await collect(aggregator.aggregate(["food"]));

      expect(summarize(groups)).toEqual([
        ["Unknown", { food: 2 }],
        ["AFG", { food: 1 }],
      ]);
    });

    it("should omit models that produced no records", async () => {
      const aggregator = new CountryAggregator(
        recordSource({ food: [r("AFG", 1)], energy: [], currency: [] })
      );

      const groups = await collect(
        aggregator.aggregate(["food", "energy", "currency"])
      );

      expect(groups).toHaveLength(1);
      expect([...(groups[0]?.models.keys() ?? [])]).toEqual(["food"]);
    });

    it("should default to a threshold of 10,000", () => {
      expect(DEFAULT_FLUSH_THRESHOLD).toBe(10_000);
    });

    it("should reject a non-positive threshold", () => {
      expect(
        () => new CountryAggregator(recordSource({}), { flushThreshold: 0 })
      ).toThrow(RangeError);
    });
  });

  describe("threshold flush", () => {
    const streams = () => ({
      food: [r("AFG", 1), r("AFG", 2), r("YEM", 3), r("AFG", 4), r("AFG", 5)],
      energy: [r("AFG", 6)],
    });

    it("should flush a country before the stream ends and clear its buffer", async () => {
      const aggregator = new CountryAggregator(recordSource(streams()), {
        flushThreshold: 3,
      });
      const iterator = aggregator.aggregate(["food", "energy"]);

      const first = await iterator.next();
      const group = first.done === true ? undefined : first.value;

      expect(group?.countryCode).toBe("AFG");
      expect(group?.models.get("food")?.map((rec) => rec.id)).toEqual([
        1, 2, 4,
      ]);
      expect(aggregator.bufferedCount("AFG")).toBe(0);
      expect(aggregator.bufferedCount("YEM")).toBe(1);

      await iterator.return(undefined);
    });

    it("should emit the same country again after a flush", async () => {
      const aggregator = new CountryAggregator(recordSource(streams()), {
        flushThreshold: 3,
      });

      const groups = await collect(aggregator.aggregate(["food", "energy"]));

      expect(summarize(groups)).toEqual([
        ["AFG", { food: 3 }],
        ["YEM", { food: 1 }],
        ["AFG", { food: 1, energy: 1 }],
      ]);
    });

    it("should count records across models towards the threshold", async () => {
      const aggregator = new CountryAggregator(
        recordSource({
          food: [r("AFG", 1), r("AFG", 2)],
          energy: [r("AFG", 3)],
        }),
        { flushThreshold: 3 }
      );

      const groups = await collect(aggregator.aggregate(["food", "energy"]));

      expect(summarize(groups)).toEqual([["AFG", { food: 2, energy: 1 }]]);
    });

    it("should emit each country once when the policy is none", async () => {
      const aggregator = new CountryAggregator(recordSource(streams()), {
        flushPolicy: "none",
        flushThreshold: 3,
      });

      const groups = await collect(aggregator.aggregate(["food", "energy"]));

      expect(summarize(groups)).toEqual([
        ["AFG", { food: 4, energy: 1 }],
        ["YEM", { food: 1 }],
      ]);
    });

    it("should neither lose nor duplicate records across flushes", async () => {
      const countries = ["AFG", "YEM", "SOM"];
      const input = {
        food: Array.from({ length: 40 }, (_, i) => r(countries[i % 3] ?? "", i)),
        energy: Array.from({ length: 25 }, (_, i) =>
          r(countries[(i * 7) % 3] ?? "", 100 + i)
        ),
      };
      const aggregator = new CountryAggregator(recordSource(input), {
        flushThreshold: 4,
      });

      const groups = await collect(aggregator.aggregate(["food", "energy"]));

      for (const model of ["food", "energy"] as const) {
        const seen = groups
          .flatMap((g) => g.models.get(model) ?? [])
          .map((rec) => Number(rec.id))
          .sort((a, b) => a - b);
        expect(seen).toEqual(input[model].map((rec) => Number(rec.id)));
      }
      expect(groups.length).toBeGreaterThan(countries.length);
    });
  });
});
