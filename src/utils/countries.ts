/**
 * Country code lookups
 */

import countries from "i18n-iso-countries";

import { LocationError } from "../errors.js";

export interface CountryLookup {
  /** Display name for an ISO3 code, undefined when the code is unknown */
  getName(code: string): string | undefined;
  /** Catalog location id for an ISO3 code; throws LocationError */
  getLocation(code: string): string;
}

const ALPHA3_PATTERN = /^[A-Z]{3}$/;

export class IsoCountryLookup implements CountryLookup {
  private readonly overrides: Map<string, string>;

  constructor(overrides: Record<string, string> = {}) {
    this.overrides = new Map(
      Object.entries(overrides).map(([code, name]) => [code.toUpperCase(), name])
    );
  }

  getName(code: string): string | undefined {
    const upper = code.toUpperCase();
    const override = this.overrides.get(upper);
    if (override !== undefined) {
      return override;
    }
    if (!ALPHA3_PATTERN.test(upper)) {
      return undefined;
    }
    return countries.getName(upper, "en");
  }

  getLocation(code: string): string {
    const upper = code.toUpperCase();
    if (!ALPHA3_PATTERN.test(upper) || !countries.isValid(upper)) {
      throw new LocationError(code);
    }
    return upper.toLowerCase();
  }
}
