/**
 * Error types shared across the loader
 */

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ConfigError";
    this.details = details;
  }
}

export class DownloadError extends Error {
  code = "DOWNLOAD_ERROR" as const;
  url: string;
  status?: number;

  constructor(message: string, url: string, status?: number) {
    super(message);
    this.name = "DownloadError";
    this.url = url;
    this.status = status;
  }
}

export class LocationError extends Error {
  code = "LOCATION_ERROR" as const;
  countryCode: string;

  constructor(countryCode: string) {
    super(`Country location not found: ${countryCode}`);
    this.name = "LocationError";
    this.countryCode = countryCode;
  }
}

export class CatalogError extends Error {
  code = "CATALOG_ERROR" as const;
  action: string;
  status?: number;

  constructor(message: string, action: string, status?: number) {
    super(message);
    this.name = "CatalogError";
    this.action = action;
    this.status = status;
  }
}
