import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

import slugify from "@sindresorhus/slugify";

import { DownloadError } from "../errors.js";
import { apiLogger } from "../logger.js";

const DEFAULT_RATE_LIMIT_MS = 250;
const DEFAULT_SAVED_DIR = "saved_data";

/**
 * Source of decoded JSON documents. The pipeline only depends on this, so
 * tests can serve canned pages without touching the network.
 */
export interface Retriever {
  downloadJson(url: string): Promise<unknown>;
}

export interface HttpRetrieverOptions {
  /** Minimum delay between two requests */
  rateLimitMs?: number;
  /** Write every downloaded document under savedDir */
  save?: boolean;
  /** Read documents from savedDir instead of the network */
  useSaved?: boolean;
  savedDir?: string;
  userAgent?: string;
}

/**
 * Build the URL of one page of a model endpoint
 */
export function buildPageUrl(
  baseUrl: string,
  path: string,
  limit: number,
  offset: number
): string {
  return `${baseUrl}${path}?limit=${String(limit)}&offset=${String(offset)}`;
}

/**
 * File name under which a downloaded document is saved
 */
export function savedFileName(url: string): string {
  const withoutScheme = url.replace(/^[a-z]+:\/\//i, "");
  return `${slugify(withoutScheme)}.json`;
}

export class HttpRetriever implements Retriever {
  private lastRequestTime = 0;
  private readonly rateLimitMs: number;
  private readonly save: boolean;
  private readonly useSaved: boolean;
  private readonly savedDir: string;
  private readonly userAgent: string;

  constructor(options: HttpRetrieverOptions = {}) {
    this.rateLimitMs = options.rateLimitMs ?? DEFAULT_RATE_LIMIT_MS;
    this.save = options.save ?? false;
    this.useSaved = options.useSaved ?? false;
    this.savedDir =
      options.savedDir ?? process.env.RTP_SAVED_DIR ?? DEFAULT_SAVED_DIR;
    this.userAgent = options.userAgent ?? "rtp-loader";
  }

  async downloadJson(url: string): Promise<unknown> {
    const savedPath = join(this.savedDir, savedFileName(url));

    if (this.useSaved) {
      apiLogger.debug({ url, savedPath }, "Reading saved response");
      return this.readSaved(url, savedPath);
    }

    const response = await this.rateLimitedFetch(url);
    if (!response.ok) {
      apiLogger.error(
        { url, status: response.status, statusText: response.statusText },
        "Request to price API failed"
      );
      throw new DownloadError(
        `Failed to download ${url}: ${String(response.status)} ${response.statusText}`,
        url,
        response.status
      );
    }

    const text = await response.text();
    const data = this.decode(url, text);

    if (this.save) {
      await mkdir(this.savedDir, { recursive: true });
      await writeFile(savedPath, text, "utf8");
      apiLogger.debug({ url, savedPath }, "Saved response");
    }

    return data;
  }

  private async readSaved(url: string, savedPath: string): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(savedPath, "utf8");
    } catch (error) {
      throw new DownloadError(
        `No saved response for ${url} at ${savedPath}: ${error instanceof Error ? error.message : String(error)}`,
        url
      );
    }
    return this.decode(url, text);
  }

  private decode(url: string, text: string): unknown {
    try {
      return JSON.parse(text) as unknown;
    } catch (error) {
      throw new DownloadError(
        `Invalid JSON from ${url}: ${error instanceof Error ? error.message : String(error)}`,
        url
      );
    }
  }

  private async rateLimitedFetch(url: string): Promise<Response> {
    const elapsed = Date.now() - this.lastRequestTime;

    if (elapsed < this.rateLimitMs) {
      const waitTime = this.rateLimitMs - elapsed;
      apiLogger.debug({ waitTime }, "Rate limiting: waiting before request");
      await new Promise((resolve) => setTimeout(resolve, waitTime));
    }

    this.lastRequestTime = Date.now();
    apiLogger.debug({ url }, "Sending request to price API");

    const startTime = performance.now();
    let response: Response;
    try {
      response = await fetch(url, {
        headers: { accept: "application/json", "user-agent": this.userAgent },
      });
    } catch (error) {
      throw new DownloadError(
        `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        url
      );
    }
    const duration = Math.round(performance.now() - startTime);

    apiLogger.debug(
      {
        url,
        status: response.status,
        duration: `${String(duration)}ms`,
      },
      "Received response from price API"
    );

    return response;
  }
}
