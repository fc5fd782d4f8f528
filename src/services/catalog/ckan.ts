/**
 * CKAN action API publisher
 *
 * Creates or updates one package per dataset draft, then uploads every
 * generated CSV as a resource of that package. Updating sends an empty
 * resource list first, so a republished dataset carries only the
 * resources of the latest draft.
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";

import { CatalogError } from "../../errors.js";
import { catalogLogger } from "../../logger.js";
import { buildPackage, buildResource, type PackageOwner } from "./package.js";

import type { CatalogPublisher, PublishResult } from "./types.js";
import type { DatasetStatic } from "../../config.js";
import type { DatasetDraft } from "../../types/index.js";

export interface CkanCatalogOptions extends PackageOwner {
  baseUrl: string;
  apiKey?: string;
  staticMeta?: DatasetStatic;
}

interface ActionResponse {
  success: boolean;
  result?: unknown;
  error?: unknown;
}

function isActionResponse(value: unknown): value is ActionResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "success" in value &&
    typeof value.success === "boolean"
  );
}

export class CkanCatalog implements CatalogPublisher {
  private readonly baseUrl: string;

  constructor(private readonly options: CkanCatalogOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  async publish(draft: DatasetDraft): Promise<PublishResult> {
    const pkg = buildPackage(draft, this.options.staticMeta, this.options);
    const exists = await this.packageExists(draft.name);

    if (exists) {
      await this.action("package_update", { ...pkg, resources: [] });
    } else {
      await this.action("package_create", pkg);
    }

    for (const resource of draft.resources) {
      const form = new FormData();
      form.set("package_id", draft.name);
      for (const [key, value] of Object.entries(buildResource(resource))) {
        form.set(key, value);
      }
      const content = await readFile(resource.filePath);
      form.set(
        "upload",
        new Blob([content], { type: "text/csv" }),
        basename(resource.filePath)
      );
      await this.action("resource_create", form);
    }

    const action = exists ? "updated" : "created";
    catalogLogger.info(
      { name: draft.name, action, resources: draft.resources.length },
      "Published dataset"
    );

    return {
      name: draft.name,
      action,
      target: `${this.baseUrl}/dataset/${draft.name}`,
    };
  }

  private async packageExists(name: string): Promise<boolean> {
    const response = await this.send("package_show", { id: name });
    if (response.status === 404) {
      return false;
    }
    await this.readResult("package_show", response);
    return true;
  }

  private async action(
    name: string,
    body: Record<string, unknown> | FormData
  ): Promise<unknown> {
    const response = await this.send(name, body);
    return this.readResult(name, response);
  }

  private async send(
    name: string,
    body: Record<string, unknown> | FormData
  ): Promise<Response> {
    const url = `${this.baseUrl}/api/3/action/${name}`;
    const headers: Record<string, string> = {};
    if (this.options.apiKey !== undefined && this.options.apiKey !== "") {
      headers.Authorization = this.options.apiKey;
    }

    let payload: FormData | string;
    if (body instanceof FormData) {
      payload = body;
    } else {
      headers["Content-Type"] = "application/json";
      payload = JSON.stringify(body);
    }

    catalogLogger.debug({ url }, "Calling catalog action");
    try {
      return await fetch(url, { method: "POST", headers, body: payload });
    } catch (error) {
      throw new CatalogError(
        `Catalog action ${name} failed: ${error instanceof Error ? error.message : String(error)}`,
        name
      );
    }
  }

  private async readResult(name: string, response: Response): Promise<unknown> {
    let data: unknown;
    try {
      data = await response.json();
    } catch {
      throw new CatalogError(
        `Catalog action ${name} returned a non-JSON response (${String(response.status)})`,
        name,
        response.status
      );
    }

    if (!response.ok || !isActionResponse(data) || !data.success) {
      const detail = isActionResponse(data)
        ? JSON.stringify(data.error ?? null)
        : response.statusText;
      throw new CatalogError(
        `Catalog action ${name} failed (${String(response.status)}): ${detail}`,
        name,
        response.status
      );
    }

    return data.result;
  }
}
