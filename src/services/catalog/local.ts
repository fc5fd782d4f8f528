import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { catalogLogger } from "../../logger.js";
import { buildPackage, buildResource, type PackageOwner } from "./package.js";

import type { CatalogPublisher, PublishResult } from "./types.js";
import type { DatasetStatic } from "../../config.js";
import type { DatasetDraft } from "../../types/index.js";

/**
 * Writes each dataset as a JSON manifest instead of publishing it
 */
export class LocalCatalog implements CatalogPublisher {
  constructor(
    private readonly outDir: string,
    private readonly staticMeta: DatasetStatic = {},
    private readonly owner: PackageOwner = {}
  ) {}

  async publish(draft: DatasetDraft): Promise<PublishResult> {
    await mkdir(this.outDir, { recursive: true });

    const manifest = {
      package: buildPackage(draft, this.staticMeta, this.owner),
      resources: draft.resources.map((resource) => ({
        ...buildResource(resource),
        file: resource.filePath,
        rows: resource.rowCount,
      })),
    };

    const target = join(this.outDir, `${draft.name}.json`);
    await writeFile(target, `${JSON.stringify(manifest, null, 2)}\n`, "utf8");
    catalogLogger.info({ name: draft.name, target }, "Wrote dataset manifest");

    return { name: draft.name, action: "written", target };
  }
}
