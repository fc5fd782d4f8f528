import { formatTimePeriod } from "../pipeline/dates.js";

import type { CatalogPackage, CatalogResource } from "./types.js";
import type { DatasetStatic } from "../../config.js";
import type { DatasetDraft, ResourceDraft } from "../../types/index.js";

export interface PackageOwner {
  ownerOrg?: string;
  maintainer?: string;
}

/**
 * Catalog package for a draft. Static metadata comes first so the draft's
 * own fields always win.
 */
export function buildPackage(
  draft: DatasetDraft,
  staticMeta: DatasetStatic = {},
  owner: PackageOwner = {}
): CatalogPackage {
  const pkg: CatalogPackage = {
    ...staticMeta,
    name: draft.name,
    title: draft.title,
    tags: draft.tags.map((name) => ({ name })),
    groups: [{ name: draft.location }],
    subnational: draft.subnational ? "1" : "0",
  };

  const datasetDate = formatTimePeriod(draft.timePeriod);
  if (datasetDate !== undefined) {
    pkg.dataset_date = datasetDate;
  }
  if (owner.ownerOrg !== undefined && owner.ownerOrg !== "") {
    pkg.owner_org = owner.ownerOrg;
  }
  if (owner.maintainer !== undefined && owner.maintainer !== "") {
    pkg.maintainer = owner.maintainer;
  }

  return pkg;
}

export function buildResource(resource: ResourceDraft): CatalogResource {
  return {
    name: resource.name,
    description: resource.description,
    format: resource.format,
    resource_type: "file.upload",
    url_type: "upload",
  };
}
