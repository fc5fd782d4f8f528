import type { DatasetDraft } from "../../types/index.js";

export type PublishAction = "created" | "updated" | "written";

export interface PublishResult {
  name: string;
  action: PublishAction;
  /** Where the dataset ended up: a catalog URL or a manifest path */
  target: string;
}

export interface CatalogPublisher {
  publish(draft: DatasetDraft): Promise<PublishResult>;
}

export interface CatalogTag {
  name: string;
}

export interface CatalogPackage extends Record<string, unknown> {
  name: string;
  title: string;
  dataset_date?: string;
  tags: CatalogTag[];
  groups: { name: string }[];
  subnational: "0" | "1";
}

export interface CatalogResource {
  name: string;
  description: string;
  format: string;
  resource_type: "file.upload";
  url_type: "upload";
}
