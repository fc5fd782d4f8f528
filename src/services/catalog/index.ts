// Catalog publishers - Re-exports
export { LocalCatalog } from "./local.js";
export { CkanCatalog, type CkanCatalogOptions } from "./ckan.js";
export { buildPackage, buildResource, type PackageOwner } from "./package.js";
export type {
  CatalogPublisher,
  CatalogPackage,
  CatalogResource,
  PublishResult,
  PublishAction,
} from "./types.js";
