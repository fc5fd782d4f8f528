/**
 * Project configuration
 *
 * The JSON files under config/ describe the remote endpoints, the dataset
 * title and tags, and the static metadata merged into every published
 * dataset. They are validated once at load; a missing or malformed key is
 * a ConfigError and ends the run.
 */

import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";

import type { Model } from "./types/index.js";

// ============================================================================
// Schemas
// ============================================================================

export const ModelConfigSchema = Type.Object({
  path: Type.String({ minLength: 1 }),
  label: Type.String({ minLength: 1 }),
  description: Type.String(),
});

export type ModelConfig = Static<typeof ModelConfigSchema>;

export const ProjectConfigSchema = Type.Object({
  base_url: Type.String({ minLength: 1 }),
  title: Type.String({ minLength: 1 }),
  tags: Type.Array(Type.String()),
  models: Type.Record(Type.String(), ModelConfigSchema),
  country_names: Type.Optional(Type.Record(Type.String(), Type.String())),
});

export type ProjectConfig = Static<typeof ProjectConfigSchema>;

export const DatasetStaticSchema = Type.Record(Type.String(), Type.Unknown());

export type DatasetStatic = Static<typeof DatasetStaticSchema>;

// ============================================================================
// Paths
// ============================================================================

export const DEFAULT_CONFIG_PATH = fileURLToPath(
  new URL("../config/project_configuration.json", import.meta.url)
);

export const DEFAULT_STATIC_PATH = fileURLToPath(
  new URL("../config/dataset_static.json", import.meta.url)
);

// ============================================================================
// Loading
// ============================================================================

function readJsonFile(path: string): unknown {
  if (!existsSync(path)) {
    throw new ConfigError(`Config not found: ${path}`, { path });
  }

  try {
    return JSON.parse(readFileSync(path, "utf8")) as unknown;
  } catch (error) {
    throw new ConfigError(`Config is not valid JSON: ${path}`, {
      path,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Validate a parsed configuration object
 */
export function parseConfig(data: unknown, source = "<inline>"): ProjectConfig {
  if (Value.Check(ProjectConfigSchema, data)) {
    return data;
  }

  const first = Value.Errors(ProjectConfigSchema, data).First();
  const at = first?.path !== undefined && first.path !== "" ? first.path : "/";
  throw new ConfigError(
    `Invalid configuration in ${source} at ${at}: ${first?.message ?? "unknown error"}`,
    { source, path: at }
  );
}

export function loadConfig(
  path = process.env.RTP_CONFIG ?? DEFAULT_CONFIG_PATH
): ProjectConfig {
  return parseConfig(readJsonFile(path), path);
}

export function loadDatasetStatic(path = DEFAULT_STATIC_PATH): DatasetStatic {
  const data = readJsonFile(path);
  if (!Value.Check(DatasetStaticSchema, data)) {
    throw new ConfigError(`Static dataset metadata must be an object: ${path}`, {
      path,
    });
  }
  return data;
}

/**
 * Look up a model's endpoint configuration
 */
export function getModelConfig(
  config: ProjectConfig,
  model: Model
): ModelConfig {
  const entry = config.models[model];
  if (entry === undefined) {
    throw new ConfigError(`Unknown model: ${model}`, {
      model,
      available: Object.keys(config.models),
    });
  }
  return entry;
}

export function listModels(config: ProjectConfig): Model[] {
  return Object.keys(config.models);
}
