/**
 * Configuration Module - Environment and path resolution
 *
 * Merges command-line overrides over `OUTFIT_*` environment variables (with
 * `.env` files loaded through dotenv), validates the result and prepares the
 * directories the pipeline reads from and writes to.
 *
 * Usage:
 * ```typescript
 * const config = await loadConfig({ importPath: "./parts" });
 * console.log(config.exportPath, config.combinations);
 * ```
 */

import dotenv from "dotenv";
import fs from "fs-extra";
import path from "path";
import { z } from "zod";

import { ConfigError } from "./errors.js";

export const DEFAULT_COMBINATIONS = 10;
export const DEFAULT_EXTENSION = "glb";
export const DEFAULT_IGNORED_CATEGORIES = ["_ignore", "_failed"];

export const pipelineConfigSchema = z.object({
  /** Folder holding one subfolder per body-part category */
  importPath: z.string().trim().min(1, "import path is required"),
  /** Folder the assembled outfits are written to */
  exportPath: z.string().trim().min(1, "export path is required"),
  /** Outfits to export per skeleton group */
  combinations: z.coerce
    .number()
    .int("combinations must be a whole number")
    .nonnegative("combinations cannot be negative")
    .default(DEFAULT_COMBINATIONS),
  seed: z.coerce.number().int("seed must be a whole number").optional(),
  extension: z
    .string()
    .trim()
    .regex(/^\.?[A-Za-z0-9]+$/, "extension must be alphanumeric")
    .transform((ext) => ext.replace(/^\./, "").toLowerCase())
    .default(DEFAULT_EXTENSION),
  categories: z.array(z.string().trim().toLowerCase().min(1)).optional(),
  ignoreCategories: z
    .array(z.string().trim().toLowerCase())
    .default(DEFAULT_IGNORED_CATEGORIES),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

type Environment = Record<string, string | undefined>;

function readVar(env: Environment, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Environment values, with explicit overrides taking priority
 */
export function mergeEnvironment(
  overrides: Partial<PipelineConfigInput>,
  env: Environment,
): Record<string, unknown> {
  const merged: Record<string, unknown> = {
    importPath: readVar(env, "OUTFIT_IMPORT_PATH"),
    exportPath: readVar(env, "OUTFIT_EXPORT_PATH"),
    combinations: readVar(env, "OUTFIT_COMBINATIONS"),
    seed: readVar(env, "OUTFIT_SEED"),
    extension: readVar(env, "OUTFIT_EXTENSION"),
    categories: splitList(readVar(env, "OUTFIT_CATEGORIES")),
  };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}

/**
 * Validate raw settings without touching the filesystem
 *
 * @throws ConfigError listing every schema issue
 */
export function resolveConfig(
  overrides: Partial<PipelineConfigInput> = {},
  env: Environment = process.env,
): PipelineConfig {
  const parsed = pipelineConfigSchema.safeParse(
    mergeEnvironment(overrides, env),
  );
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    );
    throw new ConfigError(
      `Invalid configuration: ${issues.join("; ")}`,
      issues,
    );
  }
  return {
    ...parsed.data,
    importPath: path.resolve(parsed.data.importPath),
    exportPath: path.resolve(parsed.data.exportPath),
  };
}

/**
 * Check the import folder and create the export folder
 */
export async function prepareDirectories(config: PipelineConfig): Promise<void> {
  const stat = await fs.stat(config.importPath).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new ConfigError(`Import path is not a directory: ${config.importPath}`, [
      `importPath: ${config.importPath} is not a directory`,
    ]);
  }
  await fs.ensureDir(config.exportPath);
}

/**
 * Load and validate pipeline configuration
 *
 * Loads `.env` from the working directory and the workspace root, then
 * applies `overrides` on top of the environment.
 */
export async function loadConfig(
  overrides: Partial<PipelineConfigInput> = {},
): Promise<PipelineConfig> {
  // Priority: local .env > workspace root .env
  dotenv.config({ path: ".env" });
  dotenv.config({ path: "../../.env" });

  const config = resolveConfig(overrides, process.env);
  await prepareDirectories(config);
  return config;
}
