/**
 * Asset Discovery
 *
 * Walks an import folder laid out as `<root>/<category>/**\/<identifier>.<ext>`
 * and hands every part file to the descriptor parser.
 */

import {
  SystemLogger,
  TAG_SEPARATOR,
  parseDescriptor,
  type ParseFailure,
  type PartDescriptor,
} from "@outfit-forge/combinator";
import fs from "fs-extra";
import path from "path";

import { DEFAULT_EXTENSION, DEFAULT_IGNORED_CATEGORIES } from "../config.js";
import { ConfigError } from "../errors.js";

const logger = new SystemLogger("AssetDiscovery");

export interface DiscoveredAsset {
  category: string;
  /** File name without its extension */
  rawIdentifier: string;
  path: string;
}

export interface DiscoveryOptions {
  extension?: string;
  ignoreCategories?: readonly string[];
}

export type CategorySkipReason = "hidden" | "ignored" | "invalid-name";

export function categorySkipReason(
  folder: string,
  ignoreCategories: readonly string[] = DEFAULT_IGNORED_CATEGORIES,
): CategorySkipReason | null {
  if (folder.startsWith(".")) return "hidden";
  const category = folder.toLowerCase();
  if (ignoreCategories.includes(category)) return "ignored";
  if (category.includes(TAG_SEPARATOR)) return "invalid-name";
  return null;
}

async function collectFiles(dir: string, suffix: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectFiles(fullPath, suffix)));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith(suffix)) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * List every part file under `root`, grouped by its category folder
 *
 * @throws ConfigError when `root` is not a directory
 */
export async function discoverAssets(
  root: string,
  options: DiscoveryOptions = {},
): Promise<DiscoveredAsset[]> {
  const extension = (options.extension ?? DEFAULT_EXTENSION)
    .replace(/^\./, "")
    .toLowerCase();
  const suffix = `.${extension}`;

  const stat = await fs.stat(root).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new ConfigError(`Import path is not a directory: ${root}`, [
      `importPath: ${root} is not a directory`,
    ]);
  }

  const folders = (await fs.readdir(root, { withFileTypes: true }))
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();

  const assets: DiscoveredAsset[] = [];
  for (const folder of folders) {
    const skip = categorySkipReason(folder, options.ignoreCategories);
    if (skip) {
      if (skip !== "hidden") {
        logger.info(`Skipping category folder "${folder}" (${skip})`);
      }
      continue;
    }

    const category = folder.toLowerCase();
    const files = (await collectFiles(path.join(root, folder), suffix)).sort();
    for (const file of files) {
      assets.push({
        category,
        rawIdentifier: path.basename(file).slice(0, -suffix.length),
        path: file,
      });
    }
  }

  logger.info(`Discovered ${assets.length} part file(s) in ${root}`);
  return assets;
}

/**
 * Discover and parse; unparseable files come back as `ParseFailure`s
 */
export async function scanAssets(
  root: string,
  options: DiscoveryOptions = {},
): Promise<(PartDescriptor | ParseFailure)[]> {
  const assets = await discoverAssets(root, options);
  return assets.map((asset) =>
    parseDescriptor(asset.rawIdentifier, asset.category, asset.path),
  );
}
