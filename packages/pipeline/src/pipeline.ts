/**
 * Pipeline
 *
 * discover → parse → classify → generate/name/export → report
 */

import {
  SystemLogger,
  classify,
  runExport,
  type ClassificationWarning,
  type ExportReport,
  type OutfitHost,
} from "@outfit-forge/combinator";

import type { PipelineConfig } from "./config.js";
import { scanAssets } from "./discovery/AssetDiscovery.js";
import { GlbAssembler } from "./host/GlbAssembler.js";

const logger = new SystemLogger("Pipeline");

/** Outfits are always written as self-contained binary glTF */
export const OUTPUT_EXTENSION = "glb";

export interface PipelineResult {
  /** Part files found under the import path */
  discovered: number;
  /** Part files dropped because an identical part was already grouped */
  duplicateParts: number;
  warnings: ClassificationWarning[];
  report: ExportReport;
}

export async function runPipeline(
  config: PipelineConfig,
  host: OutfitHost = new GlbAssembler(),
): Promise<PipelineResult> {
  const inputs = await scanAssets(config.importPath, {
    extension: config.extension,
    ignoreCategories: config.ignoreCategories,
  });

  const classification = classify(inputs);
  logger.info(
    `Found ${classification.groups.size} skeleton group(s) in ${inputs.length} file(s)`,
  );

  const report = await runExport(classification.groups, host, {
    combinations: config.combinations,
    exportDir: config.exportPath,
    categories: config.categories,
    seed: config.seed,
    extension: OUTPUT_EXTENSION,
    rejected: classification.rejected,
  });

  return {
    discovered: inputs.length,
    duplicateParts: classification.duplicates,
    warnings: classification.warnings,
    report,
  };
}

/**
 * A run succeeded when nothing failed and something was exported, unless
 * no outfits were requested
 */
export function isSuccessfulRun(
  report: ExportReport,
  requested: number,
): boolean {
  if (report.failed.length > 0) return false;
  return requested === 0 || report.exported.length > 0;
}
