import chalk from "chalk";

import type { PipelineResult } from "./pipeline.js";

/**
 * Render a pipeline result as terminal lines
 */
export function formatReport(result: PipelineResult): string[] {
  const { report } = result;
  const lines: string[] = [];

  lines.push(
    chalk.bold(
      `Outfits: ${report.exported.length} exported, ${report.failed.length} failed from ${result.discovered} part file(s)`,
    ),
  );

  if (report.exported.length > 0) {
    lines.push(chalk.green(`Exported (${report.exported.length}):`));
    for (const exported of report.exported) {
      lines.push(chalk.green(`  ✓ ${exported.name} -> ${exported.path}`));
    }
  }

  if (report.failed.length > 0) {
    lines.push(chalk.red(`Failed (${report.failed.length}):`));
    for (const failed of report.failed) {
      lines.push(chalk.red(`  ✗ ${failed.name}: ${failed.reason}`));
    }
  }

  if (report.rejected.length > 0) {
    lines.push(chalk.yellow(`Rejected (${report.rejected.length}):`));
    for (const rejected of report.rejected) {
      lines.push(
        chalk.yellow(`  - ${rejected.source} [${rejected.reason}]: ${rejected.message}`),
      );
    }
  }

  if (report.skipped.length > 0) {
    lines.push(chalk.yellow(`Skipped groups (${report.skipped.length}):`));
    for (const skipped of report.skipped) {
      lines.push(chalk.yellow(`  - ${skipped.skeleton}: ${skipped.reason}`));
    }
  }

  if (report.truncated.length > 0) {
    lines.push(chalk.gray(`Truncated groups (${report.truncated.length}):`));
    for (const truncated of report.truncated) {
      lines.push(
        chalk.gray(
          `  - ${truncated.skeleton}: ${truncated.available} of ${truncated.requested} available`,
        ),
      );
    }
  }

  for (const warning of result.warnings) {
    lines.push(chalk.gray(`Warning: ${warning.message}`));
  }
  if (result.duplicateParts > 0) {
    lines.push(chalk.gray(`Duplicate part files ignored: ${result.duplicateParts}`));
  }
  if (report.duplicates > 0) {
    lines.push(chalk.gray(`Duplicate outfits skipped: ${report.duplicates}`));
  }

  return lines;
}
