/**
 * Export Coordinator
 *
 * Drives generation, naming and host export for every skeleton group and
 * collects the outcome in one report. Groups are independent: a group that
 * cannot be combined is recorded as skipped and a failed export is recorded
 * as failed, and neither stops the rest of the batch.
 *
 * Host calls are awaited one at a time; the host owns a single scene/document
 * session that is not safe to share between concurrent exports.
 */

import { EventEmitter } from "eventemitter3";
import { ExportFailure, InvalidArgument, toErrorMessage } from "../errors.js";
import {
  candidateSpaceSize,
  generateCombinations,
} from "../generator/CombinationGenerator.js";
import { SeededRandom } from "../math/Random.js";
import {
  combinationFileName,
  nameCombinations,
  toPartReferences,
} from "../naming/NamingEngine.js";
import type {
  ExportReport,
  ExportedCombination,
  FailedCombination,
  NamedCombination,
  OutfitHost,
  RejectedDescriptor,
  SkeletonGroup,
} from "../types.js";
import { SystemLogger } from "../utils/Logger.js";

const logger = new SystemLogger("ExportCoordinator");

export interface ExportRunOptions {
  /** Combinations to draw per skeleton group */
  combinations: number;
  exportDir: string;
  /** Categories to combine besides body; defaults to all */
  categories?: Iterable<string>;
  /** Seed for reproducible draws across the whole run */
  seed?: number;
  /** Rejected inputs to carry into the report */
  rejected?: RejectedDescriptor[];
  /** Output file extension */
  extension?: string;
}

export interface ExportCoordinatorEvents {
  "group:start": (skeleton: string, combinations: number) => void;
  "group:skipped": (skeleton: string, reason: string) => void;
  "combination:exported": (
    combination: NamedCombination,
    result: ExportedCombination,
  ) => void;
  "combination:failed": (
    combination: NamedCombination,
    failure: ExportFailure,
  ) => void;
  complete: (report: ExportReport) => void;
}

export function createEmptyReport(
  rejected: RejectedDescriptor[] = [],
): ExportReport {
  return {
    exported: [],
    failed: [],
    rejected: [...rejected],
    skipped: [],
    truncated: [],
    duplicates: 0,
  };
}

export class ExportCoordinator extends EventEmitter<ExportCoordinatorEvents> {
  constructor(private readonly host: OutfitHost) {
    super();
  }

  async run(
    groups: ReadonlyMap<string, SkeletonGroup>,
    options: ExportRunOptions,
  ): Promise<ExportReport> {
    const requested = options.combinations;
    if (!Number.isSafeInteger(requested) || requested < 0) {
      throw new InvalidArgument(
        `Combination count must be a non-negative integer, got ${requested}`,
        { combinations: requested },
      );
    }

    const report = createEmptyReport(options.rejected);
    const exportedNames = new Set<string>();
    const categories = options.categories ? [...options.categories] : undefined;
    const random =
      options.seed !== undefined ? new SeededRandom(options.seed) : undefined;

    const skeletons = [...groups.keys()].sort();
    for (const skeleton of skeletons) {
      const group = groups.get(skeleton);
      if (!group) continue;

      let combinations: NamedCombination[];
      try {
        const available = candidateSpaceSize(group, categories);
        if (available === 0) {
          this.skip(report, skeleton, "no body parts");
          continue;
        }
        if (available < requested) {
          report.truncated.push({ skeleton, requested, available });
          logger.info(
            `Skeleton "${skeleton}" has only ${available} combination(s), ${requested} requested`,
          );
        }
        combinations = nameCombinations(
          generateCombinations(group, requested, { categories, random }),
        );
      } catch (error) {
        this.skip(report, skeleton, toErrorMessage(error));
        continue;
      }

      this.emit("group:start", skeleton, combinations.length);

      for (const combination of combinations) {
        if (exportedNames.has(combination.name)) {
          report.duplicates++;
          logger.warn(`Skipping ${combination.name}: already exported`);
          continue;
        }
        await this.exportOne(combination, options, report, exportedNames);
      }
    }

    logger.info(
      `Exported ${report.exported.length}, failed ${report.failed.length}, rejected ${report.rejected.length}`,
    );
    this.emit("complete", report);
    return report;
  }

  private async exportOne(
    combination: NamedCombination,
    options: ExportRunOptions,
    report: ExportReport,
    exportedNames: Set<string>,
  ): Promise<void> {
    let failure: ExportFailure;
    try {
      const outcome = await this.host.exportCombination({
        name: combination.name,
        skeleton: combination.skeleton,
        parts: toPartReferences(combination),
        exportDir: options.exportDir,
        fileName: combinationFileName(combination.name, options.extension),
      });
      if (outcome.ok) {
        const exported: ExportedCombination = {
          name: combination.name,
          skeleton: combination.skeleton,
          path: outcome.path,
        };
        report.exported.push(exported);
        exportedNames.add(combination.name);
        logger.debug(`Exported ${combination.name} to ${outcome.path}`);
        this.emit("combination:exported", combination, exported);
        return;
      }
      failure = new ExportFailure(combination.name, outcome.reason);
    } catch (error) {
      failure = new ExportFailure(
        combination.name,
        toErrorMessage(error),
        error instanceof Error ? error : undefined,
      );
    }

    const failed: FailedCombination = {
      name: combination.name,
      skeleton: combination.skeleton,
      reason: failure.reason,
    };
    report.failed.push(failed);
    logger.error(failure.message, failure);
    this.emit("combination:failed", combination, failure);
  }

  private skip(report: ExportReport, skeleton: string, reason: string): void {
    report.skipped.push({ skeleton, reason });
    logger.warn(`Skipped skeleton "${skeleton}": ${reason}`);
    this.emit("group:skipped", skeleton, reason);
  }
}

/**
 * One-shot form of ExportCoordinator.run
 */
export function runExport(
  groups: ReadonlyMap<string, SkeletonGroup>,
  host: OutfitHost,
  options: ExportRunOptions,
): Promise<ExportReport> {
  return new ExportCoordinator(host).run(groups, options);
}
