/**
 * Classifier
 *
 * Buckets parsed descriptors by skeleton tag, then by category. Parse failures
 * and untagged parts go to the rejected list instead; untagged parts cannot be
 * matched to an armature safely.
 */

import { ClassificationRejection, ParseFailure } from "../errors.js";
import {
  DESCRIPTOR_DEFAULTS,
  UNDEFINED_REGION,
  descriptorIdentity,
  formatDescriptor,
} from "../parser/DescriptorParser.js";
import type {
  ClassificationResult,
  PartDescriptor,
  RejectedDescriptor,
  SkeletonGroup,
} from "../types.js";
import { SystemLogger } from "../utils/Logger.js";

const logger = new SystemLogger("Classifier");

export function classify(
  inputs: Iterable<PartDescriptor | ParseFailure>,
): ClassificationResult {
  const result: ClassificationResult = {
    groups: new Map(),
    rejected: [],
    warnings: [],
    duplicates: 0,
  };
  const seen = new Set<string>();

  for (const input of inputs) {
    if (input instanceof ParseFailure) {
      result.rejected.push({
        identifier: input.identifier,
        category: input.category,
        source: input.source,
        reason: "unparseable",
        message: input.message,
      });
      continue;
    }

    if (input.skeleton === DESCRIPTOR_DEFAULTS.skeleton) {
      result.rejected.push({
        identifier: formatDescriptor(input),
        category: input.category,
        source: input.source,
        reason: "missing-skeleton",
        message: `No skeleton tag in "${input.source}"`,
        descriptor: input,
      });
      continue;
    }

    const identity = descriptorIdentity(input);
    if (seen.has(identity)) {
      result.duplicates++;
      continue;
    }
    seen.add(identity);

    if (input.region !== UNDEFINED_REGION && input.region !== input.category) {
      result.warnings.push({
        reason: "region-mismatch",
        message: `Region "${input.region}" of ${input.source} differs from category "${input.category}"`,
        descriptor: input,
      });
    }

    let group = result.groups.get(input.skeleton);
    if (!group) {
      group = { skeleton: input.skeleton, categories: new Map() };
      result.groups.set(input.skeleton, group);
    }
    let parts = group.categories.get(input.category);
    if (!parts) {
      parts = [];
      group.categories.set(input.category, parts);
    }
    parts.push(input);
  }

  if (result.rejected.length > 0) {
    logger.warn(`Rejected ${result.rejected.length} asset(s)`);
  }
  for (const warning of result.warnings) {
    logger.warn(warning.message);
  }
  logger.debug(`Classified into ${result.groups.size} skeleton group(s)`, {
    skeletons: [...result.groups.keys()],
    duplicates: result.duplicates,
  });

  return result;
}

/**
 * Number of parts held by a group across all categories
 */
export function groupSize(group: SkeletonGroup): number {
  let size = 0;
  for (const parts of group.categories.values()) size += parts.length;
  return size;
}

/**
 * Error form of a rejection, for callers that raise instead of report
 */
export function rejectionError(
  rejected: RejectedDescriptor,
): ClassificationRejection {
  return new ClassificationRejection(rejected.message, {
    identifier: rejected.identifier,
    category: rejected.category,
    reason: rejected.reason,
  });
}
