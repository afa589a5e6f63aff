/**
 * Combination Generator
 *
 * Recombines one part per category of a skeleton group. The candidate space is
 * the Cartesian product of the selected categories; each candidate is
 * addressed by its rank in lexicographic order over index tuples, so sampling
 * never has to materialize the product.
 */

import { InvalidArgument } from "../errors.js";
import {
  BODY_CATEGORY,
  descriptorIdentity,
} from "../parser/DescriptorParser.js";
import { SeededRandom, getDefaultRandom } from "../math/Random.js";
import type { Combination, PartDescriptor, SkeletonGroup } from "../types.js";
import { SystemLogger } from "../utils/Logger.js";

const logger = new SystemLogger("CombinationGenerator");

export interface GenerateOptions {
  /** Categories to combine; body is always added. Defaults to all of the group's categories. */
  categories?: Iterable<string>;
  /** Seed for reproducible draws */
  seed?: number;
  /** Generator to draw from; takes precedence over `seed` */
  random?: SeededRandom;
  /** Throw instead of skipping when the group has no body parts */
  requireBody?: boolean;
}

/**
 * Categories of `group` that take part in generation: body first, then the
 * others alphabetically.
 */
export function selectCategories(
  group: SkeletonGroup,
  categories?: Iterable<string>,
): string[] {
  let wanted: Set<string>;
  if (categories) {
    wanted = new Set(categories);
    wanted.add(BODY_CATEGORY);
    for (const category of wanted) {
      if (!group.categories.has(category)) {
        logger.debug(
          `Skeleton "${group.skeleton}" has no "${category}" parts`,
        );
      }
    }
  } else {
    wanted = new Set(group.categories.keys());
  }

  const selected = [...group.categories.keys()].filter(
    (category) =>
      wanted.has(category) && (group.categories.get(category)?.length ?? 0) > 0,
  );
  return selected.sort((a, b) => {
    if (a === BODY_CATEGORY) return -1;
    if (b === BODY_CATEGORY) return 1;
    return a < b ? -1 : a > b ? 1 : 0;
  });
}

function partLists(
  group: SkeletonGroup,
  categories: string[],
): PartDescriptor[][] {
  return categories.map((category) => group.categories.get(category) ?? []);
}

/**
 * Size of the candidate space: the product of the per-category counts.
 * Zero when the group has no body parts.
 */
export function candidateSpaceSize(
  group: SkeletonGroup,
  categories?: Iterable<string>,
): number {
  const selected = selectCategories(group, categories);
  if (!selected.includes(BODY_CATEGORY)) return 0;
  return partLists(group, selected).reduce(
    (size, parts) => size * parts.length,
    1,
  );
}

/**
 * Decode a rank into one index per category (mixed radix, last category
 * varying fastest).
 */
export function rankToIndices(rank: number, radices: number[]): number[] {
  const indices = new Array<number>(radices.length);
  let remainder = rank;
  for (let i = radices.length - 1; i >= 0; i--) {
    indices[i] = remainder % radices[i];
    remainder = Math.floor(remainder / radices[i]);
  }
  return indices;
}

/**
 * Draw `count` distinct integers from [0, size) without replacement
 * (Floyd's algorithm). Order of the result is the order of the draws.
 */
export function sampleRanks(
  size: number,
  count: number,
  random: SeededRandom,
): number[] {
  const chosen = new Set<number>();
  const order: number[] = [];
  for (let j = size - count; j < size; j++) {
    const t = random.randint(0, j);
    const pick = chosen.has(t) ? j : t;
    chosen.add(pick);
    order.push(pick);
  }
  return order;
}

function assertCount(n: number): void {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new InvalidArgument(
      `Combination count must be a non-negative integer, got ${n}`,
      { n },
    );
  }
}

/**
 * Generate up to `n` distinct combinations from one skeleton group.
 *
 * When `n` covers the whole candidate space every combination is returned once,
 * in lexicographic order. Otherwise `n` are drawn uniformly without replacement.
 */
export function generateCombinations(
  group: SkeletonGroup,
  n: number,
  options: GenerateOptions = {},
): Combination[] {
  assertCount(n);

  const categories = selectCategories(group, options.categories);
  if (!categories.includes(BODY_CATEGORY)) {
    if (options.requireBody) {
      throw new InvalidArgument(
        `Skeleton group "${group.skeleton}" has no ${BODY_CATEGORY} parts`,
        { skeleton: group.skeleton },
      );
    }
    logger.info(
      `Skipping skeleton "${group.skeleton}": no ${BODY_CATEGORY} parts`,
    );
    return [];
  }
  if (n === 0) return [];

  const lists = partLists(group, categories);
  const radices = lists.map((parts) => parts.length);
  const size = radices.reduce((product, radix) => product * radix, 1);
  if (!Number.isSafeInteger(size)) {
    throw new InvalidArgument(
      `Candidate space of skeleton "${group.skeleton}" is too large to sample`,
      { skeleton: group.skeleton, radices },
    );
  }

  let ranks: number[];
  if (n >= size) {
    ranks = Array.from({ length: size }, (_, rank) => rank);
  } else {
    const random =
      options.random ??
      (options.seed !== undefined
        ? new SeededRandom(options.seed)
        : getDefaultRandom());
    ranks = sampleRanks(size, n, random);
  }

  logger.debug(
    `Generated ${ranks.length} of ${size} combination(s) for skeleton "${group.skeleton}"`,
  );

  return ranks.map((rank) => {
    const indices = rankToIndices(rank, radices);
    return {
      skeleton: group.skeleton,
      parts: lists.map((parts, i) => parts[indices[i]]),
    };
  });
}

/**
 * Key that is equal for equal category→part mappings, whatever the part order
 */
export function combinationKey(combination: Combination): string {
  return combination.parts
    .map(descriptorIdentity)
    .sort()
    .join("|");
}
