/**
 * Naming Engine
 *
 * Derives `set-<skeleton>-<hash>` from the parts of a combination. The hash
 * input is the part identities sorted by category, so the same part set always
 * gets the same name no matter how it was discovered or generated.
 *
 * The hash is the first 64 bits of BLAKE2s-256, as lowercase hex. At that width
 * roughly 1.9e8 outfits fit in one catalog before the chance of any collision
 * reaches 1 in 1000.
 */

import { createHash } from "crypto";
import {
  TAG_SEPARATOR,
  descriptorIdentity,
  formatDescriptor,
} from "../parser/DescriptorParser.js";
import type {
  Combination,
  NamedCombination,
  PartReference,
} from "../types.js";

export const NAME_PREFIX = "set";

export const HASH_LENGTH = 16;

const HASH_ALGORITHM = "blake2s256";

/**
 * Part identities ordered by category name, space-separated
 */
export function canonicalIdentity(combination: Combination): string {
  return [...combination.parts]
    .sort((a, b) =>
      a.category < b.category ? -1 : a.category > b.category ? 1 : 0,
    )
    .map(descriptorIdentity)
    .join(" ");
}

export function combinationHash(combination: Combination): string {
  return createHash(HASH_ALGORITHM)
    .update(canonicalIdentity(combination), "utf8")
    .digest("hex")
    .slice(0, HASH_LENGTH);
}

export function nameCombination(combination: Combination): string {
  return [NAME_PREFIX, combination.skeleton, combinationHash(combination)].join(
    TAG_SEPARATOR,
  );
}

export function nameCombinations(
  combinations: readonly Combination[],
): NamedCombination[] {
  return combinations.map((combination) => ({
    ...combination,
    name: nameCombination(combination),
  }));
}

/**
 * Split a generated name back into its skeleton tag and hash.
 * Returns null for names that do not follow `set-<skeleton>-<hash>`.
 */
export function parseCombinationName(
  name: string,
): { skeleton: string; hash: string } | null {
  const parts = name.split(TAG_SEPARATOR);
  if (parts.length !== 3 || parts[0] !== NAME_PREFIX) return null;
  const [, skeleton, hash] = parts;
  if (!skeleton || !/^[0-9a-f]+$/.test(hash) || hash.length !== HASH_LENGTH) {
    return null;
  }
  return { skeleton, hash };
}

/**
 * File name for an exported combination. Dots are not allowed in the stem.
 */
export function combinationFileName(
  name: string,
  extension: string = "glb",
): string {
  return `${name.replace(/\./g, "_")}.${extension}`;
}

export function toPartReferences(
  combination: Combination,
): PartReference[] {
  return combination.parts.map((part) => ({
    category: part.category,
    name: formatDescriptor(part),
    source: part.source,
  }));
}
