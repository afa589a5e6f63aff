/**
 * Descriptor Parser
 *
 * Turns an asset file name such as `outfit-f-casual-01-v2-bottom.glb` into a
 * PartDescriptor. Tags are read left to right in the order of
 * DESCRIPTOR_TAGS; missing trailing tags take fixed defaults, so any
 * non-empty name containing the separator parses.
 */

import { ParseFailure } from "../errors.js";
import {
  DESCRIPTOR_TAGS,
  type DescriptorTag,
  type PartDescriptor,
} from "../types.js";

export const TAG_SEPARATOR = "-";

export const BODY_CATEGORY = "body";

/** Sentinel region for names that carry no region tag */
export const UNDEFINED_REGION = "undefined";

export const DESCRIPTOR_DEFAULTS: Readonly<Record<DescriptorTag, string>> = {
  type: "undefined",
  skeleton: "x",
  theme: "generic",
  variant: "01",
  mesh: "v1",
  region: UNDEFINED_REGION,
};

/**
 * Whether a folder name can serve as a category
 */
export function isValidCategory(category: string): boolean {
  return category.length > 0 && !category.includes(TAG_SEPARATOR);
}

/**
 * Lower-cased name without extension (anything after the first dot).
 */
function identifierStem(rawIdentifier: string): string {
  return rawIdentifier.trim().toLowerCase().split(".")[0];
}

/**
 * Tag tokens of an identifier, in file-name order
 */
export function tokenizeIdentifier(rawIdentifier: string): string[] {
  return identifierStem(rawIdentifier).split(TAG_SEPARATOR);
}

/**
 * Parse a raw identifier found under `category`.
 *
 * @param rawIdentifier - File or folder name, with or without extension
 * @param category - Folder the identifier was found in; authoritative over the region tag
 * @param source - Reference handed to the host on export; defaults to the identifier
 */
export function parseDescriptor(
  rawIdentifier: string,
  category: string,
  source: string = rawIdentifier,
): PartDescriptor | ParseFailure {
  const normalizedCategory = category.trim().toLowerCase();
  if (!isValidCategory(normalizedCategory)) {
    return new ParseFailure(
      rawIdentifier,
      category,
      source,
      `category "${category}" must be non-empty and free of "${TAG_SEPARATOR}"`,
    );
  }

  const tokens = tokenizeIdentifier(rawIdentifier);
  if (tokens.length === 1 && tokens[0].length === 0) {
    return new ParseFailure(
      rawIdentifier,
      normalizedCategory,
      source,
      "identifier is empty",
    );
  }
  if (tokens.length < 2) {
    return new ParseFailure(
      rawIdentifier,
      normalizedCategory,
      source,
      `identifier has no "${TAG_SEPARATOR}" separator`,
    );
  }

  const tags = { ...DESCRIPTOR_DEFAULTS };
  DESCRIPTOR_TAGS.forEach((tag, index) => {
    const token = tokens[index];
    if (token) tags[tag] = token;
  });

  return Object.freeze({
    category: normalizedCategory,
    ...tags,
    source,
  });
}

export function isParseFailure(
  value: PartDescriptor | ParseFailure,
): value is ParseFailure {
  return value instanceof ParseFailure;
}

/**
 * Compose the canonical name stem of a descriptor. An undefined region is
 * replaced by the category, the way imported parts are renamed.
 */
export function formatDescriptor(descriptor: PartDescriptor): string {
  const region =
    descriptor.region === UNDEFINED_REGION
      ? descriptor.category
      : descriptor.region;
  return [
    descriptor.type,
    descriptor.skeleton,
    descriptor.theme,
    descriptor.variant,
    descriptor.mesh,
    region,
  ].join(TAG_SEPARATOR);
}

/**
 * Full identity of a part: its category plus every name tag.
 * Two descriptors with the same identity are the same part.
 */
export function descriptorIdentity(descriptor: PartDescriptor): string {
  return [
    descriptor.category,
    ...DESCRIPTOR_TAGS.map((tag) => descriptor[tag]),
  ].join(TAG_SEPARATOR);
}
