import { ParseFailure } from "../src/errors.js";
import { parseDescriptor } from "../src/parser/DescriptorParser.js";
import type { PartDescriptor, SkeletonGroup } from "../src/types.js";

/**
 * Parse a test identifier, failing loudly if it does not parse
 */
export function part(rawIdentifier: string, category: string): PartDescriptor {
  const parsed = parseDescriptor(
    rawIdentifier,
    category,
    `/assets/${category}/${rawIdentifier}.glb`,
  );
  if (parsed instanceof ParseFailure) throw parsed;
  return parsed;
}

export function group(
  skeleton: string,
  categories: Record<string, string[]>,
): SkeletonGroup {
  return {
    skeleton,
    categories: new Map(
      Object.entries(categories).map(([category, names]) => [
        category,
        names.map((name) => part(name, category)),
      ]),
    ),
  };
}

/**
 * The worked outfit scenario: 2 bodies, 1 top, 2 bottoms on skeleton "f"
 */
export function femaleGroup(): SkeletonGroup {
  return group("f", {
    body: ["skin-f-generic-01-v1-body", "skin-f-generic-02-v1-body"],
    top: ["outfit-f-casual-01-v1-top"],
    bottom: ["outfit-f-casual-01-v1-bottom", "outfit-f-casual-02-v1-bottom"],
  });
}
