/**
 * Core Types
 *
 * Data model shared by the parser, classifier, generator, naming engine and
 * export coordinator. Every record here is a plain value; nothing holds a
 * reference into a 3D host.
 */

// =============================================================================
// PART DESCRIPTORS
// =============================================================================

/**
 * Name tags in the order they appear in an asset file name:
 * `<type>-<skeleton>-<theme>-<variant>-<mesh>-<region>`.
 */
export const DESCRIPTOR_TAGS = [
  "type",
  "skeleton",
  "theme",
  "variant",
  "mesh",
  "region",
] as const;

export type DescriptorTag = (typeof DESCRIPTOR_TAGS)[number];

/**
 * One rigged body-part asset, as discovered on disk.
 */
export interface PartDescriptor {
  /** Body region the part attaches to, taken from its folder */
  readonly category: string;
  /** Leading name token, e.g. "outfit" or "skin" */
  readonly type: string;
  /** Armature tag; parts with equal tags share a joint hierarchy */
  readonly skeleton: string;
  readonly theme: string;
  /** Named concept within a theme, e.g. "01" or "casual" */
  readonly variant: string;
  /** Disambiguates several meshes of the same variant */
  readonly mesh: string;
  /** Region token from the file name; only checked against `category` */
  readonly region: string;
  /** Path (or raw identifier) the host resolves the part from */
  readonly source: string;
}

// =============================================================================
// GROUPING
// =============================================================================

/**
 * Parts sharing one skeleton tag, bucketed by category in discovery order.
 */
export interface SkeletonGroup {
  readonly skeleton: string;
  readonly categories: Map<string, PartDescriptor[]>;
}

export type RejectionReason = "unparseable" | "missing-skeleton";

/**
 * An input that never takes part in generation.
 */
export interface RejectedDescriptor {
  /** Raw identifier as it was discovered */
  identifier: string;
  category: string;
  source: string;
  reason: RejectionReason;
  message: string;
  /** Present when the identifier parsed but could not be grouped */
  descriptor?: PartDescriptor;
}

export interface ClassificationWarning {
  reason: "region-mismatch";
  message: string;
  descriptor: PartDescriptor;
}

export interface ClassificationResult {
  groups: Map<string, SkeletonGroup>;
  rejected: RejectedDescriptor[];
  warnings: ClassificationWarning[];
  /** Inputs dropped because an identical part was already grouped */
  duplicates: number;
}

// =============================================================================
// COMBINATIONS
// =============================================================================

/**
 * One part per selected category, body always included.
 */
export interface Combination {
  readonly skeleton: string;
  readonly parts: readonly PartDescriptor[];
}

export interface NamedCombination extends Combination {
  readonly name: string;
}

// =============================================================================
// HOST INTERFACE
// =============================================================================

/**
 * What the host needs to locate one part of a combination.
 */
export interface PartReference {
  category: string;
  /** Canonical name stem, e.g. "outfit-f-casual-01-v1-top" */
  name: string;
  source: string;
}

export interface ExportRequest {
  name: string;
  skeleton: string;
  parts: PartReference[];
  exportDir: string;
  fileName: string;
}

export type HostExportOutcome =
  | { ok: true; path: string }
  | { ok: false; reason: string };

/**
 * Assembles the referenced parts into one asset bundle and writes it.
 * Implementations are called one combination at a time.
 */
export interface OutfitHost {
  exportCombination(request: ExportRequest): Promise<HostExportOutcome>;
}

// =============================================================================
// REPORTING
// =============================================================================

export interface ExportedCombination {
  name: string;
  skeleton: string;
  path: string;
}

export interface FailedCombination {
  name: string;
  skeleton: string;
  reason: string;
}

export interface SkippedGroup {
  skeleton: string;
  reason: string;
}

/**
 * A group that held fewer combinations than were requested.
 */
export interface TruncatedGroup {
  skeleton: string;
  requested: number;
  available: number;
}

export interface ExportReport {
  exported: ExportedCombination[];
  failed: FailedCombination[];
  rejected: RejectedDescriptor[];
  skipped: SkippedGroup[];
  truncated: TruncatedGroup[];
  /** Named combinations skipped because the name was already exported */
  duplicates: number;
}
