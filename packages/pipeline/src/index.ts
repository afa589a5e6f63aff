/**
 * @outfit-forge/pipeline
 *
 * Filesystem discovery, GLB assembly and the `outfit-forge` command line
 * around @outfit-forge/combinator.
 *
 * @packageDocumentation
 */

export { ConfigError } from "./errors.js";

export {
  DEFAULT_COMBINATIONS,
  DEFAULT_EXTENSION,
  DEFAULT_IGNORED_CATEGORIES,
  pipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput,
  mergeEnvironment,
  resolveConfig,
  prepareDirectories,
  loadConfig,
} from "./config.js";

export {
  type DiscoveredAsset,
  type DiscoveryOptions,
  type CategorySkipReason,
  categorySkipReason,
  discoverAssets,
  scanAssets,
} from "./discovery/AssetDiscovery.js";

export {
  type GlbAssemblerOptions,
  GlbAssembler,
  jointNames,
  sameJointNames,
} from "./host/GlbAssembler.js";

export {
  type PipelineResult,
  OUTPUT_EXTENSION,
  runPipeline,
  isSuccessfulRun,
} from "./pipeline.js";

export { formatReport } from "./report.js";

export { USAGE, type CliCommand, parseCliArgs, main } from "./cli.js";
