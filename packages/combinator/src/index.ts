/**
 * @outfit-forge/combinator
 *
 * Groups rigged body-part assets by skeleton, recombines them into full-body
 * outfits and names every outfit after the parts it contains.
 *
 * @packageDocumentation
 */

export * from "./types.js";

export {
  ErrorCodes,
  type ErrorCode,
  OutfitError,
  ParseFailure,
  ClassificationRejection,
  InvalidArgument,
  ExportFailure,
  toErrorMessage,
} from "./errors.js";

export {
  TAG_SEPARATOR,
  BODY_CATEGORY,
  UNDEFINED_REGION,
  DESCRIPTOR_DEFAULTS,
  isValidCategory,
  tokenizeIdentifier,
  parseDescriptor,
  isParseFailure,
  formatDescriptor,
  descriptorIdentity,
} from "./parser/DescriptorParser.js";

export { classify, groupSize, rejectionError } from "./classifier/Classifier.js";

export {
  type GenerateOptions,
  selectCategories,
  candidateSpaceSize,
  rankToIndices,
  sampleRanks,
  generateCombinations,
  combinationKey,
} from "./generator/CombinationGenerator.js";

export {
  NAME_PREFIX,
  HASH_LENGTH,
  canonicalIdentity,
  combinationHash,
  nameCombination,
  nameCombinations,
  parseCombinationName,
  combinationFileName,
  toPartReferences,
} from "./naming/NamingEngine.js";

export {
  type ExportRunOptions,
  type ExportCoordinatorEvents,
  ExportCoordinator,
  createEmptyReport,
  runExport,
} from "./export/ExportCoordinator.js";

export {
  SeededRandom,
  getDefaultRandom,
  setDefaultSeed,
} from "./math/Random.js";

export {
  LogLevel,
  type LogEntry,
  type LoggerConfig,
  Logger,
  SystemLogger,
} from "./utils/Logger.js";
