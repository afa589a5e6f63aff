import { ErrorCodes, OutfitError } from "@outfit-forge/combinator";

/**
 * Invalid or missing pipeline configuration. Raised before any asset is read.
 */
export class ConfigError extends OutfitError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    cause?: Error,
  ) {
    super(message, ErrorCodes.CONFIG_ERROR, { issues }, cause);
    this.name = "ConfigError";
  }
}
