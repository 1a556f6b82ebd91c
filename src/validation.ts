import which from "which";
import { ImagingConfig } from "./config";
import { ConfigurationError } from "./errors/startup-error";
import { ServerParameters } from "./server-parameters";

export const MISSING_SECURITY_KEY_MESSAGE =
  "No security key was found for this instance of imagery. " +
  "Please provide one using the conf file or a security key file.";

export const MISSING_GIFSICLE_MESSAGE =
  "If using USE_GIFSICLE_ENGINE configuration to True, " +
  "the `gifsicle` binary must be in the PATH and must be an executable.";

/** Absolute path of an executable on PATH, or null when there is none. */
export type BinaryLookup = (name: string) => string | null;

export const findOnPath: BinaryLookup = (name) =>
  which.sync(name, { nothrow: true });

/** What validation resolved, to be merged into the server parameters. */
export interface ValidationResult {
  securityKey: string;
  gifsiclePath?: string;
}

/**
 * Pre-flight checks, run before any socket is opened. The credential is
 * always checked; gifsicle is only looked up when its engine is enabled.
 */
export function validateConfig(
  config: ImagingConfig,
  params: ServerParameters,
  findBinary: BinaryLookup = findOnPath,
): ValidationResult {
  const securityKey = params.securityKey || config.securityKey;
  if (!securityKey) {
    throw new ConfigurationError(MISSING_SECURITY_KEY_MESSAGE);
  }

  const result: ValidationResult = { securityKey };

  if (config.useGifsicleEngine) {
    const gifsiclePath = findBinary("gifsicle");
    if (!gifsiclePath) {
      throw new ConfigurationError(MISSING_GIFSICLE_MESSAGE);
    }
    result.gifsiclePath = gifsiclePath;
  }

  return result;
}

export function applyValidation(
  params: ServerParameters,
  result: ValidationResult,
): ServerParameters {
  return Object.freeze({ ...params, ...result });
}
