import "reflect-metadata";
import * as fs from "fs";
import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Min,
  Validate,
  ValidationArguments,
  ValidatorConstraint,
  ValidatorConstraintInterface,
  validateSync,
} from "class-validator";
import { plainToInstance } from "class-transformer";
import type { LoggerOptions } from "pino";
import { ConfigurationError } from "./errors/startup-error";
import { DEFAULT_FILTERS } from "./components/filters";
import { isValidHostPattern } from "./utils/host-pattern";

const SETTINGS_METADATA = Symbol("imagery:settings");

export interface SettingDefinition {
  /** Property on {@link ImagingConfig}. */
  property: string;
  /** Key in the configuration file, and name of the environment variable. */
  key: string;
  /** Whether the environment may override the value in override mode. */
  environment: boolean;
}

/**
 * Binds a config property to its file key. Settings flagged with
 * `environment` must be string-typed: an override is applied as the raw
 * environment string.
 */
export function Setting(
  key: string,
  options: { environment?: boolean } = {},
): PropertyDecorator {
  return (target, property) => {
    const existing: SettingDefinition[] =
      Reflect.getMetadata(SETTINGS_METADATA, target) ?? [];
    Reflect.defineMetadata(
      SETTINGS_METADATA,
      [
        ...existing,
        {
          property: String(property),
          key,
          environment: options.environment ?? false,
        },
      ],
      target,
    );
  };
}

export function getSettingDefinitions(): SettingDefinition[] {
  return Reflect.getMetadata(SETTINGS_METADATA, ImagingConfig.prototype) ?? [];
}

@ValidatorConstraint({ name: "isHostPattern" })
class IsHostPatternConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    return typeof value === "string" && isValidHostPattern(value);
  }

  defaultMessage(args: ValidationArguments): string {
    const entries: unknown[] = Array.isArray(args.value) ? args.value : [args.value];
    const invalid = entries
      .filter((entry) => !this.validate(entry))
      .map((entry) => JSON.stringify(entry));
    return `ALLOWED_SOURCES has invalid regular expressions: ${invalid.join(", ")}`;
  }
}

export class ImagingConfig {
  @Setting("SECURITY_KEY", { environment: true })
  @IsString()
  @IsOptional()
  securityKey?: string;

  @Setting("ALLOW_UNSAFE_URL")
  @IsBoolean()
  allowUnsafeUrl: boolean = true;

  /** Host patterns the http loader may fetch from; empty allows any. */
  @Setting("ALLOWED_SOURCES")
  @IsArray()
  @IsString({ each: true })
  @Validate(IsHostPatternConstraint, { each: true })
  allowedSources: string[] = [];

  @Setting("ENGINE", { environment: true })
  @IsString()
  @IsNotEmpty()
  engine: string = "imagery.engines.passthrough";

  @Setting("GIF_ENGINE", { environment: true })
  @IsString()
  @IsNotEmpty()
  gifEngine: string = "imagery.engines.passthrough";

  @Setting("USE_GIFSICLE_ENGINE")
  @IsBoolean()
  useGifsicleEngine: boolean = false;

  @Setting("LOADER", { environment: true })
  @IsString()
  @IsNotEmpty()
  loader: string = "imagery.loaders.http_loader";

  @Setting("STORAGE", { environment: true })
  @IsString()
  @IsNotEmpty()
  storage: string = "imagery.storages.no_storage";

  @Setting("RESULT_STORAGE", { environment: true })
  @IsString()
  @IsOptional()
  resultStorage?: string;

  @Setting("DETECTORS")
  @IsArray()
  @IsString({ each: true })
  detectors: string[] = [];

  @Setting("FILTERS")
  @IsArray()
  @IsString({ each: true })
  filters: string[] = [...DEFAULT_FILTERS];

  @Setting("USE_CUSTOM_ERROR_HANDLING")
  @IsBoolean()
  useCustomErrorHandling: boolean = false;

  @Setting("ERROR_HANDLER_MODULE", { environment: true })
  @IsString()
  @IsOptional()
  errorHandlerModule?: string;

  /** pino options applied verbatim instead of the basic log setup. */
  @Setting("LOG_CONFIG")
  @IsObject()
  @IsOptional()
  logConfig?: LoggerOptions;

  @Setting("FILE_LOADER_ROOT_PATH", { environment: true })
  @IsString()
  @IsNotEmpty()
  fileLoaderRootPath: string = "/tmp";

  /** Milliseconds before the http loader gives up on a source. */
  @Setting("HTTP_LOADER_REQUEST_TIMEOUT")
  @IsInt()
  @Min(1)
  httpLoaderRequestTimeout: number = 20_000;

  /** Largest accepted source image in bytes (default 10 MB). */
  @Setting("MAX_SOURCE_SIZE")
  @IsInt()
  @Min(1)
  maxSourceSize: number = 10 * 1024 * 1024;

  /** Per-request timeout in milliseconds (default 30 s). */
  @Setting("REQUEST_TIMEOUT_MS")
  @IsInt()
  @Min(1)
  requestTimeoutMs: number = 30_000;

  @Setting("S3_STORAGE_BUCKET", { environment: true })
  @IsString()
  @IsNotEmpty()
  s3StorageBucket: string = "imagery-storage";

  @Setting("S3_STORAGE_REGION", { environment: true })
  @IsString()
  @IsNotEmpty()
  s3StorageRegion: string = "us-east-1";

  @Setting("S3_STORAGE_ROOT_PATH", { environment: true })
  @IsString()
  s3StorageRootPath: string = "storage";
}

/**
 * Best-effort base-10 integer parse. Absent, empty and non-integer input
 * all yield `undefined`.
 */
export function coerceInteger(raw: string | null | undefined): number | undefined {
  if (raw === null || raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return undefined;
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

function readSettingsFile(path: string | undefined): Record<string, unknown> {
  if (!path) return {};

  let raw: string;
  try {
    raw = fs.readFileSync(path, "utf-8");
  } catch {
    // Missing or unreadable files fall back to defaults.
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(
      `Configuration file "${path}" is not valid JSON`,
      { cause: err },
    );
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(
      `Configuration file "${path}" must contain a JSON object of settings`,
    );
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Builds a validated, frozen configuration from overrides keyed by
 * setting name. Anything not given keeps its default.
 */
export function createConfig(
  settings: Record<string, unknown> = {},
): ImagingConfig {
  const byProperty: Record<string, unknown> = {};
  for (const definition of getSettingDefinitions()) {
    if (settings[definition.key] !== undefined) {
      byProperty[definition.property] = settings[definition.key];
    }
  }

  const config = plainToInstance(ImagingConfig, byProperty);
  const errors = validateSync(config);

  if (errors.length > 0) {
    const messages = errors.map((e) =>
      Object.values(e.constraints || {}).join(", "),
    );
    throw new ConfigurationError(
      `Invalid configuration:\n  ${messages.join("\n  ")}`,
    );
  }

  return Object.freeze(config);
}

export function loadConfig(
  path?: string,
  allowEnvironmentOverride = false,
  env: NodeJS.ProcessEnv = process.env,
): ImagingConfig {
  const settings = readSettingsFile(path);

  if (allowEnvironmentOverride) {
    for (const definition of getSettingDefinitions()) {
      const value = env[definition.key];
      if (definition.environment && value !== undefined) {
        settings[definition.key] = value;
      }
    }
  }

  return createConfig(settings);
}
