import pino from "pino";
import pretty from "pino-pretty";
import dateFormat from "dateformat";
import { ImagingConfig } from "./config";
import { ConfigurationError } from "./errors/startup-error";

export const ROOT_LOGGER_NAME = "imagery";

/** `YYYY-MM-DD HH:MM:SS` in local time, dateformat notation. */
export const LOG_TIMESTAMP_FORMAT = "yyyy-mm-dd HH:MM:ss";

const DEFAULT_LEVEL = "warning";

const LEVELS: Record<string, pino.Level> = {
  TRACE: "trace",
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  WARNING: "warn",
  ERROR: "error",
  CRITICAL: "fatal",
  FATAL: "fatal",
};

export type LogSetup =
  | { kind: "structured"; options: pino.LoggerOptions }
  | { kind: "basic"; level: pino.Level; timestampFormat: string };

export function toPinoLevel(level: string): pino.Level {
  const mapped = LEVELS[level.toUpperCase()];
  if (!mapped) {
    throw new ConfigurationError(
      `Invalid log level "${level}". Expected one of: ${Object.keys(LEVELS).join(", ")}`,
    );
  }
  return mapped;
}

/**
 * Decides how logging is set up: a LOG_CONFIG mapping wins verbatim,
 * otherwise the fixed basic format at the requested level.
 */
export function buildLogSetup(config: ImagingConfig, level: string): LogSetup {
  if (config.logConfig) {
    return { kind: "structured", options: config.logConfig };
  }
  return basicSetup(level);
}

function basicSetup(level: string): LogSetup {
  return {
    kind: "basic",
    level: toPinoLevel(level),
    timestampFormat: LOG_TIMESTAMP_FORMAT,
  };
}

/** Renders one record as `timestamp logger-name:LEVEL message`. */
export function formatLogLine(
  log: Record<string, unknown>,
  messageKey: string,
  timestampFormat: string,
): string {
  const time = typeof log.time === "number" ? log.time : Date.now();
  const name = typeof log.name === "string" ? log.name : ROOT_LOGGER_NAME;
  const label =
    typeof log.level === "number" ? pino.levels.labels[log.level] : undefined;
  const message = log[messageKey] ?? "";

  return `${dateFormat(time, timestampFormat)} ${name}:${(label ?? "USERLVL").toUpperCase()} ${message}`;
}

function createPino(setup: LogSetup, destination?: pino.DestinationStream): pino.Logger {
  if (setup.kind === "structured") {
    return pino({ name: ROOT_LOGGER_NAME, ...setup.options }, destination);
  }

  return pino(
    { name: ROOT_LOGGER_NAME, level: setup.level },
    pretty({
      // the whole line comes from formatLogLine
      messageFormat: (log, messageKey) =>
        formatLogLine(log, messageKey, setup.timestampFormat),
      ignore: "pid,hostname,name,level,time",
      colorize: false,
      sync: true,
      destination,
    }),
  );
}

export class Logger {
  private logger: pino.Logger;

  constructor(logger: pino.Logger) {
    this.logger = logger;
  }

  child(name: string): Logger {
    return new Logger(this.logger.child({ name }));
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.logger.info(data, message);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.logger.error(data, message);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.logger.warn(data, message);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.logger.debug(data, message);
  }
}

/** Applied once at startup; returns the root logger. */
export function configureLog(
  config: ImagingConfig,
  level: string,
  destination?: pino.DestinationStream,
): Logger {
  return new Logger(createPino(buildLogSetup(config, level), destination));
}

/** Basic-format logger for reports made before any configuration is read. */
export function createDefaultLogger(destination?: pino.DestinationStream): Logger {
  return new Logger(createPino(basicSetup(DEFAULT_LEVEL), destination));
}
