import type * as http from "http";
import type { ImagingConfig } from "../config";
import type { Context } from "../context";
import type { Logger } from "../logger";

/**
 * Contracts of the pluggable roles. Only discovery and instantiation
 * belong to this service; what an engine or detector does with the bytes
 * is up to the component.
 */

export interface Engine {
  load(buffer: Buffer, extension?: string): void;
  read(extension?: string): Buffer;
  /** Drops the loaded image once the request is done with it. */
  release(): void;
}

export interface EngineModule {
  create(config: ImagingConfig): Engine;
  /** Releases whatever the module's engines still hold. Called on shutdown. */
  cleanup(): void;
}

export interface LoadedSource {
  buffer: Buffer;
  contentType?: string;
}

export interface Loader {
  load(url: string): Promise<LoadedSource>;
}

export interface LoaderModule {
  create(config: ImagingConfig, logger: Logger): Loader;
}

export interface Storage {
  get(path: string): Promise<Buffer | undefined>;
  put(path: string, buffer: Buffer): Promise<void>;
}

export interface StorageModule {
  create(config: ImagingConfig, logger: Logger): Storage;
}

export interface FocalPoint {
  x: number;
  y: number;
  weight: number;
}

export interface Detector {
  detect(buffer: Buffer): Promise<FocalPoint[]>;
}

export interface DetectorModule {
  create(config: ImagingConfig): Detector;
}

export interface FilterModule {
  readonly name: string;
  /** Matches the argument list of the filter, without parentheses. */
  readonly parameters: RegExp;
}

export interface ErrorHandler {
  handleError(request: http.IncomingMessage, error: unknown): void;
}

export type ErrorHandlerClass = new (config: ImagingConfig) => ErrorHandler;

export interface Application {
  readonly context: Context;
  handle(req: http.IncomingMessage, res: http.ServerResponse): void;
}

export type ApplicationClass = new (
  context: Context,
  logger: Logger,
) => Application;

export interface ComponentTypes {
  engine: EngineModule;
  loader: LoaderModule;
  storage: StorageModule;
  resultStorage: StorageModule;
  detector: DetectorModule;
  filter: FilterModule;
  errorHandler: ErrorHandlerClass;
  application: ApplicationClass;
}

export type ComponentRole = keyof ComponentTypes;
