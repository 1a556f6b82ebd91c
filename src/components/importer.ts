import { ImagingConfig } from "../config";
import { ComponentRegistry } from "./registry";
import {
  DetectorModule,
  EngineModule,
  ErrorHandler,
  FilterModule,
  LoaderModule,
  StorageModule,
} from "./types";

/**
 * Components named by the configuration, resolved once per process.
 * Module references are instantiated per request by whoever uses them;
 * only the error handler is a live instance.
 */
export interface ImportedModules {
  readonly engine: EngineModule;
  readonly gifEngine: EngineModule;
  readonly loader: LoaderModule;
  readonly storage: StorageModule;
  readonly resultStorage?: StorageModule;
  readonly detectors: readonly DetectorModule[];
  readonly filters: readonly FilterModule[];
  readonly errorHandler?: ErrorHandler;
}

export class Importer {
  private modules?: ImportedModules;

  constructor(private readonly registry: ComponentRegistry) {}

  /**
   * Resolves every role. The first unknown name throws a ResolutionError
   * and nothing is kept.
   */
  public resolve(config: ImagingConfig): ImportedModules {
    if (this.modules) {
      throw new Error("Components were already resolved for this process");
    }

    const modules: ImportedModules = {
      engine: this.registry.resolve("engine", config.engine),
      gifEngine: this.registry.resolve("engine", config.gifEngine),
      loader: this.registry.resolve("loader", config.loader),
      storage: this.registry.resolve("storage", config.storage),
      resultStorage: config.resultStorage
        ? this.registry.resolve("resultStorage", config.resultStorage)
        : undefined,
      detectors: Object.freeze(
        config.detectors.map((name) => this.registry.resolve("detector", name)),
      ),
      filters: Object.freeze(
        config.filters.map((name) => this.registry.resolve("filter", name)),
      ),
      errorHandler: config.useCustomErrorHandling
        ? this.createErrorHandler(config)
        : undefined,
    };

    this.modules = Object.freeze(modules);
    return this.modules;
  }

  public get resolved(): ImportedModules {
    if (!this.modules) {
      throw new Error("Components have not been resolved yet");
    }
    return this.modules;
  }

  private createErrorHandler(config: ImagingConfig): ErrorHandler {
    const HandlerClass = this.registry.resolve(
      "errorHandler",
      config.errorHandlerModule,
    );
    return new HandlerClass(config);
  }
}

export function getImporter(
  config: ImagingConfig,
  registry: ComponentRegistry,
): Importer {
  const importer = new Importer(registry);
  importer.resolve(config);
  return importer;
}
