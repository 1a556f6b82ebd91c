import { ImagingServiceApp } from "../app";
import { DEFAULT_APP_CLASS } from "../server-parameters";
import { PassthroughEngineModule } from "./engines/passthrough.engine";
import { BUILTIN_FILTERS } from "./filters";
import { fileLoaderModule } from "./loaders/file.loader";
import { httpLoaderModule } from "./loaders/http.loader";
import { ComponentRegistry } from "./registry";
import {
  createMemoryStorageModule,
  noStorageModule,
} from "./storages/memory.storage";
import { createS3StorageModule } from "./storages/s3.storage";

export { ComponentRegistry } from "./registry";
export { Importer, getImporter } from "./importer";
export type { ImportedModules } from "./importer";
export * from "./types";

/** A registry holding every component shipped with the service. */
export function createDefaultRegistry(): ComponentRegistry {
  const registry = new ComponentRegistry()
    .register("engine", "imagery.engines.passthrough", new PassthroughEngineModule())
    .register("loader", "imagery.loaders.http_loader", httpLoaderModule)
    .register("loader", "imagery.loaders.file_loader", fileLoaderModule)
    .register("storage", "imagery.storages.no_storage", noStorageModule)
    .register("storage", "imagery.storages.memory", createMemoryStorageModule())
    .register("storage", "imagery.storages.s3", createS3StorageModule())
    .register("resultStorage", "imagery.storages.memory", createMemoryStorageModule())
    .register("resultStorage", "imagery.storages.s3", createS3StorageModule())
    .register("application", DEFAULT_APP_CLASS, ImagingServiceApp);

  for (const [name, filter] of Object.entries(BUILTIN_FILTERS)) {
    registry.register("filter", name, filter);
  }

  return registry;
}
