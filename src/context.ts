import { ImagingConfig } from "./config";
import { Importer, ImportedModules } from "./components/importer";
import { FilterModule } from "./components/types";
import { ServerParameters } from "./server-parameters";

/**
 * Everything a request handler may read. Built once at startup and
 * shared by every request; nothing in it changes afterwards.
 */
export interface Context {
  readonly server: ServerParameters;
  readonly config: ImagingConfig;
  readonly modules: ImportedModules;
  /** Filters available to URLs, keyed by the name used in the URL. */
  readonly filters: ReadonlyMap<string, FilterModule>;
}

export function getContext(
  server: ServerParameters,
  config: ImagingConfig,
  importer: Importer,
): Context {
  const modules = importer.resolved;
  return Object.freeze({
    server,
    config,
    modules,
    filters: new Map(modules.filters.map((filter) => [filter.name, filter])),
  });
}
