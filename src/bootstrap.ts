import { ImagingConfig, loadConfig } from "./config";
import { configureLog } from "./logger";
import { getApplication } from "./app";
import { getContext } from "./context";
import { ComponentRegistry } from "./components/registry";
import { createDefaultRegistry } from "./components";
import { getImporter } from "./components/importer";
import { ServerFactory, ServerLifecycle } from "./lifecycle";
import { getServerParameters } from "./server-parameters";
import {
  BinaryLookup,
  applyValidation,
  findOnPath,
  validateConfig,
} from "./validation";

export interface MainOptions {
  /** Aborting it is the interruption that stops the server. */
  signal: AbortSignal;
  registry?: ComponentRegistry;
  createServer?: ServerFactory;
  findBinary?: BinaryLookup;
}

export function getConfig(
  path?: string,
  useEnvironment = false,
): ImagingConfig {
  return loadConfig(path, useEnvironment);
}

/**
 * Assembles the process and serves until interrupted. Every startup
 * failure rejects before the server accepts a connection.
 */
export async function main(argv: string[], options: MainOptions): Promise<void> {
  const params = getServerParameters(argv);
  const config = getConfig(params.configPath, params.useEnvironment);
  const logger = configureLog(config, params.logLevel);

  const registry = options.registry ?? createDefaultRegistry();
  const importer = getImporter(config, registry);

  const validation = validateConfig(
    config,
    params,
    options.findBinary ?? findOnPath,
  );
  const server = applyValidation(params, validation);

  const context = getContext(server, config, importer);
  const application = getApplication(context, registry, logger.child("app"));

  logger.debug("Starting imaging server", {
    port: server.port,
    ip: server.ip,
    fd: server.fd,
    debug: server.debug,
    appClass: server.appClass,
  });

  const lifecycle = new ServerLifecycle(
    application,
    context,
    logger.child("server"),
    options.createServer,
  );
  await lifecycle.run(options.signal);
}
