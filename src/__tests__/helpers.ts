import * as http from "http";
import { Logger } from "../logger";
import { createConfig, ImagingConfig } from "../config";
import { ComponentRegistry } from "../components/registry";
import { createDefaultRegistry } from "../components";
import { getImporter } from "../components/importer";
import { EngineModule } from "../components/types";
import { Context, getContext } from "../context";
import {
  createServerParameters,
  ServerParameters,
} from "../server-parameters";

export function createMockLogger(): Logger {
  const logger = {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    child: jest.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}

export const TEST_ENGINE = "tests.engine";
export const TEST_GIF_ENGINE = "tests.gif_engine";

export interface FakeEngineModule extends EngineModule {
  create: jest.Mock;
  cleanup: jest.Mock;
}

export function createFakeEngineModule(): FakeEngineModule {
  return {
    create: jest.fn(),
    cleanup: jest.fn(),
  };
}

/**
 * A context resolved against the default registry plus two fake engines,
 * registered as `tests.engine` and `tests.gif_engine`. Only the first is
 * configured unless the settings name the second.
 */
export function makeContext(
  server: Partial<ServerParameters> = {},
  settings: Record<string, unknown> = {},
): {
  context: Context;
  config: ImagingConfig;
  engine: FakeEngineModule;
  gifEngine: FakeEngineModule;
  registry: ComponentRegistry;
} {
  const engine = createFakeEngineModule();
  const gifEngine = createFakeEngineModule();
  const registry = createDefaultRegistry()
    .register("engine", TEST_ENGINE, engine)
    .register("engine", TEST_GIF_ENGINE, gifEngine);
  const config = createConfig({
    SECURITY_KEY: "test-secret",
    ENGINE: TEST_ENGINE,
    ...settings,
  });
  const context = getContext(
    createServerParameters(server),
    config,
    getImporter(config, registry),
  );
  return { context, config, engine, gifEngine, registry };
}

export function createFakeServer() {
  return {
    bind: jest.fn(),
    addSocket: jest.fn(),
    start: jest.fn().mockResolvedValue(undefined),
    stop: jest.fn().mockResolvedValue(undefined),
  };
}

export interface FakeResponse {
  res: http.ServerResponse;
  writeHead: jest.Mock;
  end: jest.Mock;
  /** Resolves once `end` has been called. */
  finished: Promise<void>;
}

export function createFakeResponse(): FakeResponse {
  let markFinished: () => void = () => undefined;
  const finished = new Promise<void>((resolve) => {
    markFinished = resolve;
  });

  const fake = {
    writableEnded: false,
    writeHead: jest.fn(),
    end: jest.fn(),
  };
  fake.end.mockImplementation(() => {
    fake.writableEnded = true;
    markFinished();
  });

  return {
    res: fake as unknown as http.ServerResponse,
    writeHead: fake.writeHead,
    end: fake.end,
    finished,
  };
}

export function createFakeRequest(url: string): http.IncomingMessage {
  return { method: "GET", url, headers: {} } as unknown as http.IncomingMessage;
}
