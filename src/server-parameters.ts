import * as fs from "fs";
import { Command, InvalidArgumentError } from "commander";
import { coerceInteger } from "./config";
import { ConfigurationError } from "./errors/startup-error";

export const DEFAULT_APP_CLASS = "imagery.app.ImagingServiceApp";

/**
 * Runtime knobs of one server process. `fd` keeps the three externally
 * visible shapes apart: absent, an inherited descriptor number, or the
 * path of a file that refers to a pre-opened socket.
 */
export interface ServerParameters {
  readonly port: number;
  readonly ip: string;
  readonly fd?: number | string;
  readonly configPath?: string;
  readonly keyfile?: string;
  readonly logLevel: string;
  readonly debug: boolean;
  readonly appClass: string;
  readonly useEnvironment: boolean;
  readonly securityKey?: string;
  readonly gifsiclePath?: string;
}

export function createServerParameters(
  overrides: Partial<ServerParameters> = {},
): ServerParameters {
  return Object.freeze({
    port: 8888,
    ip: "0.0.0.0",
    logLevel: "warning",
    debug: false,
    appClass: DEFAULT_APP_CLASS,
    useEnvironment: false,
    ...overrides,
  });
}

/** Integer text becomes a descriptor number, anything else a path. */
export function parseDescriptor(raw: string | undefined): number | string | undefined {
  if (raw === undefined || raw === "") return undefined;
  return coerceInteger(raw) ?? raw;
}

function parsePort(raw: string): number {
  const port = coerceInteger(raw);
  if (port === undefined || port < 0 || port > 65535) {
    throw new InvalidArgumentError("Not a valid port number.");
  }
  return port;
}

function readKeyfile(path: string): string {
  try {
    return fs.readFileSync(path, "utf-8").trim();
  } catch (err) {
    throw new ConfigurationError(`Could not read security key file "${path}"`, {
      cause: err,
    });
  }
}

type CommandOptions = {
  port: number;
  ip: string;
  fd?: string;
  conf?: string;
  keyfile?: string;
  logLevel: string;
  debug: boolean;
  app: string;
  useEnvironment: boolean;
};

function createCommand(): Command {
  return new Command()
    .name("imagery")
    .description("Image-processing HTTP service")
    .option("-p, --port <port>", "port to listen on", parsePort, 8888)
    .option("-i, --ip <ip>", "address to bind to", "0.0.0.0")
    .option(
      "-f, --fd <fd>",
      "inherited socket descriptor, or the path of a file referring to one",
    )
    .option("-c, --conf <path>", "path to the configuration file")
    .option("-k, --keyfile <path>", "path to a file holding the security key")
    .option("-l, --log-level <level>", "log level", "warning")
    .option("-o, --debug", "debug mode", false)
    .option("-a, --app <name>", "application to serve", DEFAULT_APP_CLASS)
    .option(
      "--use-environment",
      "let environment variables override configuration settings",
      false,
    )
    .exitOverride()
    .allowExcessArguments(false);
}

/** `argv` is in `process.argv` form: executable and script first. */
export function getServerParameters(argv: string[]): ServerParameters {
  const command = createCommand();
  command.parse(argv);
  const options = command.opts<CommandOptions>();

  return createServerParameters({
    port: options.port,
    ip: options.ip,
    fd: parseDescriptor(options.fd),
    configPath: options.conf,
    keyfile: options.keyfile,
    logLevel: options.logLevel,
    debug: options.debug,
    appClass: options.app,
    useEnvironment: options.useEnvironment,
    securityKey: options.keyfile ? readKeyfile(options.keyfile) : undefined,
  });
}
