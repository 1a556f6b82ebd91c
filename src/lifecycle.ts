import * as fs from "fs";
import { Logger } from "./logger";
import { HttpServer } from "./http-server";
import { Context } from "./context";
import { Application } from "./components/types";
import { BindingError } from "./errors/startup-error";

export const INTERRUPTION_NOTICE = "-- imagery closed by user interruption --\n";

export enum LifecycleState {
  Created = "CREATED",
  Bound = "BOUND",
  Running = "RUNNING",
  Stopped = "STOPPED",
}

/** The subset of {@link HttpServer} the lifecycle drives. */
export type ListeningServer = Pick<
  HttpServer,
  "bind" | "addSocket" | "start" | "stop"
>;

export type ServerFactory = (
  application: Application,
  context: Context,
  logger: Logger,
) => ListeningServer;

export const createHttpServer: ServerFactory = (application, context, logger) =>
  new HttpServer(
    (req, res) => application.handle(req, res),
    logger,
    context.config.requestTimeoutMs,
  );

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/**
 * CREATED → BOUND → RUNNING → STOPPED. The socket comes from exactly one
 * of: a fresh bind to ip:port, an inherited descriptor number, or a
 * descriptor opened from a path.
 */
export class ServerLifecycle {
  private state = LifecycleState.Created;
  private server: ListeningServer;
  private context: Context;
  private logger: Logger;
  /** Descriptor this lifecycle opened from a path, if any. */
  private openedFd?: number;

  constructor(
    application: Application,
    context: Context,
    logger: Logger,
    createServer: ServerFactory = createHttpServer,
  ) {
    this.context = context;
    this.logger = logger;
    this.server = createServer(application, context, logger);
  }

  public get currentState(): LifecycleState {
    return this.state;
  }

  public bind(): void {
    this.expectState(LifecycleState.Created, "bind");
    const { fd, port, ip } = this.context.server;

    if (fd === undefined || fd === "") {
      this.server.bind(port, ip);
    } else if (typeof fd === "number") {
      this.logger.debug(`Attaching inherited descriptor ${fd}`);
      this.server.addSocket(fd);
    } else {
      this.openedFd = this.openDescriptorFile(fd);
      try {
        this.server.addSocket(this.openedFd);
      } catch (err) {
        this.closeOpenedFd();
        throw err;
      }
    }

    this.state = LifecycleState.Bound;
  }

  public async start(): Promise<void> {
    this.expectState(LifecycleState.Bound, "start");
    try {
      await this.server.start(1);
    } catch (err) {
      this.closeOpenedFd();
      throw err;
    }
    this.state = LifecycleState.Running;
  }

  /**
   * Binds, starts and serves until `signal` aborts. On interruption the
   * notice goes to stdout and each engine module is cleaned up before the
   * server closes; this is the only path that cleans up.
   */
  public async run(signal: AbortSignal): Promise<void> {
    this.bind();
    await this.start();
    await waitForAbort(signal);
    await this.interrupt();
  }

  private async interrupt(): Promise<void> {
    process.stdout.write(INTERRUPTION_NOTICE);
    const { engine, gifEngine } = this.context.modules;
    try {
      // a module serving both roles is cleaned up once
      for (const engineModule of new Set([engine, gifEngine])) {
        engineModule.cleanup();
      }
    } finally {
      this.state = LifecycleState.Stopped;
      await this.server.stop();
    }
  }

  private openDescriptorFile(path: string): number {
    try {
      return fs.openSync(path, "r");
    } catch (err) {
      throw new BindingError(
        `Could not open descriptor file "${path}": ${
          err instanceof Error ? err.message : err
        }`,
        { cause: err },
      );
    }
  }

  private closeOpenedFd(): void {
    if (this.openedFd === undefined) return;
    const fd = this.openedFd;
    this.openedFd = undefined;
    try {
      fs.closeSync(fd);
    } catch (err) {
      this.logger.warn(`Could not close descriptor ${fd}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private expectState(expected: LifecycleState, action: string): void {
    if (this.state !== expected) {
      throw new Error(
        `Cannot ${action} a server in state ${this.state}; expected ${expected}`,
      );
    }
  }
}

/** Binds and starts the server, returning its lifecycle in RUNNING. */
export async function runServer(
  application: Application,
  context: Context,
  logger: Logger,
  createServer?: ServerFactory,
): Promise<ServerLifecycle> {
  const lifecycle = new ServerLifecycle(application, context, logger, createServer);
  lifecycle.bind();
  await lifecycle.start();
  return lifecycle;
}
