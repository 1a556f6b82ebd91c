import * as http from "http";
import { Logger } from "./logger";
import { BindingError } from "./errors/startup-error";

type ListenTarget =
  | { kind: "address"; port: number; host: string }
  | { kind: "descriptor"; fd: number };

export class HttpServer {
  private server: http.Server;
  private logger: Logger;
  private target?: ListenTarget;

  constructor(
    listener: http.RequestListener,
    logger: Logger,
    requestTimeoutMs = 30_000,
  ) {
    this.logger = logger;

    this.server = http.createServer((req, res) => {
      // Per-request timeout — prevents hung connections from lingering
      res.setTimeout(requestTimeoutMs, () => {
        this.logger.warn(
          `Request timed out after ${requestTimeoutMs}ms: ${req.method} ${req.url}`,
        );
        if (!res.writableEnded) {
          res.writeHead(504, { "Content-Type": "application/json" });
          res.end(JSON.stringify({ error: "Gateway Timeout" }));
        }
      });

      listener(req, res);
    });
  }

  /** Listens on a new socket bound to `host:port` once started. */
  public bind(port: number, host: string): void {
    this.target = { kind: "address", port, host };
  }

  /** Serves an already-open listening socket descriptor once started. */
  public addSocket(fd: number): void {
    this.target = { kind: "descriptor", fd };
  }

  /**
   * Starts accepting connections. Only a single process is supported;
   * there is no pre-forking.
   */
  public start(processes = 1): Promise<void> {
    const target = this.target;
    if (processes !== 1) {
      return Promise.reject(
        new BindingError(`Cannot start ${processes} processes; only 1 is supported`),
      );
    }
    if (!target) {
      return Promise.reject(
        new BindingError("Nothing to listen on: bind or add a socket first"),
      );
    }

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        reject(
          new BindingError(`Could not listen on ${describe(target)}: ${err.message}`, {
            cause: err,
          }),
        );
      };

      this.server.once("error", onError);
      const onListening = () => {
        this.server.off("error", onError);
        this.logger.info(`Imaging server listening on ${describe(target)}`);
        resolve();
      };

      if (target.kind === "address") {
        this.server.listen(target.port, target.host, onListening);
      } else {
        this.server.listen({ fd: target.fd }, onListening);
      }
    });
  }

  /** Stops listening and drops open connections; requests are not drained. */
  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) {
          this.logger.error(`Error stopping server: ${err.message}`);
          return reject(err);
        }
        this.logger.info("Server stopped");
        resolve();
      });
      this.server.closeAllConnections();
    });
  }
}

function describe(target: ListenTarget): string {
  return target.kind === "address"
    ? `http://${target.host}:${target.port}`
    : `descriptor ${target.fd}`;
}
