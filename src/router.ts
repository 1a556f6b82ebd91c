import * as http from "http";
import FindMyWay, { HTTPMethod } from "find-my-way";
import { Logger } from "./logger";
import { AppError } from "./errors/app-error";

export type RouteHandler = (
  req: http.IncomingMessage,
  res: http.ServerResponse,
  params: Record<string, string | undefined>,
) => void | Promise<void>;

/** Observes every error a route handler throws, before it is answered. */
export type RouteErrorListener = (
  err: unknown,
  req: http.IncomingMessage,
) => void;

export class Router {
  private fmw: FindMyWay.Instance<FindMyWay.HTTPVersion.V1>;
  private logger: Logger;
  private onError?: RouteErrorListener;

  constructor(logger: Logger, onError?: RouteErrorListener) {
    this.logger = logger;
    this.onError = onError;
    this.fmw = FindMyWay({
      ignoreTrailingSlash: true,
      defaultRoute: (_req, res) => {
        res.writeHead(404, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ error: "Not Found" }));
      },
    });
  }

  public get(path: string, handler: RouteHandler): void {
    this.addRoute("GET", path, handler);
  }

  private addRoute(
    method: HTTPMethod,
    path: string,
    handler: RouteHandler,
  ): void {
    this.fmw.on(method, path, (req, res, params) => {
      this.logger.debug(`${method} ${req.url}`);

      Promise.resolve()
        .then(() => handler(req, res, params))
        .catch((err) => {
          this.handleRouteError(err, req, res, method, path);
        });
    });

    this.logger.debug(`Registered route: ${method} ${path}`);
  }

  public resolve(req: http.IncomingMessage, res: http.ServerResponse): void {
    this.fmw.lookup(req, res);
  }

  // ─── Centralised error handler ──────────────────────────────────────

  private handleRouteError(
    err: unknown,
    req: http.IncomingMessage,
    res: http.ServerResponse,
    method: string,
    path: string,
  ): void {
    if (this.onError) {
      try {
        this.onError(err, req);
      } catch (listenerErr) {
        this.logger.error(
          `Error handler failed for ${method} ${req.url}: ${
            listenerErr instanceof Error ? listenerErr.message : listenerErr
          }`,
        );
      }
    }

    if (res.writableEnded) return;

    if (err instanceof AppError) {
      this.logger.warn(
        `${method} ${req.url} → ${err.statusCode} ${err.message}`,
      );

      const body: Record<string, unknown> = { error: err.message };
      if (err.details) body.details = err.details;

      res.writeHead(err.statusCode, { "Content-Type": "application/json" });
      res.end(JSON.stringify(body));
      return;
    }

    // Unexpected / unknown error — log full stack and return 500
    this.logger.error(
      `Unhandled error in ${method} ${path}: ${
        err instanceof Error ? err.stack || err.message : err
      }`,
    );
    res.writeHead(500, { "Content-Type": "application/json" });
    res.end(JSON.stringify({ error: "Internal Server Error" }));
  }
}
