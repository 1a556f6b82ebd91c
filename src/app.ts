import * as http from "http";
import { Logger } from "./logger";
import { Router } from "./router";
import { Context } from "./context";
import { ComponentRegistry } from "./components/registry";
import { Application } from "./components/types";
import { HealthController } from "./controllers/health.controller";
import { ImageController } from "./controllers/image.controller";

/** The default application: health check plus unsafe image URLs. */
export class ImagingServiceApp implements Application {
  public readonly context: Context;
  private router: Router;

  constructor(context: Context, logger: Logger) {
    this.context = context;

    const errorHandler = context.modules.errorHandler;
    this.router = new Router(
      logger,
      errorHandler
        ? (err, req) => errorHandler.handleError(req, err)
        : undefined,
    );

    // -- Controllers (self-register routes via constructor) --
    new HealthController(logger, this.router);
    new ImageController(logger, this.router, context);
  }

  public handle(req: http.IncomingMessage, res: http.ServerResponse): void {
    this.router.resolve(req, res);
  }
}

/**
 * Instantiates the application named by `context.server.appClass`.
 * Constructor errors propagate as they are.
 */
export function getApplication(
  context: Context,
  registry: ComponentRegistry,
  logger: Logger,
): Application {
  const ApplicationClass = registry.resolve(
    "application",
    context.server.appClass,
  );
  return new ApplicationClass(context, logger);
}
