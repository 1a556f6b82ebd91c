import * as http from "http";
import { Logger } from "../logger";
import { Router } from "../router";

export class HealthController {
  private logger: Logger;

  constructor(logger: Logger, router: Router) {
    this.logger = logger;
    this.registerRoutes(router);
  }

  private registerRoutes(router: Router): void {
    router.get("/healthcheck", (req, res, _params) => this.getHealth(req, res));
  }

  private getHealth(
    _req: http.IncomingMessage,
    res: http.ServerResponse,
  ): void {
    this.logger.debug("Health check requested");

    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end("WORKING");
  }
}
