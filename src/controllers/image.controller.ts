import * as http from "http";
import * as path from "path";
import { Logger } from "../logger";
import { Router } from "../router";
import { Context } from "../context";
import { BadRequestError, UnsupportedMediaTypeError } from "../errors/app-error";
import { detectMimeType, getSupportedTypes } from "../utils/mime";

/**
 * Serves `/unsafe/<source>`: source bytes come from storage when cached
 * there, from the loader otherwise, and go through a fresh engine.
 */
export class ImageController {
  private logger: Logger;
  private context: Context;

  constructor(logger: Logger, router: Router, context: Context) {
    this.logger = logger;
    this.context = context;
    this.registerRoutes(router);
  }

  private registerRoutes(router: Router): void {
    if (!this.context.config.allowUnsafeUrl) {
      this.logger.info("Unsafe URLs are disabled");
      return;
    }

    router.get("/unsafe/*", (req, res, params) =>
      this.getImage(req, res, params["*"]),
    );
  }

  private async getImage(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    source: string | undefined,
  ): Promise<void> {
    if (!source) {
      throw new BadRequestError("No source image was given");
    }

    const { config, modules } = this.context;
    const resultKey = req.url ?? source;
    const resultStorage = modules.resultStorage?.create(config, this.logger);

    const stored = await resultStorage?.get(resultKey);
    if (stored) {
      this.logger.debug(`Result storage hit for ${resultKey}`);
      return this.send(res, stored);
    }

    const buffer = await this.fetchSource(source);

    const mimeType = detectMimeType(buffer);
    if (!mimeType) {
      throw new UnsupportedMediaTypeError(
        "Source is not a supported image",
        getSupportedTypes(),
      );
    }

    const engineModule =
      mimeType === "image/gif" ? modules.gifEngine : modules.engine;
    const engine = engineModule.create(config);
    const extension = path.extname(source).toLowerCase() || undefined;

    let output: Buffer;
    try {
      engine.load(buffer, extension);
      output = engine.read(extension);
    } finally {
      engine.release();
    }

    await resultStorage?.put(resultKey, output);
    this.send(res, output);
  }

  private async fetchSource(source: string): Promise<Buffer> {
    const { config, modules } = this.context;
    const storage = modules.storage.create(config, this.logger);

    const cached = await storage.get(source);
    if (cached) return cached;

    const loaded = await modules.loader.create(config, this.logger).load(source);
    await storage.put(source, loaded.buffer);
    return loaded.buffer;
  }

  private send(res: http.ServerResponse, body: Buffer): void {
    res.writeHead(200, {
      "Content-Type": detectMimeType(body) ?? "application/octet-stream",
      "Content-Length": body.length,
    });
    res.end(body);
  }
}
