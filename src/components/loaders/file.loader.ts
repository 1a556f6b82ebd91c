import * as fs from "fs/promises";
import * as path from "path";
import { ImagingConfig } from "../../config";
import { Logger } from "../../logger";
import {
  BadRequestError,
  ForbiddenError,
  NotFoundError,
} from "../../errors/app-error";
import { decodeSourcePath } from "../../utils/url";
import { LoadedSource, Loader, LoaderModule } from "../types";

/** Reads sources below FILE_LOADER_ROOT_PATH. */
export class FileLoader implements Loader {
  private root: string;

  constructor(
    private readonly config: ImagingConfig,
    private readonly logger: Logger,
  ) {
    this.root = path.resolve(config.fileLoaderRootPath);
  }

  public async load(url: string): Promise<LoadedSource> {
    const relative = decodeSourcePath(url).replace(/^\/+/, "");
    const filePath = path.resolve(this.root, relative);

    if (!filePath.startsWith(this.root + path.sep)) {
      throw new ForbiddenError(`Path "${url}" escapes the loader root`);
    }

    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (err) {
      const code = err instanceof Error && "code" in err ? err.code : undefined;
      if (code === "ENOENT" || code === "EISDIR") {
        throw new NotFoundError(`Source "${relative}" not found`);
      }
      throw err;
    }

    if (buffer.length > this.config.maxSourceSize) {
      throw new BadRequestError(
        `Source image is ${buffer.length} bytes, over the ${this.config.maxSourceSize} byte limit`,
      );
    }

    this.logger.debug(`Loaded ${filePath} (${buffer.length} bytes)`);
    return { buffer };
  }
}

export const fileLoaderModule: LoaderModule = {
  create: (config, logger) => new FileLoader(config, logger),
};
