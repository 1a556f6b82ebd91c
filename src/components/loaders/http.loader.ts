import { ImagingConfig } from "../../config";
import { Logger } from "../../logger";
import {
  BadGatewayError,
  BadRequestError,
  ForbiddenError,
  NotFoundError,
} from "../../errors/app-error";
import { compileHostPattern } from "../../utils/host-pattern";
import { decodeSourcePath } from "../../utils/url";
import { LoadedSource, Loader, LoaderModule } from "../types";

/** Prepends `http://` when the URL carries no scheme. */
export function normalizeSourceUrl(url: string): string {
  const decoded = decodeSourcePath(url);
  return /^https?:\/\//i.test(decoded) ? decoded : `http://${decoded}`;
}

/** Checks the URL's hostname against compiled ALLOWED_SOURCES patterns. */
export function isAllowedSource(url: string, allowedHosts: readonly RegExp[]): boolean {
  if (allowedHosts.length === 0) return true;

  let hostname: string;
  try {
    hostname = new URL(url).hostname;
  } catch {
    return false;
  }

  return allowedHosts.some((pattern) => pattern.test(hostname));
}

function tooLarge(maxSourceSize: number, size?: number): BadRequestError {
  return new BadRequestError(
    size === undefined
      ? `Source image is over the ${maxSourceSize} byte limit`
      : `Source image is ${size} bytes, over the ${maxSourceSize} byte limit`,
  );
}

export class HttpLoader implements Loader {
  private allowedHosts: RegExp[];

  constructor(
    private readonly config: ImagingConfig,
    private readonly logger: Logger,
  ) {
    this.allowedHosts = config.allowedSources.map(compileHostPattern);
  }

  public async load(url: string): Promise<LoadedSource> {
    const sourceUrl = normalizeSourceUrl(url);

    if (!isAllowedSource(sourceUrl, this.allowedHosts)) {
      throw new ForbiddenError(`Source "${sourceUrl}" is not allowed`);
    }

    this.logger.debug(`Fetching source ${sourceUrl}`);

    let response: Response;
    try {
      response = await fetch(sourceUrl, {
        signal: AbortSignal.timeout(this.config.httpLoaderRequestTimeout),
      });
    } catch (err) {
      this.logger.warn(`Fetching ${sourceUrl} failed`, {
        error: err instanceof Error ? err.message : String(err),
      });
      throw new BadGatewayError(`Could not fetch source "${sourceUrl}"`);
    }

    if (response.status === 404) {
      throw new NotFoundError(`Source "${sourceUrl}" not found`);
    }
    if (!response.ok) {
      throw new BadGatewayError(
        `Source "${sourceUrl}" answered with status ${response.status}`,
      );
    }

    const buffer = await this.readBody(response);

    return {
      buffer,
      contentType: response.headers.get("content-type") ?? undefined,
    };
  }

  /**
   * Reads the body up to MAX_SOURCE_SIZE. A larger declared length is
   * refused unread; a body that grows past the limit is cancelled.
   */
  private async readBody(response: Response): Promise<Buffer> {
    const limit = this.config.maxSourceSize;
    const declared = Number(response.headers.get("content-length") ?? NaN);

    if (declared > limit) {
      await response.body?.cancel();
      throw tooLarge(limit, declared);
    }
    if (!response.body) return Buffer.alloc(0);

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let size = 0;

    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;

      size += value.byteLength;
      if (size > limit) {
        await reader.cancel();
        throw tooLarge(limit);
      }
      chunks.push(value);
    }

    return Buffer.concat(chunks, size);
  }
}

export const httpLoaderModule: LoaderModule = {
  create: (config, logger) => new HttpLoader(config, logger),
};
