import {
  S3Client,
  PutObjectCommand,
  PutObjectCommandInput,
  GetObjectCommand,
} from "@aws-sdk/client-s3";
import { ImagingConfig } from "../../config";
import { Logger } from "../../logger";
import { AppError, InternalError } from "../../errors/app-error";
import { Storage, StorageModule } from "../types";

/** Stores source images under S3_STORAGE_ROOT_PATH in one bucket. */
export class S3Storage implements Storage {
  private bucket: string;
  private rootPath: string;

  constructor(
    private readonly client: S3Client,
    config: ImagingConfig,
    private readonly logger: Logger,
  ) {
    this.bucket = config.s3StorageBucket;
    this.rootPath = config.s3StorageRootPath.replace(/^\/+|\/+$/g, "");
  }

  public keyFor(path: string): string {
    const key = path.replace(/^\/+/, "");
    return this.rootPath ? `${this.rootPath}/${key}` : key;
  }

  public async get(path: string): Promise<Buffer | undefined> {
    const key = this.keyFor(path);

    let response;
    try {
      response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
      );
    } catch (err) {
      if (this.isMissingObject(err)) return undefined;
      throw this.mapS3Error(err, "get", key);
    }

    if (!response.Body) return undefined;

    const bytes = await response.Body.transformToByteArray();
    return Buffer.from(bytes);
  }

  public async put(path: string, buffer: Buffer): Promise<void> {
    const key = this.keyFor(path);
    const params: PutObjectCommandInput = {
      Bucket: this.bucket,
      Key: key,
      Body: buffer,
    };

    this.logger.debug(`Storing in S3: ${this.bucket}/${key}`, {
      size: buffer.length,
    });

    try {
      await this.client.send(new PutObjectCommand(params));
    } catch (err) {
      throw this.mapS3Error(err, "put", key);
    }
  }

  // ─── S3 error mapping ───────────────────────────────────────────────

  private errorCode(err: unknown): string {
    if (typeof err === "object" && err !== null && "name" in err) {
      return String(err.name);
    }
    return "";
  }

  private isMissingObject(err: unknown): boolean {
    const code = this.errorCode(err);
    return code === "NoSuchKey" || code === "NotFound";
  }

  private mapS3Error(err: unknown, operation: string, key: string): AppError {
    const code = this.errorCode(err);
    const message =
      typeof err === "object" && err !== null && "message" in err
        ? String(err.message)
        : code;

    this.logger.error(`S3 ${operation} failed for key "${key}": ${code}`, {
      s3ErrorCode: code,
      message,
    });

    switch (code) {
      case "NoSuchBucket":
        return new InternalError(
          `S3 bucket "${this.bucket}" does not exist — check S3_STORAGE_BUCKET`,
        );

      case "AccessDenied":
      case "Forbidden":
        return new InternalError(
          "Access denied to S3 — check AWS credentials and bucket policy",
        );

      case "InvalidAccessKeyId":
      case "SignatureDoesNotMatch":
        return new InternalError(
          "Invalid AWS credentials — check AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY",
        );

      case "RequestTimeout":
      case "TimeoutError":
        return new InternalError(
          `S3 ${operation} timed out for key "${key}" — try again`,
        );

      default:
        return new InternalError(`S3 ${operation} failed: ${message}`);
    }
  }
}

/**
 * One client per process; credentials come from the default AWS
 * provider chain.
 */
export function createS3StorageModule(): StorageModule {
  let client: S3Client | undefined;
  return {
    create: (config, logger) => {
      client ??= new S3Client({ region: config.s3StorageRegion });
      return new S3Storage(client, config, logger);
    },
  };
}
