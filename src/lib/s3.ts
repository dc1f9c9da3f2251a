import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import fs from "fs";
import path from "path";
import type { Readable } from "stream";
import { requireStorageConfig, type StorageConfig, type StorageSettings } from "../config";
import {
  PermissionDeniedError,
  StorageNotFoundError,
  TransientInfrastructureError,
  errorCode,
} from "./errors";
import { getLogger, type Logger } from "./logger";
import { RetryPolicy } from "./retry";
import type { ReplayableSource, UploadSource } from "../types";

export interface PutObjectInput {
  bucket: string;
  key: string;
  body: Buffer | Readable;
  contentType: string;
}

export interface PresignInput {
  method: "GET" | "PUT";
  bucket: string;
  key: string;
  expiresIn: number;
}

/** The single network seam of the blob store. */
export interface ObjectTransport {
  putObject(input: PutObjectInput): Promise<void>;
  presign(input: PresignInput): Promise<string>;
}

export type TransportFactory = (config: StorageConfig, logger: Logger) => ObjectTransport;

const CONTENT_TYPES: Record<string, string> = {
  ".mp4": "video/mp4",
  ".m4v": "video/x-m4v",
  ".mov": "video/quicktime",
  ".webm": "video/webm",
  ".mkv": "video/x-matroska",
  ".avi": "video/x-msvideo",
  ".m3u8": "application/vnd.apple.mpegurl",
  ".ts": "video/MP2T",
};

export function contentTypeFor(name: string): string {
  return CONTENT_TYPES[path.extname(name).toLowerCase()] ?? "application/octet-stream";
}

/**
 * `folder/name` with leading and trailing slashes stripped from the folder,
 * or `name` verbatim when there is no folder. Same key means same object:
 * a second upload overwrites the first.
 */
export function buildStorageKey(name: string, folder?: string): string {
  const prefix = folder?.replace(/^\/+|\/+$/g, "");
  return prefix ? `${prefix}/${name}` : name;
}

/** Collision-resistant key for a video: one object per video id. */
export function videoStorageKey(videoId: string, filename: string): string {
  return buildStorageKey(`${videoId}${path.extname(filename).toLowerCase()}`, "videos");
}

export function fileSource(filePath: string): ReplayableSource {
  return { open: () => fs.createReadStream(filePath) };
}

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
]);

const PERMISSION_ERRORS = new Set([
  "AccessDenied",
  "InvalidAccessKeyId",
  "SignatureDoesNotMatch",
  "AllAccessDisabled",
]);

const THROTTLING_ERRORS = new Set(["SlowDown", "Throttling", "ThrottlingException", "RequestTimeout"]);

/**
 * Maps an SDK or socket failure onto the storage error taxonomy. Errors that
 * fit no category are returned unchanged.
 */
export function classifyStorageError(error: unknown, key: string): unknown {
  if (error instanceof S3ServiceException) {
    const status = error.$metadata.httpStatusCode;
    const detail = `${error.name}: ${error.message}`;

    if (PERMISSION_ERRORS.has(error.name) || status === 403) {
      return new PermissionDeniedError(`Access denied writing ${key} (${detail})`, { cause: error });
    }
    if (error.name === "NoSuchBucket" || status === 404) {
      return new StorageNotFoundError(`Bucket not found writing ${key} (${detail})`, { cause: error });
    }
    if (
      THROTTLING_ERRORS.has(error.name) ||
      error.$fault === "server" ||
      status === 429 ||
      (status !== undefined && status >= 500)
    ) {
      return new TransientInfrastructureError(`Storage service error writing ${key} (${detail})`, {
        cause: error,
      });
    }
    return error;
  }

  if (error instanceof Error) {
    const code = errorCode(error);
    if (
      error.name === "AbortError" ||
      error.name === "TimeoutError" ||
      (code !== undefined && NETWORK_ERROR_CODES.has(code))
    ) {
      return new TransientInfrastructureError(`Network error writing ${key}: ${error.message}`, {
        cause: error,
      });
    }
  }

  return error;
}

export class S3Transport implements ObjectTransport {
  private readonly client: S3Client;

  constructor(
    private readonly config: StorageConfig,
    private readonly logger: Logger,
  ) {
    this.client = new S3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
      // retries belong to the blob store's RetryPolicy
      maxAttempts: 1,
    });
  }

  async putObject({ bucket, key, body, contentType }: PutObjectInput): Promise<void> {
    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      },
    });

    const timer = setTimeout(() => {
      this.logger.warn({ key, timeoutMs: this.config.uploadTimeoutMs }, "upload timed out, aborting");
      upload.abort().catch((err: unknown) => this.logger.error({ err, key }, "upload abort failed"));
    }, this.config.uploadTimeoutMs);

    try {
      await upload.done();
    } finally {
      clearTimeout(timer);
    }
  }

  async presign({ method, bucket, key, expiresIn }: PresignInput): Promise<string> {
    if (method === "PUT") {
      return getSignedUrl(this.client, new PutObjectCommand({ Bucket: bucket, Key: key }), { expiresIn });
    }
    return getSignedUrl(this.client, new GetObjectCommand({ Bucket: bucket, Key: key }), { expiresIn });
  }
}

export interface BlobStoreOptions {
  createTransport?: TransportFactory;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export class BlobStore {
  private transport?: ObjectTransport;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;

  constructor(
    private readonly settings: StorageSettings,
    private readonly options: BlobStoreOptions = {},
  ) {
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
    this.logger = (options.logger ?? getLogger()).child({ component: "blob-store" });
  }

  // settings are checked before any client is created
  private connect(): { config: StorageConfig; transport: ObjectTransport } {
    const config = requireStorageConfig(this.settings);
    if (!this.transport) {
      const create: TransportFactory =
        this.options.createTransport ?? ((c, log) => new S3Transport(c, log));
      this.transport = create(config, this.logger);
    }
    return { config, transport: this.transport };
  }

  /** Uploads `source` under `folder/name` (or `name`) and returns the object key. */
  async upload(source: UploadSource, name: string, folder?: string): Promise<string> {
    const key = buildStorageKey(name, folder);
    await this.put(source, key);
    return key;
  }

  async uploadVideo(source: UploadSource, videoId: string, filename: string): Promise<string> {
    const key = videoStorageKey(videoId, filename);
    await this.put(source, key);
    return key;
  }

  async createUploadUrl(key: string, expiresIn?: number): Promise<string> {
    return this.presign("PUT", key, expiresIn);
  }

  async createDownloadUrl(key: string, expiresIn?: number): Promise<string> {
    return this.presign("GET", key, expiresIn);
  }

  private async presign(method: "GET" | "PUT", key: string, expiresIn?: number): Promise<string> {
    const { config, transport } = this.connect();
    try {
      return await transport.presign({
        method,
        bucket: config.bucket,
        key,
        expiresIn: expiresIn ?? config.presignExpiresIn,
      });
    } catch (error) {
      throw classifyStorageError(error, key);
    }
  }

  private async put(source: UploadSource, key: string): Promise<void> {
    let connection: { config: StorageConfig; transport: ObjectTransport };
    try {
      connection = this.connect();
    } catch (error) {
      this.logger.error({ err: error, key }, "storage is not configured");
      throw error;
    }
    const { config, transport } = connection;
    const contentType = contentTypeFor(key);

    try {
      await this.retryPolicy.run(
        async () => {
          const body = Buffer.isBuffer(source) ? source : source.open();
          try {
            await transport.putObject({ bucket: config.bucket, key, body, contentType });
          } catch (error) {
            if (!Buffer.isBuffer(body)) body.destroy();
            throw classifyStorageError(error, key);
          }
        },
        {
          sleep: this.options.sleep,
          onRetry: (decision, error) =>
            this.logger.warn(
              { err: error, key, attempt: decision.attempt, delayMs: decision.delayMs },
              "upload failed, retrying",
            ),
        },
      );
    } catch (error) {
      this.logger.error({ err: error, key, bucket: config.bucket }, "upload failed");
      throw error;
    }

    this.logger.info({ key, bucket: config.bucket, contentType }, "upload complete");
  }
}
