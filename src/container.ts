import type { AppConfig } from "./config";
import { PgVideoStore } from "./lib/db";
import type { Logger } from "./lib/logger";
import { MemoryObjectTransport, MemoryVideoStore } from "./lib/memory";
import { RetryPolicy } from "./lib/retry";
import { BlobStore } from "./lib/s3";
import { VideoUploadService } from "./services/videoUploads";
import type { VideoStore } from "./types";

export interface Container {
  blobs: BlobStore;
  videos: VideoStore;
  uploads: VideoUploadService;
}

export function createContainer(config: AppConfig, logger: Logger): Container {
  const retryPolicy = new RetryPolicy(config.uploadRetry);

  if (config.dataDriver === "memory") {
    logger.warn("DATA_DRIVER=memory: videos and uploads are kept in process memory");
    const transport = new MemoryObjectTransport();
    const blobs = new BlobStore(
      { ...config.storage, accessKeyId: "local", secretAccessKey: "local", bucket: config.storage.bucket ?? "local" },
      { logger, retryPolicy, createTransport: () => transport },
    );
    const videos = new MemoryVideoStore();
    return { blobs, videos, uploads: new VideoUploadService(blobs, videos, logger) };
  }

  const blobs = new BlobStore(config.storage, { logger, retryPolicy });
  const videos = new PgVideoStore(config.database, { logger });
  return { blobs, videos, uploads: new VideoUploadService(blobs, videos, logger) };
}
