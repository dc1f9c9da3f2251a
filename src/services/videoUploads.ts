import { randomUUID } from "crypto";
import type { BlobStore } from "../lib/s3";
import type { Logger } from "../lib/logger";
import type { UploadSource, VideoRecord, VideoStore } from "../types";

export interface IngestVideoInput {
  userId: string;
  filename: string;
  source: UploadSource;
  videoId?: string;
}

export interface PlaybackLink {
  video: VideoRecord;
  url: string;
}

/**
 * Upload first, then record: a video row only ever points at an object that
 * was written successfully.
 */
export class VideoUploadService {
  private readonly logger: Logger;

  constructor(
    private readonly blobs: BlobStore,
    private readonly videos: VideoStore,
    logger: Logger,
    private readonly newId: () => string = randomUUID,
  ) {
    this.logger = logger.child({ component: "video-uploads" });
  }

  async ingest({ userId, filename, source, videoId = this.newId() }: IngestVideoInput): Promise<VideoRecord> {
    const storageKey = await this.blobs.uploadVideo(source, videoId, filename);
    const record = await this.videos.insert({ videoId, userId, filename, storageKey });
    this.logger.info({ videoId, userId, storageKey }, "video ingested");
    return record;
  }

  async playbackLink(videoId: string, expiresIn?: number): Promise<PlaybackLink | null> {
    const video = await this.videos.get(videoId);
    if (!video) return null;
    const url = await this.blobs.createDownloadUrl(video.storageKey, expiresIn);
    return { video, url };
  }
}
