import { Readable } from "stream";
import { ConflictError } from "./errors";
import { assertListLimit } from "./db";
import type { ObjectTransport, PresignInput, PutObjectInput } from "./s3";
import { assertTransition } from "./videoStatus";
import {
  DEFAULT_LIST_LIMIT,
  type NewVideo,
  type VideoFilter,
  type VideoRecord,
  type VideoStatus,
  type VideoStore,
} from "../types";

export interface StoredObject {
  bytes: Buffer;
  contentType: string;
}

const readAll = async (body: Buffer | Readable): Promise<Buffer> => {
  if (Buffer.isBuffer(body)) return Buffer.from(body);
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
};

/**
 * In-memory object storage. Last write wins per bucket/key, as in S3.
 */
export class MemoryObjectTransport implements ObjectTransport {
  readonly objects = new Map<string, StoredObject>();

  async putObject({ bucket, key, body, contentType }: PutObjectInput): Promise<void> {
    this.objects.set(`${bucket}/${key}`, { bytes: await readAll(body), contentType });
  }

  async presign({ method, bucket, key, expiresIn }: PresignInput): Promise<string> {
    return `memory://${bucket}/${key}?method=${method}&expires=${expiresIn}`;
  }

  read(bucket: string, key: string): StoredObject | undefined {
    return this.objects.get(`${bucket}/${key}`);
  }
}

const copy = (record: VideoRecord): VideoRecord => ({
  ...record,
  createdAt: new Date(record.createdAt),
  updatedAt: new Date(record.updatedAt),
});

/**
 * In-memory video store for local development. Same ordering, filtering and
 * conflict semantics as the PostgreSQL store.
 */
export class MemoryVideoStore implements VideoStore {
  private readonly videos = new Map<string, VideoRecord>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async insert(video: NewVideo): Promise<VideoRecord> {
    if (this.videos.has(video.videoId)) {
      throw new ConflictError(`Video already exists (insert): ${video.videoId}`);
    }
    const now = this.now();
    const record: VideoRecord = {
      videoId: video.videoId,
      userId: video.userId,
      filename: video.filename,
      storageKey: video.storageKey,
      status: video.status ?? "pending",
      createdAt: now,
      updatedAt: now,
    };
    this.videos.set(record.videoId, record);
    return copy(record);
  }

  async get(videoId: string): Promise<VideoRecord | null> {
    const record = this.videos.get(videoId);
    return record ? copy(record) : null;
  }

  async list(filter: VideoFilter = {}): Promise<VideoRecord[]> {
    const limit = filter.limit ?? DEFAULT_LIST_LIMIT;
    assertListLimit(limit);

    return [...this.videos.values()]
      .filter((record) => !filter.userId || record.userId === filter.userId)
      .filter((record) => !filter.status || record.status === filter.status)
      .sort(
        (a, b) =>
          b.createdAt.getTime() - a.createdAt.getTime() ||
          (a.videoId < b.videoId ? -1 : a.videoId > b.videoId ? 1 : 0),
      )
      .slice(0, limit)
      .map(copy);
  }

  async updateStatus(videoId: string, status: VideoStatus): Promise<VideoRecord | null> {
    const record = this.videos.get(videoId);
    if (!record) return null;
    if (record.status === status) return copy(record);

    assertTransition(record.status, status);
    const now = this.now();
    const next: VideoRecord = {
      ...record,
      status,
      updatedAt: now > record.createdAt ? now : record.createdAt,
    };
    this.videos.set(videoId, next);
    return copy(next);
  }

  async delete(videoId: string): Promise<boolean> {
    return this.videos.delete(videoId);
  }

  async countByStatus(userId?: string): Promise<Record<string, number>> {
    const counts: Record<string, number> = {};
    for (const record of this.videos.values()) {
      if (userId && record.userId !== userId) continue;
      counts[record.status] = (counts[record.status] ?? 0) + 1;
    }
    return counts;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}
}
