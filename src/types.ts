import type { Readable } from "stream";

// Known lifecycle values. Stored status is an open set: inserts accept any string.
export type VideoStatus = "pending" | "processing" | "completed" | "failed";

// 1. Row shape in the videos table
export interface VideoRow {
  video_id: string;
  user_id: string;
  filename: string;
  storage_key: string;
  status: string;
  created_at: Date;
  updated_at: Date;
}

// 2. Record shape handed to callers
export interface VideoRecord {
  videoId: string;
  userId: string;
  filename: string;
  storageKey: string;
  status: VideoStatus | (string & {});
  createdAt: Date;
  updatedAt: Date;
}

// 3. Store inputs
export interface NewVideo {
  videoId: string;
  userId: string;
  filename: string;
  storageKey: string;
  status?: VideoStatus | (string & {});
}

export interface VideoFilter {
  userId?: string;
  status?: string;
  limit?: number;
}

export const DEFAULT_LIST_LIMIT = 100;

export interface VideoStore {
  insert(video: NewVideo): Promise<VideoRecord>;
  get(videoId: string): Promise<VideoRecord | null>;
  list(filter?: VideoFilter): Promise<VideoRecord[]>;
  updateStatus(videoId: string, status: VideoStatus): Promise<VideoRecord | null>;
  delete(videoId: string): Promise<boolean>;
  countByStatus(userId?: string): Promise<Record<string, number>>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

/**
 * A byte source that can be read from the start more than once. Every
 * upload attempt calls `open()` and reads the returned stream from byte zero.
 */
export interface ReplayableSource {
  open(): Readable;
}

export type UploadSource = Buffer | ReplayableSource;
