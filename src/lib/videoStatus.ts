import { InvalidStatusTransitionError } from "./errors";
import type { VideoStatus } from "../types";

export const VIDEO_STATUSES: readonly VideoStatus[] = ["pending", "processing", "completed", "failed"];

export const terminalStatuses: ReadonlySet<VideoStatus> = new Set(["completed", "failed"]);

const allowedTransitions: Record<VideoStatus, ReadonlyArray<VideoStatus>> = {
  pending: ["processing"],
  processing: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function isVideoStatus(value: string): value is VideoStatus {
  return VIDEO_STATUSES.some((status) => status === value);
}

export function canTransition(from: string, to: VideoStatus): boolean {
  return isVideoStatus(from) && allowedTransitions[from].includes(to);
}

/** Throws unless `from -> to` is in the transition table. Unknown stored values never transition. */
export function assertTransition(from: string, to: VideoStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidStatusTransitionError(from, to);
  }
}
