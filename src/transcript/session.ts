import type { PlayerResponse } from "./player-response";
import type { TranscriptList, TranscriptMeta, VideoId } from "./types";

export type SessionStep = "watch_page" | "consent_retry" | "player" | "document";

export type PaceInfo = {
  videoId: VideoId;
  step: SessionStep;
};

/** Awaited before every outbound request. */
export type PaceHook = (info: PaceInfo) => Promise<void>;

export type DocumentRequest = {
  videoId: VideoId;
  track: TranscriptMeta;
  /** Chosen by the selector; carries `tlang` for translations. */
  locator: string;
};

export interface PlatformSession {
  fetchPlayability(videoId: VideoId): Promise<PlayerResponse>;
  fetchTrackList(videoId: VideoId, player: PlayerResponse): Promise<TranscriptList>;
  fetchDocument(request: DocumentRequest): Promise<string>;
}

export const DEFAULT_DELAY_MS = 500;

export const sleep = (ms: number): Promise<void> => {
  return new Promise((resolve) => setTimeout(resolve, ms));
};

export const noPace: PaceHook = async () => {};

export const createDelayPacer = (ms: number = DEFAULT_DELAY_MS): PaceHook => {
  if (!Number.isFinite(ms) || ms <= 0) return noPace;
  return () => sleep(ms);
};
