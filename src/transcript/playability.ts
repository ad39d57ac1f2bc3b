import { TranscriptError } from "./errors";
import type { PlayabilityStatus, PlayerResponse } from "./player-response";
import type { VideoId } from "./types";

const BOT_CHECK_RE = /not a bot/i;
const AGE_GATE_RE = /inappropriate for some users|confirm your age/i;
const UNAVAILABLE_RE = /unavailable/i;
const AGE_STATUSES = new Set(["AGE_CHECK_REQUIRED", "AGE_VERIFICATION_REQUIRED"]);

type SubreasonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is SubreasonRecord => {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
};

/** `errorScreen.playerErrorMessageRenderer.subreason` lines, when present. */
export const readSubreasons = (status: PlayabilityStatus): string[] => {
  const screen = status.errorScreen;
  if (!isRecord(screen)) return [];
  const renderer = screen.playerErrorMessageRenderer;
  if (!isRecord(renderer)) return [];
  const subreason = renderer.subreason;
  if (!isRecord(subreason)) return [];
  if (typeof subreason.simpleText === "string") return [subreason.simpleText];
  if (!Array.isArray(subreason.runs)) return [];
  const runs: unknown[] = subreason.runs;
  return runs
    .map((run) => (isRecord(run) && typeof run.text === "string" ? run.text.trim() : ""))
    .filter((line) => line.length > 0);
};

/** Throws the matching typed error unless the player reports the video as playable. */
export const assertPlayability = (videoId: VideoId, player: PlayerResponse): void => {
  const playability = player.playabilityStatus;
  if (!playability) return;
  const status = playability.status ?? "";
  if (status === "OK") return;

  const reason = playability.reason ?? "";
  const details = { status, reason };

  if (AGE_STATUSES.has(status)) {
    throw new TranscriptError("age_restricted", reason || status, { videoId, details });
  }

  if (status === "LOGIN_REQUIRED") {
    if (BOT_CHECK_RE.test(reason)) {
      throw new TranscriptError("request_blocked", reason, { videoId, details });
    }
    if (AGE_GATE_RE.test(reason)) {
      throw new TranscriptError("age_restricted", reason, { videoId, details });
    }
    throw new TranscriptError("video_unavailable", reason || "Sign-in required", { videoId, details });
  }

  if (status === "ERROR" && UNAVAILABLE_RE.test(reason)) {
    throw new TranscriptError("video_unavailable", reason, { videoId, details });
  }

  throw new TranscriptError("video_unplayable", reason || status || "No playability status", {
    videoId,
    details: { ...details, subreasons: readSubreasons(playability) }
  });
};
