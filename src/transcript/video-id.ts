import { TranscriptError } from "./errors";
import type { VideoId } from "./types";

const VIDEO_ID_RE = /^[A-Za-z0-9_-]{11}$/;
const PATH_ID_RE = /^\/(?:embed|shorts|live|v)\/([^/?#]+)/;
const YOUTUBE_HOSTS = new Set(["youtube.com", "m.youtube.com", "music.youtube.com", "youtube-nocookie.com"]);
const SHORT_HOST = "youtu.be";

export const isVideoId = (value: string): value is VideoId => VIDEO_ID_RE.test(value);

const invalid = (input: string): TranscriptError => {
  return new TranscriptError(
    "invalid_video_id",
    `${input} (YouTube video ids are 11 characters, or a youtube.com / youtu.be URL)`,
    { details: { input } }
  );
};

const toUrl = (input: string): URL | null => {
  const hasScheme = /^https?:\/\//i.test(input);
  const mentionsPlatform = /(youtube\.com|youtube-nocookie\.com|youtu\.be)/i.test(input);
  if (!hasScheme && !mentionsPlatform) return null;
  try {
    return new URL(hasScheme ? input : `https://${input}`);
  } catch {
    return null;
  }
};

const normalizeHost = (hostname: string): string => hostname.toLowerCase().replace(/^www\./, "");

const candidateFromUrl = (url: URL): string | null => {
  const host = normalizeHost(url.hostname);
  if (host === SHORT_HOST) {
    const segment = url.pathname.split("/")[1];
    return segment ? segment : null;
  }
  if (!YOUTUBE_HOSTS.has(host)) return null;

  const fromQuery = url.searchParams.get("v");
  if (fromQuery) return fromQuery;

  return url.pathname.match(PATH_ID_RE)?.[1] ?? null;
};

/**
 * Extract the video id from a bare id or one of the known URL shapes:
 * `watch?v=`, `youtu.be/<id>`, `/embed/`, `/shorts/`, `/live/`, `/v/`.
 * Surrounding query parameters and fragments are ignored.
 */
export function resolveVideoId(input: string): VideoId {
  const trimmed = input.trim();
  if (isVideoId(trimmed)) return trimmed;

  const url = toUrl(trimmed);
  if (!url) throw invalid(input);

  const candidate = candidateFromUrl(url);
  if (candidate && isVideoId(candidate)) return candidate;
  throw invalid(input);
}

export const watchUrlFor = (videoId: VideoId): string => {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
};
