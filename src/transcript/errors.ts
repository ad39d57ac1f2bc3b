import type { JsonValue } from "./types";

export type TranscriptErrorKind =
  | "invalid_video_id"
  | "video_unavailable"
  | "video_unplayable"
  | "age_restricted"
  | "transcripts_disabled"
  | "no_transcript_found"
  | "translation_not_supported"
  | "translation_language_unavailable"
  | "ip_blocked"
  | "request_blocked"
  | "po_token_required"
  | "consent_cookie_failed"
  | "platform_data_unparsable"
  | "xml_parse_error"
  | "network"
  | "cleanup_failed";

const TRANSCRIPT_ERROR_KINDS: TranscriptErrorKind[] = [
  "invalid_video_id",
  "video_unavailable",
  "video_unplayable",
  "age_restricted",
  "transcripts_disabled",
  "no_transcript_found",
  "translation_not_supported",
  "translation_language_unavailable",
  "ip_blocked",
  "request_blocked",
  "po_token_required",
  "consent_cookie_failed",
  "platform_data_unparsable",
  "xml_parse_error",
  "network",
  "cleanup_failed"
];

const kindSet = new Set<string>(TRANSCRIPT_ERROR_KINDS);

export const isTranscriptErrorKind = (value: unknown): value is TranscriptErrorKind => {
  return typeof value === "string" && kindSet.has(value);
};

export const isRetryableKind = (kind: TranscriptErrorKind): boolean => {
  return kind === "network" || kind === "ip_blocked" || kind === "request_blocked";
};

export type TranscriptErrorOptions = {
  videoId?: string;
  details?: Record<string, JsonValue>;
  retryable?: boolean;
  cause?: unknown;
};

export class TranscriptError extends Error {
  readonly kind: TranscriptErrorKind;
  readonly videoId?: string;
  readonly details: Record<string, JsonValue>;
  readonly retryable: boolean;

  constructor(kind: TranscriptErrorKind, message: string, options: TranscriptErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "TranscriptError";
    this.kind = kind;
    this.videoId = options.videoId;
    this.details = options.details ?? {};
    this.retryable = options.retryable ?? isRetryableKind(kind);
  }

  toJSON(): Record<string, JsonValue> {
    return {
      kind: this.kind,
      message: this.message,
      retryable: this.retryable,
      ...(this.videoId ? { videoId: this.videoId } : {}),
      ...(Object.keys(this.details).length > 0 ? { details: this.details } : {})
    };
  }
}

export const isTranscriptError = (value: unknown): value is TranscriptError => {
  return value instanceof TranscriptError;
};

export const toTranscriptError = (
  error: unknown,
  options: { fallbackKind?: TranscriptErrorKind; videoId?: string } = {}
): TranscriptError => {
  if (isTranscriptError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new TranscriptError(options.fallbackKind ?? "network", message || "Unknown transcript failure", {
    videoId: options.videoId,
    cause: error
  });
};

const listFromDetails = (details: Record<string, JsonValue>, key: string): string[] => {
  const value = details[key];
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === "string");
};

/** One-line message suitable for a terminal. */
export const describeTranscriptError = (error: TranscriptError): string => {
  const subject = error.videoId ? `video ${error.videoId}` : "the video";
  switch (error.kind) {
    case "invalid_video_id":
      return `Not a YouTube video id or URL: ${error.message}`;
    case "video_unavailable":
      return `The video is unavailable (${subject}).`;
    case "video_unplayable": {
      const reason = typeof error.details.reason === "string" && error.details.reason
        ? error.details.reason
        : "no reason given";
      return `The video cannot be played (${subject}): ${reason}`;
    }
    case "age_restricted":
      return `The video is age restricted and needs a signed-in session (${subject}).`;
    case "transcripts_disabled":
      return `Subtitles are disabled for ${subject}.`;
    case "no_transcript_found": {
      const requested = listFromDetails(error.details, "requested").join(", ") || "(any)";
      const available = listFromDetails(error.details, "available").join(", ") || "(none)";
      return `No transcript found for ${subject} in ${requested}. Available: ${available}`;
    }
    case "translation_not_supported":
      return `The selected transcript of ${subject} cannot be translated.`;
    case "translation_language_unavailable":
      return `Translation language is not offered for ${subject}: ${error.message}`;
    case "ip_blocked":
      return `YouTube is blocking requests from this IP (${subject}). Wait before retrying.`;
    case "request_blocked":
      return `YouTube flagged the request as automated traffic (${subject}).`;
    case "po_token_required":
      return `The caption endpoint requires a proof-of-origin token (${subject}).`;
    case "consent_cookie_failed":
      return `Could not get past the cookie consent page (${subject}).`;
    case "platform_data_unparsable":
      return `The YouTube page data could not be read (${subject}): ${error.message}`;
    case "xml_parse_error":
      return `The caption document is malformed (${subject}): ${error.message}`;
    case "cleanup_failed":
      return `Text cleanup failed: ${error.message}`;
    case "network":
    default:
      return `Request failed (${subject}): ${error.message}`;
  }
};
