import { describeTranscriptError, isTranscriptError, type TranscriptErrorKind } from "../transcript/errors";

export const EXIT_SUCCESS = 0;
export const EXIT_USAGE = 1;
export const EXIT_EXECUTION = 2;
export const EXIT_NO_TRANSCRIPT = 3;
export const EXIT_VIDEO_UNAVAILABLE = 4;
export const EXIT_BLOCKED = 5;
export const EXIT_NETWORK = 6;
export const EXIT_PARSE = 7;
export const EXIT_CLEANUP = 8;

const KIND_EXIT_CODES: Record<TranscriptErrorKind, number> = {
  invalid_video_id: EXIT_USAGE,
  transcripts_disabled: EXIT_NO_TRANSCRIPT,
  no_transcript_found: EXIT_NO_TRANSCRIPT,
  translation_not_supported: EXIT_NO_TRANSCRIPT,
  translation_language_unavailable: EXIT_NO_TRANSCRIPT,
  video_unavailable: EXIT_VIDEO_UNAVAILABLE,
  video_unplayable: EXIT_VIDEO_UNAVAILABLE,
  age_restricted: EXIT_VIDEO_UNAVAILABLE,
  ip_blocked: EXIT_BLOCKED,
  request_blocked: EXIT_BLOCKED,
  po_token_required: EXIT_BLOCKED,
  consent_cookie_failed: EXIT_BLOCKED,
  network: EXIT_NETWORK,
  xml_parse_error: EXIT_PARSE,
  platform_data_unparsable: EXIT_PARSE,
  cleanup_failed: EXIT_CLEANUP
};

export class CliError extends Error {
  exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.exitCode = exitCode;
  }
}

export function createUsageError(message: string): CliError {
  return new CliError(message, EXIT_USAGE);
}

export function exitCodeForKind(kind: TranscriptErrorKind): number {
  return KIND_EXIT_CODES[kind];
}

export function toCliError(error: unknown, fallbackExitCode = EXIT_EXECUTION): CliError {
  if (error instanceof CliError) {
    return error;
  }
  if (isTranscriptError(error)) {
    return new CliError(describeTranscriptError(error), exitCodeForKind(error.kind));
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CliError(message, fallbackExitCode);
}
