export type {
  Cue,
  JsonValue,
  TrackKind,
  Transcript,
  TranscriptList,
  TranscriptMeta,
  TranslationLanguage,
  VideoId
} from "./transcript/types";
export { TRACK_KIND_PREFERENCE } from "./transcript/types";

export {
  TranscriptError,
  describeTranscriptError,
  isTranscriptError,
  isTranscriptErrorKind,
  toTranscriptError,
  type TranscriptErrorKind
} from "./transcript/errors";

export { isVideoId, resolveVideoId, watchUrlFor } from "./transcript/video-id";
export { parseTimedText, decodeEntities } from "./transcript/timed-text";
export {
  findGenerated,
  findManuallyCreated,
  findTranscript,
  generatedTracks,
  manualTracks,
  resolveDocumentLocator,
  selectTranscript,
  type Selection
} from "./transcript/selector";
export {
  OUTPUT_FORMATS,
  fileExtensionFor,
  formatSrtTime,
  parseOutputFormat,
  renderTrackList,
  renderTranscript,
  type OutputFormat,
  type RenderOptions
} from "./transcript/render";
export {
  createDelayPacer,
  type DocumentRequest,
  type PaceHook,
  type PlatformSession,
  type SessionStep
} from "./transcript/session";
export { YouTubeSession, type YouTubeSessionOptions } from "./transcript/youtube-session";
export {
  TranscriptFetcher,
  fetchTranscript,
  listTranscripts,
  translateTranscript,
  type SessionContext,
  type SessionFactory,
  type TranscriptFetcherOptions
} from "./transcript/fetcher";
export { assertPlayability } from "./transcript/playability";
export { extractTranscriptList, parsePlayerResponse, type PlayerResponse } from "./transcript/player-response";

export { createChatCleanup, type CleanupStyle, type TextCleanup } from "./cleanup/text-cleanup";
export { createLogger, type Logger, type LogLevel, type LogSink } from "./core/logging";
export { loadConfig, type TubescriptConfig } from "./config";
