import { createLogger, createRunId, type Logger } from "../core/logging";
import type { FetchFn } from "../shared/http";
import type { RequestHeaderOverrides } from "../shared/request-headers";
import { toTranscriptError } from "./errors";
import { selectTranscript } from "./selector";
import { createDelayPacer, DEFAULT_DELAY_MS, type PaceHook, type PlatformSession } from "./session";
import { parseTimedText } from "./timed-text";
import type { Transcript, TranscriptList, VideoId } from "./types";
import { resolveVideoId } from "./video-id";
import { YouTubeSession } from "./youtube-session";

export type SessionContext = {
  runId: string;
  pace: PaceHook;
  timeoutMs?: number;
  headers?: RequestHeaderOverrides;
  fetchFn?: FetchFn;
  logger: Logger;
};

export type SessionFactory = (context: SessionContext) => PlatformSession;

export type TranscriptFetcherOptions = {
  createSession?: SessionFactory;
  /** Replaces the sleep pacer built from `delayMs`. */
  pace?: PaceHook;
  delayMs?: number;
  timeoutMs?: number;
  headers?: RequestHeaderOverrides;
  fetchFn?: FetchFn;
  logger?: Logger;
};

const defaultSessionFactory: SessionFactory = (context) => new YouTubeSession(context);

export class TranscriptFetcher {
  private readonly createSession: SessionFactory;
  private readonly pace: PaceHook;
  private readonly logger: Logger;
  private readonly options: TranscriptFetcherOptions;

  constructor(options: TranscriptFetcherOptions = {}) {
    this.options = options;
    this.createSession = options.createSession ?? defaultSessionFactory;
    this.pace = options.pace ?? createDelayPacer(options.delayMs ?? DEFAULT_DELAY_MS);
    this.logger = options.logger ?? createLogger("transcript");
  }

  /** Every caption track the video offers, in platform order. */
  async list(videoRef: string): Promise<TranscriptList> {
    return this.run(videoRef, "list", async (session, videoId) => {
      const player = await session.fetchPlayability(videoId);
      return session.fetchTrackList(videoId, player);
    });
  }

  /**
   * Best track for `languages` (priority order, manual before generated),
   * optionally machine-translated into `translateTo`.
   */
  async fetch(videoRef: string, languages: readonly string[] = [], translateTo?: string): Promise<Transcript> {
    return this.run(videoRef, "fetch", async (session, videoId, runId) => {
      const player = await session.fetchPlayability(videoId);
      const list = await session.fetchTrackList(videoId, player);
      const selection = selectTranscript(list, languages, translateTo);
      this.logger.info("track.selected", {
        runId,
        videoId,
        data: {
          languageCode: selection.track.languageCode,
          kind: selection.track.kind,
          ...(selection.translatedFrom ? { translateTo: selection.languageCode } : {})
        }
      });
      const xml = await session.fetchDocument({ videoId, track: selection.track, locator: selection.locator });
      const cues = parseTimedText(xml);
      return {
        videoId,
        languageCode: selection.languageCode,
        language: selection.language,
        isGenerated: selection.track.kind === "auto-generated" || selection.translatedFrom !== undefined,
        ...(selection.translatedFrom ? { translatedFrom: selection.translatedFrom } : {}),
        cues
      };
    });
  }

  async translate(videoRef: string, sourceLanguages: readonly string[], target: string): Promise<Transcript> {
    return this.fetch(videoRef, sourceLanguages, target);
  }

  private async run<T>(
    videoRef: string,
    operation: string,
    body: (session: PlatformSession, videoId: VideoId, runId: string) => Promise<T>
  ): Promise<T> {
    const runId = createRunId();
    let videoId: VideoId | undefined;
    try {
      videoId = resolveVideoId(videoRef);
      this.logger.debug(`${operation}.start`, { runId, videoId });
      const session = this.createSession({
        runId,
        pace: this.pace,
        timeoutMs: this.options.timeoutMs,
        headers: this.options.headers,
        fetchFn: this.options.fetchFn,
        logger: this.logger
      });
      const result = await body(session, videoId, runId);
      this.logger.debug(`${operation}.done`, { runId, videoId });
      return result;
    } catch (error) {
      const failure = toTranscriptError(error, { videoId });
      this.logger.info(`${operation}.failed`, {
        runId,
        videoId: failure.videoId ?? videoId,
        data: { kind: failure.kind, message: failure.message }
      });
      throw failure;
    }
  }
}

export const fetchTranscript = (
  videoRef: string,
  languages: readonly string[] = [],
  translateTo?: string,
  options: TranscriptFetcherOptions = {}
): Promise<Transcript> => {
  return new TranscriptFetcher(options).fetch(videoRef, languages, translateTo);
};

export const listTranscripts = (
  videoRef: string,
  options: TranscriptFetcherOptions = {}
): Promise<TranscriptList> => {
  return new TranscriptFetcher(options).list(videoRef);
};

export const translateTranscript = (
  videoRef: string,
  sourceLanguages: readonly string[],
  target: string,
  options: TranscriptFetcherOptions = {}
): Promise<Transcript> => {
  return new TranscriptFetcher(options).translate(videoRef, sourceLanguages, target);
};
