import { createLogger, type Logger } from "../core/logging";
import { fetchWithTimeout, type FetchFn, type HttpResult } from "../shared/http";
import { buildRequestHeaders, type RequestHeaderOverrides } from "../shared/request-headers";
import { CookieJar } from "./cookie-jar";
import { TranscriptError, toTranscriptError } from "./errors";
import { assertPlayability } from "./playability";
import { extractTranscriptList, parsePlayerResponse, type PlayerResponse } from "./player-response";
import { noPace, type DocumentRequest, type PaceHook, type PlatformSession, type SessionStep } from "./session";
import type { TranscriptList, VideoId } from "./types";
import { watchUrlFor } from "./video-id";

export const INNERTUBE_PLAYER_URL = "https://www.youtube.com/youtubei/v1/player";
export const INNERTUBE_CLIENT = { clientName: "ANDROID", clientVersion: "20.10.38" } as const;

const CONSENT_FORM_MARKER = 'action="https://consent.youtube.com/s"';
const CONSENT_VALUE_RE = /name="v" value="([^"]*)"/;
const RECAPTCHA_MARKER = "g-recaptcha";
const API_KEY_RE = /"INNERTUBE_API_KEY":\s*"([A-Za-z0-9_-]+)"/;
const PO_TOKEN_MARKER = "&exp=xpe";

export type YouTubeSessionOptions = {
  fetchFn?: FetchFn;
  timeoutMs?: number;
  headers?: RequestHeaderOverrides;
  pace?: PaceHook;
  logger?: Logger;
  runId?: string;
};

const withoutQuery = (url: string): string => {
  const index = url.indexOf("?");
  return index === -1 ? url : url.slice(0, index);
};

const withVideoId = (error: TranscriptError, videoId: VideoId): TranscriptError => {
  if (error.videoId) return error;
  return new TranscriptError(error.kind, error.message, {
    videoId,
    details: error.details,
    retryable: error.retryable,
    cause: error.cause
  });
};

export const extractApiKey = (videoId: VideoId, html: string): string => {
  if (html.includes(RECAPTCHA_MARKER)) {
    throw new TranscriptError("ip_blocked", "Watch page served a reCAPTCHA challenge", { videoId });
  }
  const key = API_KEY_RE.exec(html)?.[1];
  if (!key) {
    throw new TranscriptError("platform_data_unparsable", "INNERTUBE_API_KEY not found in watch page", { videoId });
  }
  return key;
};

/**
 * One platform conversation: watch page, consent, InnerTube player and
 * timedtext documents, sharing a cookie jar. Build a new one per run.
 */
export class YouTubeSession implements PlatformSession {
  private readonly jar = new CookieJar();
  private readonly fetchFn?: FetchFn;
  private readonly timeoutMs?: number;
  private readonly baseHeaders: Record<string, string>;
  private readonly pace: PaceHook;
  private readonly logger: Logger;
  private readonly runId?: string;

  constructor(options: YouTubeSessionOptions = {}) {
    this.fetchFn = options.fetchFn;
    this.timeoutMs = options.timeoutMs;
    this.baseHeaders = buildRequestHeaders(options.headers);
    this.pace = options.pace ?? noPace;
    this.logger = options.logger ?? createLogger("youtube-session");
    this.runId = options.runId;
  }

  get cookies(): CookieJar {
    return this.jar;
  }

  async fetchPlayability(videoId: VideoId): Promise<PlayerResponse> {
    const html = await this.fetchWatchPage(videoId);
    const apiKey = extractApiKey(videoId, html);
    const player = await this.fetchPlayer(videoId, apiKey);
    assertPlayability(videoId, player);
    return player;
  }

  async fetchTrackList(videoId: VideoId, player: PlayerResponse): Promise<TranscriptList> {
    const list = extractTranscriptList(videoId, player);
    this.logger.info("tracks.discovered", {
      runId: this.runId,
      videoId,
      data: { tracks: list.tracks.map((track) => `${track.languageCode}:${track.kind}`) }
    });
    return list;
  }

  async fetchDocument(request: DocumentRequest): Promise<string> {
    const { videoId, track, locator } = request;
    if (locator.includes(PO_TOKEN_MARKER)) {
      throw new TranscriptError("po_token_required", "Caption endpoint requires a proof-of-origin token", {
        videoId,
        details: { languageCode: track.languageCode }
      });
    }
    const { body } = await this.request(videoId, "document", locator, { method: "GET" });
    return body;
  }

  private async fetchWatchPage(videoId: VideoId): Promise<string> {
    const url = watchUrlFor(videoId);
    const { body: html } = await this.request(videoId, "watch_page", url, { method: "GET" });
    if (!html.includes(CONSENT_FORM_MARKER)) return html;

    const consentValue = CONSENT_VALUE_RE.exec(html)?.[1];
    if (!consentValue) {
      throw new TranscriptError("consent_cookie_failed", "Consent form carries no value", { videoId });
    }
    this.jar.set("CONSENT", `YES+${consentValue}`);
    this.logger.debug("consent.cookie_set", { runId: this.runId, videoId });

    const { body: retried } = await this.request(videoId, "consent_retry", url, { method: "GET" });
    if (retried.includes(CONSENT_FORM_MARKER)) {
      throw new TranscriptError("consent_cookie_failed", "Consent page returned again after setting the cookie", {
        videoId
      });
    }
    return retried;
  }

  private async fetchPlayer(videoId: VideoId, apiKey: string): Promise<PlayerResponse> {
    const url = `${INNERTUBE_PLAYER_URL}?key=${encodeURIComponent(apiKey)}`;
    const { body } = await this.request(videoId, "player", url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        context: { client: { ...INNERTUBE_CLIENT } },
        videoId
      })
    });
    return parsePlayerResponse(body, videoId);
  }

  private async request(
    videoId: VideoId,
    step: SessionStep,
    url: string,
    init: { method: "GET" | "POST"; headers?: Record<string, string>; body?: string }
  ): Promise<HttpResult> {
    await this.pace({ videoId, step });

    const headers: Record<string, string> = { ...this.baseHeaders, ...init.headers };
    const cookie = this.jar.header();
    if (cookie) headers.cookie = cookie;

    this.logger.debug("request.start", {
      runId: this.runId,
      videoId,
      data: { step, method: init.method, url: withoutQuery(url) }
    });

    let result: HttpResult;
    try {
      result = await fetchWithTimeout(url, { ...init, headers }, {
        timeoutMs: this.timeoutMs,
        fetchFn: this.fetchFn
      });
    } catch (error) {
      throw withVideoId(toTranscriptError(error), videoId);
    }

    const { response } = result;
    this.jar.storeFromResponse(response);
    this.logger.debug("request.done", {
      runId: this.runId,
      videoId,
      data: { step, status: response.status }
    });

    if (response.status === 429 || response.status === 403) {
      throw new TranscriptError("ip_blocked", `HTTP ${response.status} during ${step}`, {
        videoId,
        details: { status: response.status, step }
      });
    }
    if (!response.ok) {
      throw new TranscriptError("network", `HTTP ${response.status} during ${step}`, {
        videoId,
        details: { status: response.status, step }
      });
    }
    return result;
  }
}
