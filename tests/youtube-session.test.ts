import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../src/core/logging";
import { TranscriptError } from "../src/transcript/errors";
import { createDelayPacer, noPace, type PaceInfo } from "../src/transcript/session";
import { resolveVideoId } from "../src/transcript/video-id";
import { extractApiKey, YouTubeSession, type YouTubeSessionOptions } from "../src/transcript/youtube-session";
import {
  EN_BASE_URL,
  captionXml,
  consentPage,
  createQueuedFetch,
  html,
  json,
  playerPayload,
  watchPage,
  xml
} from "./fixtures/platform";

const videoId = resolveVideoId("abcDEF12345");
const silent = createLogger("test", { sink: () => undefined });

const createSession = (responses: Array<Response | Error>, options: YouTubeSessionOptions = {}) => {
  const { fetchFn, calls } = createQueuedFetch(responses);
  const steps: PaceInfo[] = [];
  const session = new YouTubeSession({
    fetchFn,
    logger: silent,
    pace: async (info) => {
      steps.push(info);
    },
    ...options
  });
  return { session, calls, steps, fetchFn };
};

const rejection = async (promise: Promise<unknown>): Promise<TranscriptError> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof TranscriptError) return error;
    throw error;
  }
  throw new Error("expected a TranscriptError");
};

describe("YouTubeSession.fetchPlayability", () => {
  it("loads the watch page and posts the InnerTube player request", async () => {
    const { session, calls, steps } = createSession([html(watchPage()), json(playerPayload())], {
      headers: { userAgent: "test-agent", acceptLanguage: "de-DE" }
    });

    const player = await session.fetchPlayability(videoId);

    expect(player.playabilityStatus?.status).toBe("OK");
    expect(calls).toHaveLength(2);
    expect(calls[0]?.url).toBe("https://www.youtube.com/watch?v=abcDEF12345");
    expect(calls[0]?.method).toBe("GET");
    expect(calls[0]?.headers.get("user-agent")).toBe("test-agent");
    expect(calls[0]?.headers.get("accept-language")).toBe("de-DE");
    expect(calls[0]?.headers.get("cookie")).toBeNull();
    expect(calls[1]?.url).toBe("https://www.youtube.com/youtubei/v1/player?key=test-key");
    expect(calls[1]?.method).toBe("POST");
    expect(calls[1]?.headers.get("content-type")).toBe("application/json");
    expect(JSON.parse(calls[1]?.body ?? "")).toEqual({
      context: { client: { clientName: "ANDROID", clientVersion: "20.10.38" } },
      videoId: "abcDEF12345"
    });
    expect(steps).toEqual([
      { videoId: "abcDEF12345", step: "watch_page" },
      { videoId: "abcDEF12345", step: "player" }
    ]);
  });

  it("accepts the consent interstitial once and retries with the cookie", async () => {
    const { session, calls, steps } = createSession([
      html(consentPage("cb.20240101-00-p0.en+FX+123")),
      html(watchPage()),
      json(playerPayload())
    ]);

    await session.fetchPlayability(videoId);

    expect(calls[1]?.url).toBe("https://www.youtube.com/watch?v=abcDEF12345");
    expect(calls[1]?.headers.get("cookie")).toBe("CONSENT=YES+cb.20240101-00-p0.en+FX+123");
    expect(calls[2]?.headers.get("cookie")).toBe("CONSENT=YES+cb.20240101-00-p0.en+FX+123");
    expect(session.cookies.get("CONSENT")).toBe("YES+cb.20240101-00-p0.en+FX+123");
    expect(steps.map((info) => info.step)).toEqual(["watch_page", "consent_retry", "player"]);
  });

  it("fails when the consent form has no value", async () => {
    const page = "<form action=\"https://consent.youtube.com/s\"><input type=\"submit\"></form>";
    const { session, calls } = createSession([html(page)]);
    const error = await rejection(session.fetchPlayability(videoId));
    expect(error.kind).toBe("consent_cookie_failed");
    expect(calls).toHaveLength(1);
  });

  it("fails when consent is requested again", async () => {
    const { session } = createSession([html(consentPage()), html(consentPage())]);
    expect((await rejection(session.fetchPlayability(videoId))).kind).toBe("consent_cookie_failed");
  });

  it("maps a reCAPTCHA page to ip_blocked", async () => {
    const { session } = createSession([html("<div class=\"g-recaptcha\" data-sitekey=\"x\"></div>")]);
    const error = await rejection(session.fetchPlayability(videoId));
    expect(error.kind).toBe("ip_blocked");
    expect(error.videoId).toBe("abcDEF12345");
  });

  it("fails when the API key is missing", async () => {
    const { session } = createSession([html("<html><body>nothing here</body></html>")]);
    expect((await rejection(session.fetchPlayability(videoId))).kind).toBe("platform_data_unparsable");
  });

  it.each([429, 403])("maps HTTP %i to ip_blocked", async (status) => {
    const { session } = createSession([html(watchPage()), json({}, status)]);
    const error = await rejection(session.fetchPlayability(videoId));
    expect(error.kind).toBe("ip_blocked");
    expect(error.details).toEqual({ status, step: "player" });
  });

  it("maps other HTTP failures to network errors", async () => {
    const { session } = createSession([html("oops", 500)]);
    const error = await rejection(session.fetchPlayability(videoId));
    expect(error.kind).toBe("network");
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ status: 500, step: "watch_page" });
  });

  it("attaches the video id to transport failures", async () => {
    const { session } = createSession([new TypeError("fetch failed")]);
    const error = await rejection(session.fetchPlayability(videoId));
    expect(error.kind).toBe("network");
    expect(error.videoId).toBe("abcDEF12345");
    expect(error.message).toBe("fetch failed");
  });

  it("rejects a player response that is not JSON", async () => {
    const { session } = createSession([html(watchPage()), html("<html>")]);
    expect((await rejection(session.fetchPlayability(videoId))).kind).toBe("platform_data_unparsable");
  });

  it("checks playability", async () => {
    const { session } = createSession([
      html(watchPage()),
      json({ playabilityStatus: { status: "LOGIN_REQUIRED", reason: "Sign in to confirm you're not a bot" } })
    ]);
    expect((await rejection(session.fetchPlayability(videoId))).kind).toBe("request_blocked");
  });
});

describe("YouTubeSession.fetchTrackList", () => {
  it("extracts tracks from the player response", async () => {
    const { session } = createSession([html(watchPage()), json(playerPayload())]);
    const player = await session.fetchPlayability(videoId);
    const list = await session.fetchTrackList(videoId, player);
    expect(list.tracks.map((track) => `${track.languageCode}:${track.kind}`)).toEqual([
      "en:manual",
      "en:auto-generated",
      "es:manual"
    ]);
  });
});

describe("YouTubeSession.fetchDocument", () => {
  const enTrack = {
    languageCode: "en",
    language: "English",
    kind: "manual" as const,
    isTranslatable: true,
    baseUrl: EN_BASE_URL,
    translationLanguages: [{ languageCode: "de", language: "German" }]
  };

  it("fetches the track body", async () => {
    const { session, calls, steps } = createSession([xml(captionXml)]);
    await expect(session.fetchDocument({ videoId, track: enTrack, locator: EN_BASE_URL })).resolves.toBe(captionXml);
    expect(calls[0]?.url).toBe(EN_BASE_URL);
    expect(steps).toEqual([{ videoId: "abcDEF12345", step: "document" }]);
  });

  it("requests the locator chosen for a translation", async () => {
    const { session, calls } = createSession([xml(captionXml)]);
    await session.fetchDocument({ videoId, track: enTrack, locator: `${EN_BASE_URL}&tlang=de` });
    expect(calls[0]?.url).toBe(`${EN_BASE_URL}&tlang=de`);
  });

  it("fails when the body stalls past the timeout", async () => {
    const stalled = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode("<transcript>"));
      }
    });
    const { session } = createSession([new Response(stalled, { status: 200 })], { timeoutMs: 20 });
    const error = await rejection(session.fetchDocument({ videoId, track: enTrack, locator: EN_BASE_URL }));
    expect(error.kind).toBe("network");
    expect(error.message).toBe("Request timed out after 20ms");
    expect(error.videoId).toBe("abcDEF12345");
  });

  it("refuses locators that demand a proof-of-origin token", async () => {
    const { session, fetchFn } = createSession([]);
    const error = await rejection(session.fetchDocument({
      videoId,
      track: { ...enTrack, baseUrl: `${EN_BASE_URL}&exp=xpe` },
      locator: `${EN_BASE_URL}&exp=xpe`
    }));
    expect(error.kind).toBe("po_token_required");
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("maps 429 on the document to ip_blocked", async () => {
    const { session } = createSession([xml("", 429)]);
    const error = await rejection(session.fetchDocument({ videoId, track: enTrack, locator: EN_BASE_URL }));
    expect(error.kind).toBe("ip_blocked");
    expect(error.details).toEqual({ status: 429, step: "document" });
  });
});

describe("extractApiKey", () => {
  it("reads the key with or without spacing", () => {
    expect(extractApiKey(videoId, "{\"INNERTUBE_API_KEY\":\"k_1-2\"}")).toBe("k_1-2");
    expect(extractApiKey(videoId, watchPage("other-key"))).toBe("other-key");
  });
});

describe("createDelayPacer", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("waits the configured delay", async () => {
    vi.useFakeTimers();
    const pace = createDelayPacer(500);
    let done = false;
    const pending = pace({ videoId, step: "watch_page" }).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(499);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it("returns the no-op pacer for zero", () => {
    expect(createDelayPacer(0)).toBe(noPace);
  });
});
