import { describe, expect, it } from "vitest";
import { TranscriptError } from "../src/transcript/errors";
import { isVideoId, resolveVideoId, watchUrlFor } from "../src/transcript/video-id";

const ID = "abcDEF12345";

describe("resolveVideoId", () => {
  it("returns bare ids unchanged after trimming", () => {
    expect(resolveVideoId(ID)).toBe(ID);
    expect(resolveVideoId(`  ${ID}\n`)).toBe(ID);
    expect(resolveVideoId("-_aB3-_cD4e")).toBe("-_aB3-_cD4e");
  });

  it.each([
    `https://www.youtube.com/watch?v=${ID}`,
    `https://www.youtube.com/watch?v=${ID}&t=42s#comments`,
    `https://www.youtube.com/watch?feature=share&v=${ID}&list=PL123`,
    `http://youtube.com/watch?v=${ID}`,
    `youtube.com/watch?v=${ID}`,
    `www.youtube.com/watch?v=${ID}`,
    `https://m.youtube.com/watch?v=${ID}`,
    `https://music.youtube.com/watch?v=${ID}&si=abc`,
    `https://youtu.be/${ID}`,
    `https://youtu.be/${ID}?si=share-token&t=5`,
    `youtu.be/${ID}`,
    `https://www.youtube.com/embed/${ID}?start=5`,
    `https://www.youtube-nocookie.com/embed/${ID}`,
    `https://www.youtube.com/shorts/${ID}`,
    `https://www.youtube.com/live/${ID}?feature=shared`,
    `https://www.youtube.com/v/${ID}`
  ])("extracts the id from %s", (input) => {
    expect(resolveVideoId(input)).toBe(ID);
  });

  it.each([
    "",
    "abc",
    "abcDEF1234!",
    "abcDEF123456",
    `https://vimeo.com/${ID}`,
    "https://www.youtube.com/watch?v=tooShort",
    "https://www.youtube.com/watch",
    "https://youtu.be/",
    "https://www.youtube.com/channel/UC1234567890",
    "not a url at all"
  ])("rejects %j", (input) => {
    expect(() => resolveVideoId(input)).toThrow(TranscriptError);
  });

  it("reports the rejected input in the error", () => {
    try {
      resolveVideoId("https://example.com/video");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TranscriptError);
      if (!(error instanceof TranscriptError)) return;
      expect(error.kind).toBe("invalid_video_id");
      expect(error.details).toEqual({ input: "https://example.com/video" });
      expect(error.message.startsWith("https://example.com/video (")).toBe(true);
    }
  });
});

describe("isVideoId", () => {
  it("accepts exactly eleven characters of the id alphabet", () => {
    expect(isVideoId(ID)).toBe(true);
    expect(isVideoId("abc-_DEF123")).toBe(true);
    expect(isVideoId("abcDEF1234")).toBe(false);
    expect(isVideoId("abcDEF 2345")).toBe(false);
  });
});

describe("watchUrlFor", () => {
  it("builds the watch page URL", () => {
    expect(watchUrlFor(resolveVideoId(ID))).toBe(`https://www.youtube.com/watch?v=${ID}`);
  });
});
