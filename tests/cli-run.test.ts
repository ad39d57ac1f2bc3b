import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { resolveSettings, runCli, VERSION, type CliDeps } from "../src/cli/run";
import { parseArgs } from "../src/cli/args";
import {
  EXIT_BLOCKED,
  EXIT_NO_TRANSCRIPT,
  EXIT_SUCCESS,
  EXIT_USAGE
} from "../src/cli/errors";
import type { TubescriptConfig } from "../src/config";
import type { LogEnvelope } from "../src/core/logging";
import { noPace } from "../src/transcript/session";
import {
  VIDEO_ID,
  captionXml,
  createQueuedFetch,
  html,
  json,
  playerPayload,
  watchPage,
  xml
} from "./fixtures/platform";

const baseConfig: TubescriptConfig = {
  languages: ["en"],
  format: "text",
  timestamps: false,
  delayMs: 500,
  timeoutMs: 15000,
  acceptLanguage: "en-US",
  logLevel: "warn",
  cleanup: {
    endpoint: "https://llm.example.test/v1/chat/completions",
    model: "test-model",
    apiKeyEnv: "TUBESCRIPT_TEST_KEY"
  }
};

const argv = (...args: string[]): string[] => ["node", "tubescript", ...args];

const setup = (responses: Array<Response | Error>, config: Partial<TubescriptConfig> = {}) => {
  const out: string[] = [];
  const err: string[] = [];
  const logs: LogEnvelope[] = [];
  const { fetchFn, calls } = createQueuedFetch(responses);
  const deps: CliDeps = {
    fetchFn,
    pace: noPace,
    env: {},
    loadConfig: () => ({ ...baseConfig, ...config }),
    logSink: (entry) => logs.push(entry),
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text)
  };
  return { deps, out, err, logs, calls };
};

const transcriptResponses = (): Response[] => [html(watchPage()), json(playerPayload()), xml(captionXml)];

describe("runCli", () => {
  let tempDir = "";

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "tubescript-cli-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("prints help and version", async () => {
    const { deps, out } = setup([]);
    expect(await runCli(argv("--help"), deps)).toBe(EXIT_SUCCESS);
    expect(await runCli(argv("--version"), deps)).toBe(EXIT_SUCCESS);
    expect(out[0]?.startsWith("tubescript - ")).toBe(true);
    expect(out[1]).toBe(`tubescript v${VERSION}\n`);
  });

  it("fetches and renders a transcript to stdout", async () => {
    const { deps, out, err } = setup(transcriptResponses());
    const code = await runCli(argv("--timestamps", VIDEO_ID), deps);
    expect(code).toBe(EXIT_SUCCESS);
    expect(err).toEqual([]);
    expect(out).toEqual(["[0.00] Hello & world\n[2.50] second line\n"]);
  });

  it("uses config defaults for format and languages", async () => {
    const { deps, out, calls } = setup(transcriptResponses(), { format: "srt", languages: ["es"] });
    expect(await runCli(argv(VIDEO_ID), deps)).toBe(EXIT_SUCCESS);
    expect(calls[2]?.url).toBe(`https://www.youtube.com/api/timedtext?v=${VIDEO_ID}&lang=es`);
    expect(out[0]).toBe(
      "1\n00:00:00,000 --> 00:00:02,500\nHello & world\n\n2\n00:00:02,500 --> 00:00:04,000\nsecond line\n\n"
    );
  });

  it("runs several videos in order and separates them with a blank line", async () => {
    const { deps, out } = setup([...transcriptResponses(), ...transcriptResponses()]);
    expect(await runCli(argv("--format", "md", VIDEO_ID, `https://youtu.be/${VIDEO_ID}`), deps)).toBe(EXIT_SUCCESS);
    const entry = "# Transcript\n\nHello & world\n\nsecond line\n";
    expect(out).toEqual([`${entry}\n${entry}`]);
  });

  it("writes one file per video with --output-dir", async () => {
    const { deps, out, logs } = setup(transcriptResponses(), { logLevel: "info" });
    const dir = path.join(tempDir, "out");
    expect(await runCli(argv("--format", "json", "--output-dir", dir, VIDEO_ID), deps)).toBe(EXIT_SUCCESS);
    const target = path.join(dir, `${VIDEO_ID}.json`);
    expect(JSON.parse(fs.readFileSync(target, "utf-8"))).toEqual([
      { text: "Hello & world", start: 0, duration: 2.5 },
      { text: "second line", start: 2.5, duration: 1.5 }
    ]);
    expect(out).toEqual([]);
    expect(logs.find((entry) => entry.event === "output.written")?.data).toEqual({ path: target });
  });

  it("lists tracks with --list", async () => {
    const { deps, out, calls } = setup([html(watchPage()), json(playerPayload())]);
    expect(await runCli(argv("--list", VIDEO_ID), deps)).toBe(EXIT_SUCCESS);
    expect(calls).toHaveLength(2);
    expect(out).toEqual([
      "en\tEnglish\tmanual\ttranslatable\nen\tEnglish (auto-generated)\tauto-generated\ttranslatable\nes\tSpanish\tmanual\n"
    ]);
  });

  it("revises text through the cleanup endpoint", async () => {
    const cleanupReply = json({ choices: [{ message: { content: "Hello and welcome." } }] });
    const { deps, out, calls } = setup([...transcriptResponses(), cleanupReply]);
    deps.env = { TUBESCRIPT_TEST_KEY: "test-secret" };
    expect(await runCli(argv("--cleanup", "readable", VIDEO_ID), deps)).toBe(EXIT_SUCCESS);
    expect(calls[3]?.url).toBe("https://llm.example.test/v1/chat/completions");
    expect(out).toEqual(["Hello and welcome.\n"]);
  });

  it("requires an API key for cleanup", async () => {
    const { deps, err, calls } = setup([]);
    expect(await runCli(argv("--cleanup", "notes", VIDEO_ID), deps)).toBe(EXIT_USAGE);
    expect(err).toEqual(["Error: --cleanup needs an API key in $TUBESCRIPT_TEST_KEY\n"]);
    expect(calls).toHaveLength(0);
  });

  it("maps missing transcripts to exit code 3 and prints nothing", async () => {
    const { deps, out, err } = setup([html(watchPage()), json(playerPayload())]);
    expect(await runCli(argv("--lang", "ja", VIDEO_ID), deps)).toBe(EXIT_NO_TRANSCRIPT);
    expect(out).toEqual([]);
    expect(err[0]).toBe(
      `Error: No transcript found for video ${VIDEO_ID} in ja. Available: en (manual), en (auto-generated), es (manual)\n`
    );
  });

  it("maps rate limiting to the blocked exit code", async () => {
    const { deps } = setup([html("", 429)]);
    expect(await runCli(argv(VIDEO_ID), deps)).toBe(EXIT_BLOCKED);
  });

  it("reports usage errors", async () => {
    const { deps, err } = setup([]);
    expect(await runCli(argv("not-a-video"), deps)).toBe(EXIT_USAGE);
    expect(err[0]).toBe(
      "Error: Not a YouTube video id or URL: not-a-video (YouTube video ids are 11 characters, or a youtube.com / youtu.be URL)\n"
    );
  });

  it("treats config errors as usage errors", async () => {
    const { deps, err } = setup([]);
    deps.loadConfig = vi.fn(() => {
      throw new Error("Invalid tubescript config at /cfg/tubescript.jsonc: delayMs: too small");
    });
    expect(await runCli(argv(VIDEO_ID), deps)).toBe(EXIT_USAGE);
    expect(err[0]).toBe("Error: Invalid tubescript config at /cfg/tubescript.jsonc: delayMs: too small\n");
  });
});

describe("resolveSettings", () => {
  it("lets flags override the config file", () => {
    const settings = resolveSettings(
      parseArgs(argv("--lang", "de", "--format", "json", "--delay-ms", "0", "--translate", "fr", VIDEO_ID)),
      baseConfig
    );
    expect(settings.languages).toEqual(["de"]);
    expect(settings.format).toBe("json");
    expect(settings.delayMs).toBe(0);
    expect(settings.timeoutMs).toBe(15000);
    expect(settings.translateTo).toBe("fr");
    expect(settings.cleanupStyle).toBeUndefined();
  });
});
