import { isLogLevel, LOG_LEVELS, type LogLevel } from "../core/logging";
import { CLEANUP_STYLES, isCleanupStyle, type CleanupStyle } from "../cleanup/text-cleanup";
import { parseOutputFormat, type OutputFormat } from "../transcript/render";
import { isVideoId } from "../transcript/video-id";
import { createUsageError } from "./errors";
import { parseListFlag, parseNumberFlag } from "./utils/parse";

export type CliCommand = "fetch" | "list" | "help" | "version";

/** Unset options fall back to the config file. */
export interface ParsedArgs {
  command: CliCommand;
  videos: string[];
  languages?: string[];
  translateTo?: string;
  format?: OutputFormat;
  timestamps?: boolean;
  output?: string;
  outputDir?: string;
  delayMs?: number;
  timeoutMs?: number;
  cleanup?: CleanupStyle;
  configPath?: string;
  logLevel?: LogLevel;
}

const SHORT_FLAGS: Record<string, string> = {
  "-h": "--help",
  "-v": "--version",
  "-l": "--lang",
  "-f": "--format",
  "-o": "--output",
  "-t": "--timestamps"
};

export const BOOLEAN_FLAGS = ["--help", "--version", "--timestamps", "--list"] as const;
export const VALUE_FLAGS = [
  "--lang",
  "--translate",
  "--format",
  "--output",
  "--output-dir",
  "--delay-ms",
  "--timeout-ms",
  "--cleanup",
  "--config",
  "--log-level"
] as const;

const BOOLEAN_FLAG_SET = new Set<string>(BOOLEAN_FLAGS);
const VALUE_FLAG_SET = new Set<string>(VALUE_FLAGS);

function expandShortFlags(args: string[]): string[] {
  return args.map((arg) => SHORT_FLAGS[arg] ?? arg);
}

function applyValueFlag(parsed: ParsedArgs, flag: string, value: string): void {
  switch (flag) {
    case "--lang":
      parsed.languages = parseListFlag(value, flag);
      return;
    case "--translate": {
      const target = value.trim();
      if (!target) throw createUsageError(`Invalid ${flag}: ${value}`);
      parsed.translateTo = target;
      return;
    }
    case "--format":
      try {
        parsed.format = parseOutputFormat(value);
      } catch (error) {
        throw createUsageError(error instanceof Error ? error.message : String(error));
      }
      return;
    case "--output":
      parsed.output = value;
      return;
    case "--output-dir":
      parsed.outputDir = value;
      return;
    case "--delay-ms":
      parsed.delayMs = parseNumberFlag(value, flag, { min: 0, max: 60000 });
      return;
    case "--timeout-ms":
      parsed.timeoutMs = parseNumberFlag(value, flag, { min: 1000, max: 120000 });
      return;
    case "--cleanup":
      if (!isCleanupStyle(value)) {
        throw createUsageError(`Invalid ${flag}: ${value} (use ${CLEANUP_STYLES.join(", ")})`);
      }
      parsed.cleanup = value;
      return;
    case "--config":
      parsed.configPath = value;
      return;
    case "--log-level":
      if (!isLogLevel(value)) {
        throw createUsageError(`Invalid ${flag}: ${value} (use ${LOG_LEVELS.join(", ")})`);
      }
      parsed.logLevel = value;
      return;
    default:
      throw createUsageError(`Unknown flag: ${flag}`);
  }
}

/** `argv` is `process.argv`; the first two entries are skipped. */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = expandShortFlags(argv.slice(2));

  if (args.includes("--help")) {
    return { command: "help", videos: [] };
  }
  if (args.includes("--version")) {
    return { command: "version", videos: [] };
  }

  const parsed: ParsedArgs = { command: "fetch", videos: [] };

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index] ?? "";

    if (arg === "--") {
      parsed.videos.push(...args.slice(index + 1));
      break;
    }

    if (arg.startsWith("--")) {
      const equals = arg.indexOf("=");
      const flag = equals === -1 ? arg : arg.slice(0, equals);
      if (BOOLEAN_FLAG_SET.has(flag)) {
        if (equals !== -1) throw createUsageError(`${flag} does not take a value`);
        if (flag === "--timestamps") parsed.timestamps = true;
        if (flag === "--list") parsed.command = "list";
        continue;
      }
      if (!VALUE_FLAG_SET.has(flag)) {
        if (isVideoId(arg)) {
          parsed.videos.push(arg);
          continue;
        }
        throw createUsageError(`Unknown flag: ${flag}`);
      }
      let value: string | undefined;
      if (equals !== -1) {
        value = arg.slice(equals + 1);
      } else {
        value = args[index + 1];
        index += 1;
      }
      if (value === undefined) {
        throw createUsageError(`Missing value for ${flag}`);
      }
      applyValueFlag(parsed, flag, value);
      continue;
    }

    // Video ids may start with a dash.
    if (arg.startsWith("-") && arg.length > 1 && !isVideoId(arg)) {
      throw createUsageError(`Unknown flag: ${arg}`);
    }

    parsed.videos.push(arg);
  }

  if (parsed.videos.length === 0) {
    throw createUsageError("Missing video id or URL");
  }
  if (parsed.output && parsed.outputDir) {
    throw createUsageError("Use either --output or --output-dir, not both");
  }

  return parsed;
}

export function getHelpText(): string {
  return `
tubescript - Fetch YouTube transcripts and render them as text, JSON, SRT or Markdown

USAGE:
  tubescript [options] <video...>

  <video> is an 11-character video id or a youtube.com / youtu.be URL.

OPTIONS:
  --lang, -l <codes>     Language priority list, comma separated (default: en)
  --translate <code>     Machine-translate the selected track into <code>
  --format, -f <fmt>     json | text | srt | markdown (aliases: txt, md)
  --timestamps, -t       Prefix text and markdown output with start times
  --list                 List the available caption tracks instead of fetching
  --output, -o <file>    Write all output to <file>
  --output-dir <dir>     Write <dir>/<videoId>.<ext> per video
  --delay-ms <n>         Delay before each platform request (default: 500)
  --timeout-ms <n>       Per-request timeout (default: 15000)
  --cleanup <style>      Revise text through the cleanup endpoint: readable | paragraphs | notes
  --config <path>        Config file (default: ~/.config/tubescript/tubescript.jsonc)
  --log-level <level>    debug | info | warn | error (logs go to stderr)
  --help, -h             Show this help message
  --version, -v          Show version

EXIT CODES:
  0 success   1 usage or invalid id   2 unexpected error   3 no transcript
  4 video unavailable   5 blocked   6 network   7 parse   8 cleanup

EXAMPLES:
  tubescript dQw4w9WgXcQ
  tubescript --lang de,en --format srt -o talk.srt https://youtu.be/dQw4w9WgXcQ
  tubescript --list https://www.youtube.com/watch?v=dQw4w9WgXcQ
  tubescript --translate fr --format md --timestamps dQw4w9WgXcQ
`.trim();
}
