import { createChatCleanup, type CleanupStyle, type TextCleanup } from "../cleanup/text-cleanup";
import { loadConfig, type TubescriptConfig } from "../config";
import { createLogger, type LogSink } from "../core/logging";
import type { FetchFn } from "../shared/http";
import { TranscriptFetcher } from "../transcript/fetcher";
import { fileExtensionFor, renderTrackList, renderTranscript } from "../transcript/render";
import type { PaceHook } from "../transcript/session";
import { getHelpText, parseArgs, type ParsedArgs } from "./args";
import { createUsageError, toCliError, EXIT_SUCCESS } from "./errors";
import { writeOutput, type OutputEntry } from "./output";

export const VERSION = "0.1.0";

export type CliDeps = {
  fetchFn?: FetchFn;
  pace?: PaceHook;
  env?: NodeJS.ProcessEnv;
  loadConfig?: (configPath?: string) => TubescriptConfig;
  logSink?: LogSink;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
};

export type CliSettings = TubescriptConfig & {
  translateTo?: string;
  cleanupStyle?: CleanupStyle;
};

/** Flags win over the config file. */
export function resolveSettings(args: ParsedArgs, config: TubescriptConfig): CliSettings {
  return {
    ...config,
    languages: args.languages ?? config.languages,
    format: args.format ?? config.format,
    timestamps: args.timestamps ?? config.timestamps,
    delayMs: args.delayMs ?? config.delayMs,
    timeoutMs: args.timeoutMs ?? config.timeoutMs,
    logLevel: args.logLevel ?? config.logLevel,
    translateTo: args.translateTo,
    cleanupStyle: args.cleanup
  };
}

function readConfig(args: ParsedArgs, deps: CliDeps): TubescriptConfig {
  const load = deps.loadConfig ?? loadConfig;
  try {
    return load(args.configPath);
  } catch (error) {
    throw createUsageError(error instanceof Error ? error.message : String(error));
  }
}

function createCleanup(settings: CliSettings, deps: CliDeps): TextCleanup {
  const env = deps.env ?? process.env;
  const apiKey = env[settings.cleanup.apiKeyEnv]?.trim();
  if (!apiKey) {
    throw createUsageError(`--cleanup needs an API key in $${settings.cleanup.apiKeyEnv}`);
  }
  return createChatCleanup({
    endpoint: settings.cleanup.endpoint,
    apiKey,
    model: settings.cleanup.model,
    fetchFn: deps.fetchFn,
    timeoutMs: settings.timeoutMs
  });
}

/** Runs one CLI invocation and resolves to its exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => {
    process.stdout.write(text);
  });
  const stderr = deps.stderr ?? ((text: string) => {
    process.stderr.write(text);
  });

  try {
    const args = parseArgs(argv);
    if (args.command === "help") {
      stdout(`${getHelpText()}\n`);
      return EXIT_SUCCESS;
    }
    if (args.command === "version") {
      stdout(`tubescript v${VERSION}\n`);
      return EXIT_SUCCESS;
    }

    const settings = resolveSettings(args, readConfig(args, deps));
    const logger = createLogger("cli", { level: settings.logLevel, sink: deps.logSink });
    const cleanup = settings.cleanupStyle && args.command === "fetch" ? createCleanup(settings, deps) : null;
    const fetcher = new TranscriptFetcher({
      delayMs: settings.delayMs,
      pace: deps.pace,
      timeoutMs: settings.timeoutMs,
      headers: { userAgent: settings.userAgent, acceptLanguage: settings.acceptLanguage },
      fetchFn: deps.fetchFn,
      logger
    });

    const entries: OutputEntry[] = [];
    for (const video of args.videos) {
      if (args.command === "list") {
        const list = await fetcher.list(video);
        entries.push({ videoId: list.videoId, content: renderTrackList(list, settings.format) });
        continue;
      }
      const transcript = await fetcher.fetch(video, settings.languages, settings.translateTo);
      let content = renderTranscript(transcript, settings.format, { timestamps: settings.timestamps });
      if (cleanup && settings.cleanupStyle) {
        content = await cleanup.revise(content, settings.cleanupStyle);
        logger.info("cleanup.done", { videoId: transcript.videoId, data: { style: settings.cleanupStyle } });
      }
      entries.push({ videoId: transcript.videoId, content });
    }

    const extension = args.command === "list" && settings.format !== "json"
      ? "txt"
      : fileExtensionFor(settings.format);
    const written = writeOutput(entries, {
      output: args.output,
      outputDir: args.outputDir,
      extension,
      write: stdout
    });
    for (const filePath of written) {
      logger.info("output.written", { data: { path: filePath } });
    }
    return EXIT_SUCCESS;
  } catch (error) {
    const cliError = toCliError(error);
    stderr(`Error: ${cliError.message}\n`);
    return cliError.exitCode;
  }
}
