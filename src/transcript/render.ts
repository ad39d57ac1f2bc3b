import type { Cue, Transcript, TranscriptList } from "./types";

export type OutputFormat = "json" | "text" | "srt" | "markdown";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "text", "srt", "markdown"];

export type RenderOptions = {
  timestamps?: boolean;
};

const FORMAT_ALIASES: Record<string, OutputFormat> = {
  json: "json",
  text: "text",
  txt: "text",
  srt: "srt",
  markdown: "markdown",
  md: "markdown"
};

const FILE_EXTENSIONS: Record<OutputFormat, string> = {
  json: "json",
  text: "txt",
  srt: "srt",
  markdown: "md"
};

export const parseOutputFormat = (value: string): OutputFormat => {
  const format = FORMAT_ALIASES[value.trim().toLowerCase()];
  if (!format) {
    throw new Error(`Unknown output format "${value}". Use one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  return format;
};

export const fileExtensionFor = (format: OutputFormat): string => FILE_EXTENSIONS[format];

const flatten = (text: string): string => text.replace(/\s*\n\s*/g, " ");

const stamp = (start: number): string => `[${start.toFixed(2)}]`;

const pad = (value: number, width: number): string => String(value).padStart(width, "0");

/** `HH:MM:SS,mmm`, milliseconds rounded. */
export const formatSrtTime = (seconds: number): string => {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = Math.floor((totalMs % 60_000) / 1000);
  const ms = totalMs % 1000;
  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(secs, 2)},${pad(ms, 3)}`;
};

const renderJson = (cues: readonly Cue[]): string => {
  return JSON.stringify(
    cues.map((cue) => ({ text: cue.text, start: cue.start, duration: cue.duration })),
    null,
    2
  );
};

const renderText = (cues: readonly Cue[], options: RenderOptions): string => {
  return cues
    .map((cue) => (options.timestamps ? `${stamp(cue.start)} ${flatten(cue.text)}` : flatten(cue.text)))
    .join("\n");
};

const renderSrt = (cues: readonly Cue[]): string => {
  return cues
    .map((cue, index) => {
      const range = `${formatSrtTime(cue.start)} --> ${formatSrtTime(cue.start + cue.duration)}`;
      return `${index + 1}\n${range}\n${cue.text}\n\n`;
    })
    .join("");
};

const renderMarkdown = (cues: readonly Cue[], options: RenderOptions): string => {
  const paragraphs = cues.map((cue) => {
    const text = flatten(cue.text);
    return options.timestamps ? `**${stamp(cue.start)}** ${text}` : text;
  });
  return `${["# Transcript", ...paragraphs].join("\n\n")}\n`;
};

const RENDERERS: Record<OutputFormat, (cues: readonly Cue[], options: RenderOptions) => string> = {
  json: renderJson,
  text: renderText,
  srt: renderSrt,
  markdown: renderMarkdown
};

export const renderTranscript = (
  transcript: Pick<Transcript, "cues">,
  format: OutputFormat,
  options: RenderOptions = {}
): string => {
  return RENDERERS[format](transcript.cues, options);
};

/**
 * Track listing for `--list`. JSON keeps the structured fields; every other
 * format gets one tab-separated line per track.
 */
export const renderTrackList = (list: TranscriptList, format: OutputFormat): string => {
  if (format === "json") {
    return JSON.stringify(
      list.tracks.map((track) => ({
        languageCode: track.languageCode,
        language: track.language,
        kind: track.kind,
        isTranslatable: track.isTranslatable
      })),
      null,
      2
    );
  }
  return list.tracks
    .map((track) => {
      const columns = [track.languageCode, track.language, track.kind];
      if (track.isTranslatable) columns.push("translatable");
      return columns.join("\t");
    })
    .join("\n");
};
