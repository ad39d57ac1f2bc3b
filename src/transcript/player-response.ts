import { z } from "zod";
import { TranscriptError } from "./errors";
import type {
  TrackKind,
  TranscriptList,
  TranscriptMeta,
  TranslationLanguage,
  VideoId
} from "./types";

// The InnerTube player payload is undocumented; every schema passes unknown keys
// through and only the fields read below are typed.

const textRunsSchema = z.object({
  simpleText: z.string().optional(),
  runs: z.array(z.object({ text: z.string().optional() }).passthrough()).optional()
}).passthrough();

const captionTrackSchema = z.object({
  baseUrl: z.string().min(1),
  languageCode: z.string().min(1),
  name: textRunsSchema.optional(),
  kind: z.string().optional(),
  vssId: z.string().optional(),
  isTranslatable: z.boolean().optional()
}).passthrough();

const translationLanguageSchema = z.object({
  languageCode: z.string().min(1),
  languageName: textRunsSchema.optional()
}).passthrough();

const playabilityStatusSchema = z.object({
  status: z.string().optional(),
  reason: z.string().optional(),
  errorScreen: z.unknown().optional()
}).passthrough();

export const playerResponseSchema = z.object({
  playabilityStatus: playabilityStatusSchema.optional(),
  captions: z.object({
    playerCaptionsTracklistRenderer: z.object({
      captionTracks: z.array(z.unknown()).optional(),
      translationLanguages: z.array(z.unknown()).optional()
    }).passthrough().optional()
  }).passthrough().optional(),
  videoDetails: z.object({
    title: z.string().optional(),
    author: z.string().optional()
  }).passthrough().optional()
}).passthrough();

export type PlayerResponse = z.infer<typeof playerResponseSchema>;
export type PlayabilityStatus = z.infer<typeof playabilityStatusSchema>;

export const parsePlayerResponse = (payload: string, videoId: VideoId): PlayerResponse => {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (error) {
    throw new TranscriptError("platform_data_unparsable", "InnerTube player response is not JSON", {
      videoId,
      cause: error
    });
  }
  const parsed = playerResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new TranscriptError("platform_data_unparsable", "InnerTube player response has an unexpected shape", {
      videoId,
      details: { issues }
    });
  }
  return parsed.data;
};

export const textFromRuns = (value: z.infer<typeof textRunsSchema> | undefined): string => {
  if (!value) return "";
  if (typeof value.simpleText === "string") return value.simpleText.trim();
  return (value.runs ?? [])
    .map((run) => run.text ?? "")
    .join("")
    .trim();
};

const trackKind = (kind: string | undefined): TrackKind => {
  return kind?.toLowerCase() === "asr" ? "auto-generated" : "manual";
};

const readTranslationLanguages = (entries: readonly unknown[]): TranslationLanguage[] => {
  const languages: TranslationLanguage[] = [];
  for (const entry of entries) {
    const parsed = translationLanguageSchema.safeParse(entry);
    if (!parsed.success) continue;
    const { languageCode, languageName } = parsed.data;
    languages.push({ languageCode, language: textFromRuns(languageName) || languageCode });
  }
  return languages;
};

/**
 * Build the track list from a player response. Tracks without a language
 * code or locator are skipped; a video with none left has transcripts disabled.
 */
export const extractTranscriptList = (videoId: VideoId, player: PlayerResponse): TranscriptList => {
  const renderer = player.captions?.playerCaptionsTracklistRenderer;
  if (!renderer) {
    throw new TranscriptError("transcripts_disabled", "No caption renderer in player response", { videoId });
  }

  const translationLanguages = readTranslationLanguages(renderer.translationLanguages ?? []);
  const tracks: TranscriptMeta[] = [];

  for (const candidate of renderer.captionTracks ?? []) {
    const parsed = captionTrackSchema.safeParse(candidate);
    if (!parsed.success) continue;
    const track = parsed.data;
    const isTranslatable = track.isTranslatable ?? false;
    tracks.push({
      languageCode: track.languageCode,
      language: textFromRuns(track.name) || track.languageCode,
      kind: trackKind(track.kind),
      isTranslatable,
      baseUrl: track.baseUrl.replace("&fmt=srv3", ""),
      translationLanguages: isTranslatable ? translationLanguages : []
    });
  }

  if (tracks.length === 0) {
    throw new TranscriptError("transcripts_disabled", "Player response lists no caption tracks", { videoId });
  }

  return { videoId, tracks, translationLanguages };
};
