import { TranscriptError } from "./errors";
import {
  TRACK_KIND_PREFERENCE,
  type TrackKind,
  type TranscriptList,
  type TranscriptMeta,
  type VideoId
} from "./types";

export interface Selection {
  readonly track: TranscriptMeta;
  /** Locator to fetch, with `tlang` set when translating. */
  readonly locator: string;
  readonly languageCode: string;
  readonly language: string;
  readonly translatedFrom?: string;
}

export const manualTracks = (list: TranscriptList): TranscriptMeta[] => {
  return list.tracks.filter((track) => track.kind === "manual");
};

export const generatedTracks = (list: TranscriptList): TranscriptMeta[] => {
  return list.tracks.filter((track) => track.kind === "auto-generated");
};

const describeTrack = (track: TranscriptMeta): string => {
  return `${track.languageCode} (${track.kind === "manual" ? "manual" : "auto-generated"})`;
};

const noTranscriptFound = (list: TranscriptList, codes: readonly string[]): TranscriptError => {
  return new TranscriptError("no_transcript_found", `No transcript for ${codes.join(", ")}`, {
    videoId: list.videoId,
    details: {
      requested: [...codes],
      available: list.tracks.map(describeTrack)
    }
  });
};

const findByKinds = (
  list: TranscriptList,
  codes: readonly string[],
  kinds: readonly TrackKind[]
): TranscriptMeta | undefined => {
  for (const code of codes) {
    for (const kind of kinds) {
      const match = list.tracks.find((track) => track.kind === kind && track.languageCode === code);
      if (match) return match;
    }
  }
  return undefined;
};

/**
 * First track matching the requested codes in priority order. Within one
 * code, kinds are tried in `TRACK_KIND_PREFERENCE` order.
 */
export const findTranscript = (list: TranscriptList, codes: readonly string[]): TranscriptMeta => {
  const match = findByKinds(list, codes, TRACK_KIND_PREFERENCE);
  if (!match) throw noTranscriptFound(list, codes);
  return match;
};

export const findManuallyCreated = (list: TranscriptList, codes: readonly string[]): TranscriptMeta => {
  const match = findByKinds(list, codes, ["manual"]);
  if (!match) throw noTranscriptFound(list, codes);
  return match;
};

export const findGenerated = (list: TranscriptList, codes: readonly string[]): TranscriptMeta => {
  const match = findByKinds(list, codes, ["auto-generated"]);
  if (!match) throw noTranscriptFound(list, codes);
  return match;
};

const firstAvailable = (list: TranscriptList): TranscriptMeta | undefined => {
  for (const kind of TRACK_KIND_PREFERENCE) {
    const match = list.tracks.find((track) => track.kind === kind);
    if (match) return match;
  }
  return undefined;
};

export const withQueryParam = (baseUrl: string, key: string, value: string): string => {
  try {
    const url = new URL(baseUrl);
    url.searchParams.set(key, value);
    return url.toString();
  } catch {
    const separator = baseUrl.includes("?") ? "&" : "?";
    return `${baseUrl}${separator}${encodeURIComponent(key)}=${encodeURIComponent(value)}`;
  }
};

/**
 * Locator for the track body, or for its machine translation into
 * `translateTo`. Refuses translation on tracks that do not offer it.
 */
export const resolveDocumentLocator = (track: TranscriptMeta, translateTo?: string, videoId?: VideoId): string => {
  if (!translateTo) return track.baseUrl;
  if (!track.isTranslatable) {
    throw new TranscriptError("translation_not_supported", `${describeTrack(track)} is not translatable`, {
      videoId,
      details: { languageCode: track.languageCode }
    });
  }
  return withQueryParam(track.baseUrl, "tlang", translateTo);
};

export const selectTranscript = (
  list: TranscriptList,
  languages: readonly string[],
  translateTo?: string
): Selection => {
  if (list.tracks.length === 0) {
    throw new TranscriptError("transcripts_disabled", "No caption tracks to choose from", {
      videoId: list.videoId
    });
  }

  const requested = languages.map((code) => code.trim()).filter((code) => code.length > 0);
  const track = requested.length > 0 ? findTranscript(list, requested) : firstAvailable(list);
  if (!track) throw noTranscriptFound(list, requested);

  if (!translateTo) {
    return {
      track,
      locator: track.baseUrl,
      languageCode: track.languageCode,
      language: track.language
    };
  }

  const locator = resolveDocumentLocator(track, translateTo, list.videoId);
  const target = track.translationLanguages.find((entry) => entry.languageCode === translateTo);
  if (!target) {
    throw new TranscriptError("translation_language_unavailable", translateTo, {
      videoId: list.videoId,
      details: {
        requested: translateTo,
        available: track.translationLanguages.map((entry) => entry.languageCode)
      }
    });
  }

  return {
    track,
    locator,
    languageCode: target.languageCode,
    language: target.language,
    translatedFrom: track.languageCode
  };
};
