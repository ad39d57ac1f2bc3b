export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

declare const videoIdBrand: unique symbol;

/** 11-character platform video identifier. Only `resolveVideoId`/`isVideoId` produce one. */
export type VideoId = string & { readonly [videoIdBrand]: true };

export type TrackKind = "manual" | "auto-generated";

/**
 * Kind tie-break used when several tracks share a language code.
 * Earlier entries win.
 */
export const TRACK_KIND_PREFERENCE: readonly TrackKind[] = ["manual", "auto-generated"];

export interface TranslationLanguage {
  readonly languageCode: string;
  readonly language: string;
}

export interface TranscriptMeta {
  readonly languageCode: string;
  readonly language: string;
  readonly kind: TrackKind;
  readonly isTranslatable: boolean;
  /** Opaque timedtext locator, `fmt=srv3` removed. */
  readonly baseUrl: string;
  readonly translationLanguages: readonly TranslationLanguage[];
}

export interface TranscriptList {
  readonly videoId: VideoId;
  /** Platform order; manual and generated groups are views over this. */
  readonly tracks: readonly TranscriptMeta[];
  readonly translationLanguages: readonly TranslationLanguage[];
}

export interface Cue {
  readonly text: string;
  readonly start: number;
  readonly duration: number;
}

export interface Transcript {
  readonly videoId: VideoId;
  readonly languageCode: string;
  readonly language: string;
  readonly isGenerated: boolean;
  /** Source track code when the cues are a machine translation. */
  readonly translatedFrom?: string;
  readonly cues: readonly Cue[];
}
