import { TranscriptError } from "./errors";
import type { Cue } from "./types";

/*
 * Two document shapes are served by the timedtext endpoint:
 *   format 1  <transcript><text start="1.2" dur="3.4">…</text></transcript>   (seconds)
 *   format 3  <timedtext format="3"><body><p t="1200" d="3400">…</p></body></timedtext>   (milliseconds)
 */

const MARKUP_RE = /<!--[\s\S]*?-->|<\?[\s\S]*?\?>|<!\[CDATA\[[\s\S]*?\]\]>|<!DOCTYPE[^>]*>|<\/([A-Za-z_][\w:.-]*)\s*>|<([A-Za-z_][\w:.-]*)((?:\s+[A-Za-z_][\w:.-]*\s*=\s*(?:"[^"]*"|'[^']*'))*)\s*(\/?)>/y;
const ATTRIBUTE_RE = /([A-Za-z_][\w:.-]*)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;
const ENTITY_RE = /&(#[0-9]+|#[xX][0-9a-fA-F]+|[A-Za-z][A-Za-z0-9]*);/g;
const CDATA_RE = /<!\[CDATA\[([\s\S]*?)\]\]>/g;
const BREAK_RE = /<br\s*\/?>/gi;
const TAG_RE = /<\/?[A-Za-z][^>]*>/g;

const NAMED_ENTITIES = new Map<string, string>([
  ["amp", "&"],
  ["lt", "<"],
  ["gt", ">"],
  ["quot", "\""],
  ["apos", "'"],
  ["nbsp", "\u00a0"]
]);

type CueTiming = {
  start: number;
  duration: number;
};

type OpenCue = CueTiming & {
  contentStart: number;
  depth: number;
};

function fail(offset: number, reason: string): never {
  throw new TranscriptError("xml_parse_error", `${reason} at offset ${offset}`, {
    details: { offset }
  });
}

export const decodeEntities = (value: string): string => {
  return value.replace(ENTITY_RE, (whole, body: string) => {
    if (body.startsWith("#")) {
      const hex = body[1] === "x" || body[1] === "X";
      const code = hex ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    return NAMED_ENTITIES.get(body) ?? whole;
  });
};

const stripMarkup = (value: string): string => value.replace(BREAK_RE, "\n").replace(TAG_RE, "");

/**
 * Cue bodies are escaped twice in older documents (`&amp;#39;`), and styling
 * may arrive either as child elements or as escaped HTML inside the text.
 */
const normalizeCueText = (raw: string): string => {
  const unwrapped = stripMarkup(raw.replace(CDATA_RE, (_, inner: string) => inner));
  return stripMarkup(decodeEntities(decodeEntities(unwrapped))).trim();
};

const parseAttributes = (source: string): Map<string, string> => {
  const attributes = new Map<string, string>();
  for (const match of source.matchAll(ATTRIBUTE_RE)) {
    const name = match[1];
    const value = match[2] ?? match[3] ?? "";
    if (name) attributes.set(name, decodeEntities(value));
  }
  return attributes;
};

const parseTime = (
  raw: string | undefined,
  divisor: number,
  offset: number,
  attribute: string
): number | undefined => {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!trimmed || !Number.isFinite(value) || value < 0) {
    fail(offset, `invalid ${attribute}="${raw}"`);
  }
  return value / divisor;
};

const cueTiming = (name: string, attributes: Map<string, string>, offset: number): CueTiming | null => {
  if (name === "text") {
    const start = parseTime(attributes.get("start"), 1, offset, "start");
    if (start === undefined) fail(offset, "<text> without start");
    return { start, duration: parseTime(attributes.get("dur"), 1, offset, "dur") ?? 0 };
  }
  if (name === "p" && attributes.has("t")) {
    return {
      start: parseTime(attributes.get("t"), 1000, offset, "t") ?? 0,
      duration: parseTime(attributes.get("d"), 1000, offset, "d") ?? 0
    };
  }
  return null;
};

/** Parse a timedtext document into cues, in document order. */
export function parseTimedText(xml: string): Cue[] {
  const stack: string[] = [];
  const cues: Cue[] = [];
  let rootSeen = false;
  let openCue: OpenCue | null = null;
  let cursor = 0;

  while (cursor < xml.length) {
    const lt = xml.indexOf("<", cursor);
    const textEnd = lt === -1 ? xml.length : lt;
    if (stack.length === 0 && xml.slice(cursor, textEnd).trim().length > 0) {
      fail(cursor, "text outside the root element");
    }
    if (lt === -1) break;

    MARKUP_RE.lastIndex = lt;
    const match = MARKUP_RE.exec(xml);
    if (!match) fail(lt, "malformed markup");
    cursor = MARKUP_RE.lastIndex;

    const closeName = match[1];
    const openName = match[2];

    if (closeName) {
      const top = stack.pop();
      if (top !== closeName) {
        fail(lt, top ? `</${closeName}> does not close <${top}>` : `unexpected </${closeName}>`);
      }
      if (openCue && openCue.depth === stack.length) {
        cues.push({
          text: normalizeCueText(xml.slice(openCue.contentStart, lt)),
          start: openCue.start,
          duration: openCue.duration
        });
        openCue = null;
      }
      continue;
    }

    if (!openName) continue;

    if (stack.length === 0) {
      if (rootSeen) fail(lt, "more than one root element");
      rootSeen = true;
    }
    const timing: CueTiming | null = openCue ? null : cueTiming(openName, parseAttributes(match[3] ?? ""), lt);
    if (match[4] === "/") {
      if (timing) cues.push({ text: "", ...timing });
      continue;
    }
    if (timing) {
      openCue = { ...timing, contentStart: cursor, depth: stack.length };
    }
    stack.push(openName);
  }

  const unclosed = stack[stack.length - 1];
  if (unclosed) fail(xml.length, `unclosed <${unclosed}>`);
  if (!rootSeen) fail(0, "no root element");
  return cues;
}
