import { z } from "zod";
import { fetchWithTimeout, type FetchFn, type HttpResult } from "../shared/http";
import { TranscriptError, isTranscriptError } from "../transcript/errors";

export type CleanupStyle = "readable" | "paragraphs" | "notes";

export const CLEANUP_STYLES: readonly CleanupStyle[] = ["readable", "paragraphs", "notes"];

export interface TextCleanup {
  revise(text: string, style: CleanupStyle): Promise<string>;
}

export type ChatCleanupOptions = {
  endpoint: string;
  apiKey: string;
  model: string;
  fetchFn?: FetchFn;
  timeoutMs?: number;
};

const SYSTEM_PROMPTS: Record<CleanupStyle, string> = {
  readable:
    "You clean up raw video captions. Fix punctuation, casing and obvious transcription errors. "
    + "Keep the wording and order. Return only the revised text.",
  paragraphs:
    "You turn raw video captions into prose. Fix punctuation and casing and group sentences into "
    + "paragraphs by topic. Do not summarize. Return only the revised text.",
  notes:
    "You turn raw video captions into concise study notes as a Markdown bullet list. "
    + "Keep every distinct point. Return only the notes."
};

const chatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string() }).passthrough()
  }).passthrough()).min(1)
}).passthrough();

export const isCleanupStyle = (value: string): value is CleanupStyle => {
  return CLEANUP_STYLES.some((style) => style === value);
};

const cleanupFailed = (message: string, details: Record<string, string | number> = {}, cause?: unknown) => {
  return new TranscriptError("cleanup_failed", message, { details, cause });
};

/** Cleanup backed by an OpenAI-compatible chat completion endpoint. */
export function createChatCleanup(options: ChatCleanupOptions): TextCleanup {
  return {
    async revise(text, style) {
      let result: HttpResult;
      try {
        result = await fetchWithTimeout(options.endpoint, {
          method: "POST",
          headers: {
            "content-type": "application/json",
            authorization: `Bearer ${options.apiKey}`
          },
          body: JSON.stringify({
            model: options.model,
            messages: [
              { role: "system", content: SYSTEM_PROMPTS[style] },
              { role: "user", content: text }
            ]
          })
        }, { timeoutMs: options.timeoutMs, fetchFn: options.fetchFn });
      } catch (error) {
        const message = isTranscriptError(error) ? error.message : String(error);
        throw cleanupFailed(message, {}, error);
      }

      const { response, body } = result;
      if (!response.ok) {
        throw cleanupFailed(`Cleanup endpoint returned HTTP ${response.status}`, { status: response.status });
      }

      let payload: unknown;
      try {
        payload = JSON.parse(body);
      } catch (error) {
        throw cleanupFailed("Cleanup endpoint returned invalid JSON", {}, error);
      }

      const parsed = chatCompletionSchema.safeParse(payload);
      if (!parsed.success) {
        throw cleanupFailed("Cleanup endpoint returned no completion");
      }
      const content = parsed.data.choices[0]?.message.content.trim() ?? "";
      if (!content) {
        throw cleanupFailed("Cleanup endpoint returned an empty completion");
      }
      return content;
    }
  };
}
