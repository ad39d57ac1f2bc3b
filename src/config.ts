import { z } from "zod";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { parse as parseJsonc } from "jsonc-parser";
import type { LogLevel } from "./core/logging";
import type { OutputFormat } from "./transcript/render";

export type CleanupConfig = {
  endpoint: string;
  model: string;
  apiKeyEnv: string;
};

export type TubescriptConfig = {
  languages: string[];
  format: OutputFormat;
  timestamps: boolean;
  delayMs: number;
  timeoutMs: number;
  userAgent?: string;
  acceptLanguage: string;
  logLevel: LogLevel;
  cleanup: CleanupConfig;
};

export const CONFIG_FILE_NAME = "tubescript.jsonc";

const cleanupSchema = z.object({
  endpoint: z.string().url().default("https://api.openai.com/v1/chat/completions"),
  model: z.string().min(1).default("gpt-4o-mini"),
  apiKeyEnv: z.string().min(1).default("OPENAI_API_KEY")
});

const configSchema = z.object({
  languages: z.array(z.string().min(1)).default(["en"]),
  format: z.enum(["json", "text", "srt", "markdown"]).default("text"),
  timestamps: z.boolean().default(false),
  delayMs: z.number().int().min(0).max(60000).default(500),
  timeoutMs: z.number().int().min(1000).max(120000).default(15000),
  userAgent: z.string().min(1).optional(),
  acceptLanguage: z.string().min(1).default("en-US"),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("warn"),
  cleanup: cleanupSchema.default({})
});

export function getGlobalConfigPath(): string {
  const configDir = process.env.TUBESCRIPT_CONFIG_DIR
    || path.join(os.homedir(), ".config", "tubescript");
  return path.join(configDir, CONFIG_FILE_NAME);
}

function loadConfigFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  const content = fs.readFileSync(filePath, "utf-8");
  const errors: Array<{ error: number; offset: number; length: number }> = [];
  const parsed: unknown = parseJsonc(content, errors, { allowTrailingComma: true, allowEmptyContent: true });
  if (errors.length > 0) {
    const firstError = errors[0];
    throw new Error(`Invalid JSONC in tubescript config at ${filePath}: parse error at offset ${firstError?.offset ?? 0}`);
  }
  return parsed ?? {};
}

/** Read and validate the config; a missing file yields the defaults. */
export function loadConfig(configPath: string = getGlobalConfigPath()): TubescriptConfig {
  const raw = loadConfigFile(configPath);
  const parsed = configSchema.safeParse(raw);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new Error(`Invalid tubescript config at ${configPath}: ${issues}`);
  }

  return parsed.data;
}
