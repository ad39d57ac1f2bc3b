import { randomUUID } from "crypto";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogEnvelope = {
  ts: string;
  level: LogLevel;
  module: string;
  event: string;
  runId?: string;
  videoId?: string;
  data?: unknown;
};

export type LogFields = {
  runId?: string;
  videoId?: string;
  data?: unknown;
};

export type LogSink = (entry: LogEnvelope) => void;

export type LoggerOptions = {
  sink?: LogSink;
  /** Entries below this level are dropped. Defaults to `warn`. */
  level?: LogLevel;
};

type LogMethod = (event: string, fields?: LogFields) => LogEnvelope | null;

export type Logger = {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
};

const SECRET_KEY_PATTERN = /(token|secret|password|authorization|cookie|api[-_]?key)/i;
const SECRET_VALUE_PATTERN = /(bearer\s+[a-z0-9._-]+|\bsk[_-][a-z0-9_-]+|eyJ[a-z0-9_-]+\.[a-z0-9_-]+\.[a-z0-9_-]+)/gi;

function redactString(value: string): string {
  return value.replace(SECRET_VALUE_PATTERN, "[REDACTED]");
}

export function redactSensitive(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === "string") {
    return redactString(value);
  }
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item, seen));
  }

  const output: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (SECRET_KEY_PATTERN.test(key)) {
      output[key] = "[REDACTED]";
      continue;
    }
    output[key] = redactSensitive(entry, seen);
  }
  return output;
}

export function createRunId(): string {
  return randomUUID();
}

export const isLogLevel = (value: unknown): value is LogLevel => {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
};

// stdout carries transcripts, so every entry goes to stderr.
const defaultSink: LogSink = (entry) => {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
};

export function createLogger(moduleName: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? defaultSink;
  const threshold = LOG_LEVELS.indexOf(options.level ?? "warn");

  const emit = (level: LogLevel, event: string, fields: LogFields = {}): LogEnvelope | null => {
    if (LOG_LEVELS.indexOf(level) < threshold) return null;
    const entry: LogEnvelope = {
      ts: new Date().toISOString(),
      level,
      module: moduleName,
      event,
      ...(fields.runId ? { runId: fields.runId } : {}),
      ...(fields.videoId ? { videoId: fields.videoId } : {}),
      ...(typeof fields.data === "undefined" ? {} : { data: redactSensitive(fields.data) })
    };
    sink(entry);
    return entry;
  };

  return {
    debug: (event, fields) => emit("debug", event, fields),
    info: (event, fields) => emit("info", event, fields),
    warn: (event, fields) => emit("warn", event, fields),
    error: (event, fields) => emit("error", event, fields)
  };
}

export const __test__ = {
  redactString,
  defaultSink
};
