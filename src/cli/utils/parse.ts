import { createUsageError } from "../errors";

type NumberFlagOptions = {
  min?: number;
  max?: number;
};

export function parseNumberFlag(value: string, flag: string, options: NumberFlagOptions = {}): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw createUsageError(`Invalid ${flag}: ${value}`);
  }
  if (!Number.isInteger(parsed)) {
    throw createUsageError(`Invalid ${flag}: ${value}`);
  }
  if (typeof options.min === "number" && parsed < options.min) {
    throw createUsageError(`Invalid ${flag}: ${value}`);
  }
  if (typeof options.max === "number" && parsed > options.max) {
    throw createUsageError(`Invalid ${flag}: ${value}`);
  }
  return parsed;
}

/** Comma-separated list; blanks dropped, order kept. */
export function parseListFlag(value: string, flag: string): string[] {
  const entries = value.split(",").map((entry) => entry.trim()).filter((entry) => entry.length > 0);
  if (entries.length === 0) {
    throw createUsageError(`Invalid ${flag}: ${value}`);
  }
  return entries;
}
