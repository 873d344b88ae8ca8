import { z } from "zod";

export const VERSION = "0.1.0";

// Definition and response timestamps: "YYYY-MM-DD HH:MM:SS", read as UTC.
export const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

export const NO_RESPONSE_LABEL = "No response";
export const NOT_GROUPED_LABEL = "Not grouped";

// Values the platform writes for "shown but not answered".
export const NO_RESPONSE_CODE = "-99";
export const NO_RESPONSE_CODE_MULTI = "0";

export const NPS_GROUP_LABELS = ["Detractor", "Passive", "Promoter"] as const;
export const NPS_MIN = 0;
export const NPS_MAX = 10;

export const scriptOptionsSchema = z.object({
  toolName: z.string().min(1).default("qsf-export"),
  toolVersion: z.string().min(1).default(VERSION),
  library: z
    .string()
    .regex(/^[A-Za-z][A-Za-z0-9.]*$/, "library must be an R package name")
    .default("readr"),
});

export type ScriptOptionsInput = z.input<typeof scriptOptionsSchema>;
export type ScriptOptions = z.output<typeof scriptOptionsSchema>;

export function resolveScriptOptions(input: ScriptOptionsInput = {}): ScriptOptions {
  return scriptOptionsSchema.parse(input);
}

export function isNoResponseCode(value: string): boolean {
  return value === NO_RESPONSE_CODE || value === NO_RESPONSE_CODE_MULTI;
}

/**
 * Parse a platform timestamp. Returns null for anything that is not exactly
 * "YYYY-MM-DD HH:MM:SS" or names an impossible date.
 */
export function parseTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return null;
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null;
  }
  return date;
}
