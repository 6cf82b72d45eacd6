import { z } from "zod";

/** Accepted spellings for an enabled flag, compared lower-cased and trimmed. */
export const ON_TOKENS: ReadonlySet<string> = new Set(["true", "1", "yes", "on", "enabled"]);

/** Accepted spellings for a disabled flag, compared lower-cased and trimmed. */
export const OFF_TOKENS: ReadonlySet<string> = new Set(["false", "0", "no", "off", "disabled"]);

/**
 * Parses a boolean-like environment value.
 *
 * Unset, blank and unrecognized values yield `fallback`, so a flag that
 * defaults to true can only be switched off by one of {@link OFF_TOKENS}.
 */
export function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const token = value.trim().toLowerCase();
  if (ON_TOKENS.has(token)) return true;
  if (OFF_TOKENS.has(token)) return false;
  return fallback;
}

/**
 * Splits a separated value (commas by default) into trimmed, non-empty,
 * unique entries, keeping first-seen order.
 */
export function parseList(value: string | undefined, separator = ","): string[] {
  if (value === undefined) return [];
  const entries = value
    .split(separator)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return Array.from(new Set(entries));
}

/**
 * Schema for a boolean-like variable.
 */
export const flagSetting = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => parseFlag(value, fallback));

/**
 * Schema for an integer variable. Missing, non-integer or out-of-range values
 * resolve to `fallback` instead of failing the parse.
 */
export const integerSetting = (fallback: number, minimum: number, maximum = Number.MAX_SAFE_INTEGER) =>
  z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/)
    .transform(Number)
    .pipe(z.number().int().min(minimum).max(maximum))
    .catch(fallback);

/**
 * Schema for a secret. Blank values count as absent.
 */
export const secretSetting = () => z.string().trim().min(1).optional().catch(undefined);

/**
 * Schema for a separated list that falls back to `defaults` when empty.
 */
export const listSetting = (defaults: readonly string[], separator = ",") =>
  z
    .string()
    .optional()
    .transform((value) => {
      const entries = parseList(value, separator);
      return entries.length > 0 ? entries : [...defaults];
    });
