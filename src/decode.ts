/**
 * Lenient decoding for Kanboard JSON.
 *
 * Kanboard encodes the same field as a number, a numeric string, a boolean
 * or an empty string depending on version and endpoint. These schemas
 * accept all of them and normalize to one TypeScript type.
 */

import { z } from "zod";

// ─── Scalars ────────────────────────────────────────────

/** Number or numeric string; blanks, null and garbage become 0 */
export const kbNumber = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((value) => {
    if (value === null || value === undefined || value === "") return 0;
    const n = typeof value === "number" ? value : Number(value);
    return Number.isFinite(n) ? n : 0;
  });

/** true/false, 1/0, "1"/"0", "true"/"false" */
export const kbBoolean = z
  .union([z.boolean(), z.number(), z.string(), z.null()])
  .optional()
  .transform((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") return value === "1" || value === "true";
    return false;
  });

/** Any scalar rendered as a string; null becomes "" */
export const kbString = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .optional()
  .transform((value) => (value === null || value === undefined ? "" : String(value)));

/**
 * Unix seconds (number or digit string), RFC 3339 or YYYY-MM-DD.
 * "", "0", 0, null and unparseable text all mean "no date".
 */
export const kbTime = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((value): Date | null => {
    if (value === null || value === undefined || value === "" || value === "0" || value === 0) {
      return null;
    }
    if (typeof value === "number" || /^-?\d+$/.test(value)) {
      const date = new Date(Number(value) * 1000);
      return Number.isNaN(date.getTime()) ? null : date;
    }
    const text = /^\d{4}-\d{2}-\d{2}$/.test(value) ? `${value}T00:00:00Z` : value;
    const ms = Date.parse(text);
    return Number.isNaN(ms) ? null : new Date(ms);
  });

// ─── Alternatives ───────────────────────────────────────

export type DecodeResult<T> =
  | { ok: true; value: T; shape: string }
  | { ok: false; errors: string[] };

export interface Candidate<T> {
  shape: string;
  decode: (input: unknown) => { ok: true; value: T } | { ok: false; error: string };
}

/** A candidate shape: parse with `schema`, then convert with `map` */
export function candidate<S extends z.ZodTypeAny, T>(
  shape: string,
  schema: S,
  map: (parsed: z.output<S>) => T
): Candidate<T> {
  return {
    shape,
    decode: (input) => {
      const result = schema.safeParse(input);
      return result.success
        ? { ok: true, value: map(result.data) }
        : { ok: false, error: `${shape}: ${result.error.issues[0]?.message ?? "invalid"}` };
    },
  };
}

/** Try each candidate in turn; the first one that parses wins */
export function oneOf<T>(
  input: unknown,
  candidates: readonly Candidate<T>[]
): DecodeResult<T> {
  const errors: string[] = [];
  for (const c of candidates) {
    const result = c.decode(input);
    if (result.ok) return { ok: true, value: result.value, shape: c.shape };
    errors.push(result.error);
  }
  return { ok: false, errors };
}
