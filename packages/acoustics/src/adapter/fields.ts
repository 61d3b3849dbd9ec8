/**
 * Parse-or-absent field coercion.
 *
 * Stored rows come from several schema generations and transports (SQLite
 * REAL columns, JSON APIs where numbers may arrive as strings). Every field
 * goes through a zod schema; anything that does not parse, or parses outside
 * the field's domain, becomes `null` rather than `0` or `NaN`.
 */

import { z } from "zod";

const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number());

export const dbSchema = numeric.pipe(z.number().finite());
export const percentSchema = numeric.pipe(z.number().min(0).max(100));
export const nonNegativeSchema = numeric.pipe(z.number().finite().nonnegative());
export const finiteSchema = numeric.pipe(z.number().finite());

const idSchema = z.union([
    z.string().trim().min(1),
    z.number().int().nonnegative().transform((n) => String(n)),
]);

const annotationSchema = z.string();

export function parseOrAbsent(value: unknown, schema: z.ZodType<number, z.ZodTypeDef, unknown>): number | null {
    if (value === null || value === undefined) return null;
    const result = schema.safeParse(value);
    return result.success ? result.data : null;
}

/** First alias that yields a value wins. */
export function pickNumber(
    row: Record<string, unknown>,
    keys: readonly string[],
    schema: z.ZodType<number, z.ZodTypeDef, unknown> = dbSchema
): number | null {
    for (const key of keys) {
        const value = parseOrAbsent(row[key], schema);
        if (value !== null) return value;
    }
    return null;
}

export function parseId(value: unknown): string | null {
    const result = idSchema.safeParse(value);
    return result.success ? result.data : null;
}

export function parseAnnotation(value: unknown): string | null {
    const result = annotationSchema.safeParse(value);
    if (!result.success) return null;
    return result.data.trim().length > 0 ? result.data : null;
}

/** Values below this are treated as unix seconds rather than epoch ms. */
const EPOCH_MS_THRESHOLD = 1e11;

/**
 * Resolve an instant to epoch milliseconds.
 *
 * Accepts unix seconds, epoch milliseconds, numeric strings of either, or an
 * ISO-8601 string.
 */
export function parseTimestamp(value: unknown): number | null {
    const numericValue = parseOrAbsent(value, finiteSchema);
    if (numericValue !== null) {
        return numericValue < EPOCH_MS_THRESHOLD ? numericValue * 1000 : numericValue;
    }
    if (typeof value === "string") {
        const ms = Date.parse(value);
        return Number.isFinite(ms) ? ms : null;
    }
    return null;
}
