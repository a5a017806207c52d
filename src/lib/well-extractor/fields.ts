/**
 * Well Extractor: Field Cascades
 *
 * A field table maps every field of an entity to an ordered list of
 * case-insensitive patterns, a coercion and a missing-value default. One
 * generic routine evaluates any table: the first pattern whose first capture
 * group is non-empty wins and later patterns are never tried.
 */

import {
    cleanString,
    limitLength,
    normalizeIdentifier,
    parseDate,
    parseInteger,
    parseNumber,
} from "./normalize";

/** Default for string fields that are still missing after cleaning */
export const STRING_MISSING_DEFAULT = "N/A";
/** Default for numeric fields that are still missing after coercion */
export const NUMERIC_MISSING_DEFAULT = 0;

export interface FieldRule<V> {
    /** Tried in order */
    patterns: RegExp[];
    /** Raw capture to typed value; never throws */
    coerce: (raw: string | null) => V | null;
    /** `null` marks an identity field, which is never defaulted */
    missingDefault: V | null;
}

export type FieldTable<T> = { [K in keyof T]: FieldRule<T[K]> };

/** Raw captures keyed by field; absent keys are pattern misses */
export type RawFields<T> = { [K in keyof T]?: string };

/** Coerced values; `null` means the field is missing */
export type FieldValues<T> = { [K in keyof T]?: T[K] | null };

// ---------------------------------------------------------------------------
// Rule builders
// ---------------------------------------------------------------------------

export function textField(patterns: RegExp[], maxLength?: number): FieldRule<string> {
    return {
        patterns,
        coerce: (raw) => {
            const cleaned = cleanString(raw);
            return maxLength === undefined ? cleaned : limitLength(cleaned, maxLength);
        },
        missingDefault: STRING_MISSING_DEFAULT,
    };
}

export function identifierField(patterns: RegExp[], maxLength: number): FieldRule<string> {
    return {
        patterns,
        coerce: (raw) => limitLength(normalizeIdentifier(raw), maxLength),
        missingDefault: null,
    };
}

export function numberField(patterns: RegExp[]): FieldRule<number> {
    return { patterns, coerce: parseNumber, missingDefault: NUMERIC_MISSING_DEFAULT };
}

export function integerField(patterns: RegExp[]): FieldRule<number> {
    return { patterns, coerce: parseInteger, missingDefault: NUMERIC_MISSING_DEFAULT };
}

export function dateField(patterns: RegExp[]): FieldRule<string> {
    return { patterns, coerce: parseDate, missingDefault: null };
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/** First non-empty capture across the cascade, trimmed */
export function firstMatch(text: string, patterns: readonly RegExp[]): string | null {
    for (const pattern of patterns) {
        const captured = pattern.exec(text)?.[1];
        if (captured) {
            return captured.trim();
        }
    }
    return null;
}

export function extractFields<T>(text: string, table: FieldTable<T>): RawFields<T> {
    const raw: RawFields<T> = {};
    for (const key in table) {
        const value = firstMatch(text, table[key].patterns);
        if (value !== null) {
            raw[key] = value;
        }
    }
    return raw;
}

export function coerceFields<T>(raw: RawFields<T>, table: FieldTable<T>): FieldValues<T> {
    const values: FieldValues<T> = {};
    for (const key in table) {
        const captured = raw[key] ?? null;
        const value = table[key].coerce(captured);
        if (captured !== null && value === null) {
            console.debug(`[Fields] Could not coerce ${key} from "${captured}"`);
        }
        values[key] = value;
    }
    return values;
}

/**
 * Fill missing defaultable fields. Identity fields (`missingDefault: null`)
 * stay missing so identity resolution can see that they are absent.
 */
export function applyMissingDefaults<T>(values: FieldValues<T>, table: FieldTable<T>): FieldValues<T> {
    const result: FieldValues<T> = { ...values };
    for (const key in table) {
        const fallback = table[key].missingDefault;
        const current = result[key];
        if ((current === null || current === undefined) && fallback !== null) {
            result[key] = fallback;
        }
    }
    return result;
}

/** Drop missing fields; what remains is written to the store */
export function toPayload<T>(values: FieldValues<T>): Partial<T> {
    const payload: Partial<T> = {};
    for (const key in values) {
        const value = values[key];
        if (value !== null && value !== undefined) {
            payload[key] = value;
        }
    }
    return payload;
}

// ---------------------------------------------------------------------------
// Composite refinements
// ---------------------------------------------------------------------------

const LAT_LONG_RE = /Latitude[:#\s-]+(-?\d+\.\d+)[\s\S]{0,40}?Longitude[:#\s-]+(-?\d+\.\d+)/i;

/** Latitude and longitude printed together; overrides the single-field cascades */
export function extractLatLong(text: string): { latitude: string; longitude: string } | null {
    const match = LAT_LONG_RE.exec(text);
    if (!match) {
        return null;
    }
    return { latitude: match[1], longitude: match[2] };
}

// Case-sensitive: a new block starts at a capitalized label
const NEXT_LABEL_RE = /\n[A-Z][^\n]{0,40}[:#\s-]/;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Multi-line block after `label`, up to the next line that starts with a
 * capitalized label-like token, or the end of the text.
 */
export function extractMultilineBlock(text: string, label: string): string | null {
    const start = new RegExp(`${escapeRegExp(label)}[:#\\s-]+`, "i").exec(text);
    if (!start) {
        return null;
    }

    const rest = text.slice(start.index + start[0].length);
    const end = rest.search(NEXT_LABEL_RE);
    const block = (end === -1 ? rest : rest.slice(0, end)).trim();
    return block.length > 0 ? block : null;
}
