/**
 * Well Extractor: Normalization
 *
 * Total coercion functions used by the field tables. None of them throw:
 * anything that cannot be read becomes `null` ("missing"), and the field
 * table decides later whether a default replaces it.
 */

import { format, isValid, parse } from "date-fns";
import type { ExtractedDocument, NormalizedDocument, PageText } from "./types";

// ---------------------------------------------------------------------------
// Document-level normalization
// ---------------------------------------------------------------------------

/**
 * Strip carriage returns, NUL bytes and form-feeds (tesseract ends each
 * page with one). Line structure is preserved; the field patterns and the
 * multi-line block extraction depend on it.
 */
export function normalizeText(raw: string): string {
    return raw.replace(/[\r\x00\x0C]/g, "");
}

/**
 * Normalize an extracted document: clean each page, drop pages left blank
 * and join the rest in page order.
 */
export function normalizeDocument(doc: ExtractedDocument): NormalizedDocument {
    const pages: PageText[] = doc.pages
        .map((page) => ({ ...page, text: normalizeText(page.text) }))
        .filter((page) => page.text.trim().length > 0)
        .sort((a, b) => a.page - b.page);

    return {
        ...doc,
        pages,
        text: pages.map((page) => page.text).join("\n"),
    };
}

// ---------------------------------------------------------------------------
// Strings
// ---------------------------------------------------------------------------

const NAMED_ENTITIES: Record<string, string> = {
    amp: "&",
    lt: "<",
    gt: ">",
    quot: '"',
    apos: "'",
    nbsp: " ",
    ndash: "–",
    mdash: "—",
    deg: "°",
    frac12: "½",
    frac14: "¼",
    frac34: "¾",
    plusmn: "±",
    times: "×",
    copy: "©",
    reg: "®",
    hellip: "…",
    lsquo: "‘",
    rsquo: "’",
    ldquo: "“",
    rdquo: "”",
};

const ENTITY_RE = /&(?:#(\d{1,7})|#[xX]([0-9a-fA-F]{1,6})|([A-Za-z][A-Za-z0-9]{1,31}));/g;
const HTML_TAG_RE = /<[^>]+>/g;
const NON_PRINTABLE_RE = /[^\x09\x0A\x0D\x20-\x7E]/g;

/** Decode named, decimal and hexadecimal character references; unknown ones are kept */
export function decodeHtmlEntities(value: string): string {
    return value.replace(ENTITY_RE, (match, decimal?: string, hex?: string, name?: string) => {
        if (name !== undefined) {
            return NAMED_ENTITIES[name] ?? match;
        }
        const codePoint = decimal !== undefined ? parseInt(decimal, 10) : parseInt(hex ?? "", 16);
        if (!Number.isFinite(codePoint) || codePoint > 0x10ffff) {
            return match;
        }
        return String.fromCodePoint(codePoint);
    });
}

/**
 * Clean a raw capture:
 * 1. Decode HTML entities
 * 2. Replace markup tags with a space
 * 3. Turn newlines / tabs into spaces
 * 4. Replace anything outside printable ASCII with a space
 * 5. Collapse whitespace and trim
 *
 * An empty result is `null`.
 */
export function cleanString(value: string | null | undefined): string | null {
    if (value === null || value === undefined) {
        return null;
    }
    const cleaned = decodeHtmlEntities(value)
        .replace(HTML_TAG_RE, " ")
        .replace(/[\r\n\t]+/g, " ")
        .replace(NON_PRINTABLE_RE, " ")
        .replace(/\s+/g, " ")
        .trim();
    return cleaned.length > 0 ? cleaned : null;
}

/** Silent truncation to a column's maximum length */
export function limitLength(value: string | null, maxLength: number): string | null {
    if (value === null || value.length <= maxLength) {
        return value;
    }
    return value.slice(0, maxLength);
}

const UNICODE_DASH_RE = /[\u2010-\u2015\u2212]/g;

/**
 * Canonical well identifier: `42 123 45678`, `42-123-45678` and
 * `42—123—45678` all become `42-123-45678`.
 */
export function normalizeIdentifier(value: string | null | undefined): string | null {
    const cleaned = cleanString(value?.replace(UNICODE_DASH_RE, "-"));
    if (cleaned === null) {
        return null;
    }
    const canonical = cleaned
        .replace(/\s*-\s*/g, "-")
        .replace(/(\d)\s+(?=\d)/g, "$1-")
        .replace(/\s+/g, "")
        .replace(/[^0-9A-Za-z-]/g, "");
    return canonical.length > 0 ? canonical : null;
}

// ---------------------------------------------------------------------------
// Numbers
// ---------------------------------------------------------------------------

const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/** Parse a float after dropping thousands separators; `null` on failure */
export function parseNumber(value: string | null | undefined): number | null {
    if (value === null || value === undefined) {
        return null;
    }
    const stripped = value.replace(/,/g, "").trim();
    if (!NUMBER_RE.test(stripped)) {
        return null;
    }
    const parsed = Number(stripped);
    return Number.isFinite(parsed) ? parsed : null;
}

// Bounds of the store's `integer` column
const INT4_MIN = -2147483648;
const INT4_MAX = 2147483647;

/**
 * Integer fields are read as floats and truncated toward zero. Values the
 * `integer` column cannot hold are missing.
 */
export function parseInteger(value: string | null | undefined): number | null {
    const parsed = parseNumber(value);
    if (parsed === null) {
        return null;
    }
    const truncated = Math.trunc(parsed);
    return truncated < INT4_MIN || truncated > INT4_MAX ? null : truncated;
}

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

interface DateFormat {
    shape: RegExp;
    /** Rewrite a matched value into the `pattern` date-fns parses */
    rewrite?: (match: RegExpMatchArray) => string;
    pattern: string;
}

/** Two-digit years: 00-68 are 2000s, 69-99 are 1900s */
function expandTwoDigitYear(yy: string): string {
    const year = parseInt(yy, 10);
    return String(year < 69 ? 2000 + year : 1900 + year);
}

// Tried in order; the first one that yields a valid date wins
const DATE_FORMATS: DateFormat[] = [
    { shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/, pattern: "M/d/yyyy" },
    {
        shape: /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/,
        rewrite: ([, month, day, yy]) => `${month}/${day}/${expandTwoDigitYear(yy)}`,
        pattern: "M/d/yyyy",
    },
    { shape: /^\d{4}-\d{1,2}-\d{1,2}$/, pattern: "yyyy-M-d" },
];

// Only used to fill fields absent from the pattern; every pattern is a full date
const REFERENCE_DATE = new Date(2000, 0, 1);

/** Calendar date as `YYYY-MM-DD`, or `null` when no format accepts the value */
export function parseDate(value: string | null | undefined): string | null {
    if (value === null || value === undefined) {
        return null;
    }
    const trimmed = value.trim();

    for (const { shape, rewrite, pattern } of DATE_FORMATS) {
        const match = trimmed.match(shape);
        if (!match) {
            continue;
        }
        const input = rewrite ? rewrite(match) : trimmed;
        const parsed = parse(input, pattern, REFERENCE_DATE);
        if (isValid(parsed)) {
            return format(parsed, "yyyy-MM-dd");
        }
    }

    return null;
}
