/**
 * Well Extractor: Identifier Recovery
 *
 * Best-effort reconstruction of a well (API) number from noisy text, used
 * only when no labelled identifier pattern matched. There is no checksum:
 * a stray 10-14 digit run (a phone number with area code, a permit number)
 * can be returned.
 */

/** Digit run interleaved with spaces, hyphens or slashes; at most 14 digits per match */
const SEPARATED_RUN_RE = /(?:\d[\s\-/\\]*){10,14}/g;
const CONTIGUOUS_RUN_RE = /\b\d{10,14}\b/g;
const DASH_VARIANTS_RE = /[\u2013\u2014]/g;

/** Group offsets by digit count: 2-3-5, 2-3-5-2, 2-3-5-2-2 */
const GROUPINGS: Record<number, number[]> = {
    10: [2, 3, 5],
    12: [2, 3, 5, 2],
    14: [2, 3, 5, 2, 2],
};

/** Hyphenate a digit string by its length; `null` for unsupported lengths */
export function formatIdentifier(digits: string): string | null {
    const grouping = GROUPINGS[digits.length];
    if (!grouping || !/^\d+$/.test(digits)) {
        return null;
    }

    const groups: string[] = [];
    let offset = 0;
    for (const size of grouping) {
        groups.push(digits.slice(offset, offset + size));
        offset += size;
    }
    return groups.join("-");
}

/** Candidate digit strings in first-seen order, without duplicates */
export function findIdentifierCandidates(text: string): string[] {
    const normalized = text.replace(DASH_VARIANTS_RE, "-");
    const candidates: string[] = [];

    for (const match of normalized.matchAll(SEPARATED_RUN_RE)) {
        const digits = match[0].replace(/\D/g, "");
        if (digits.length >= 10 && digits.length <= 14) {
            candidates.push(digits);
        }
    }
    for (const match of normalized.matchAll(CONTIGUOUS_RUN_RE)) {
        candidates.push(match[0]);
    }

    return [...new Set(candidates)];
}

/**
 * Recover a hyphenated identifier from free text.
 *
 * Longer candidates are preferred (a 14-digit run beats a 10-digit one);
 * ties keep first-seen order. The first candidate whose length has a known
 * grouping is returned.
 */
export function recoverIdentifier(text: string): string | null {
    const ordered = findIdentifierCandidates(text).sort((a, b) => b.length - a.length);

    for (const digits of ordered) {
        const formatted = formatIdentifier(digits);
        if (formatted) {
            return formatted;
        }
    }

    return null;
}
