/**
 * Shared utilities for the E-utilities client and decoder.
 */

const NAMED_ENTITIES: Record<string, string> = {
    amp: '&',
    lt: '<',
    gt: '>',
    quot: '"',
    apos: "'",
    nbsp: ' ',
};

/**
 * Flatten raw element content to plain text: drop inline tags
 * (<i>, <sup>, <sub>, ...), decode entities, collapse whitespace.
 *
 * "CD4<sup>+</sup> T &amp; B cells" → "CD4+ T & B cells"
 */
export function flattenMarkup(raw: string): string {
    return decodeEntities(raw.replace(/<[^>]*>/g, ''))
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Decode XML named and numeric character references.
 * Unknown references are left as they are.
 */
export function decodeEntities(text: string): string {
    return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, ref: string) => {
        if (ref.startsWith('#x') || ref.startsWith('#X')) {
            return safeFromCodePoint(Number.parseInt(ref.slice(2), 16)) ?? match;
        }
        if (ref.startsWith('#')) {
            return safeFromCodePoint(Number.parseInt(ref.slice(1), 10)) ?? match;
        }
        return NAMED_ENTITIES[ref.toLowerCase()] ?? match;
    });
}

function safeFromCodePoint(codePoint: number): string | null {
    if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > 0x10ffff) return null;
    return String.fromCodePoint(codePoint);
}

/**
 * Author as "LastName Initials". Initials fall back to the first letters
 * of the fore name; a bare last name is used when neither is present.
 *
 * ("Smith", "JA", "John A") → "Smith JA"
 * ("Smith", "", "John Adam") → "Smith JA"
 */
export function formatAuthorName(lastName: string, initials: string, foreName: string): string {
    if (!lastName) return '';

    const derived = initials || foreName
        .split(/[\s-]+/)
        .filter(Boolean)
        .map((part) => part.charAt(0).toUpperCase())
        .join('');

    return derived ? `${lastName} ${derived}` : lastName;
}

/**
 * Canonical landing page for a PMID.
 */
export function pubmedUrl(pmid: string): string {
    return `https://pubmed.ncbi.nlm.nih.gov/${encodeURIComponent(pmid)}/`;
}

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .replace(/^doi:\s*/i, '')
        .trim() || null;
}

/**
 * Shorten text to at most `maxLength` characters, ending in "...".
 */
export function truncateText(text: string, maxLength: number): string {
    if (text.length <= maxLength) return text;
    if (maxLength <= 3) return text.slice(0, maxLength);
    return `${text.slice(0, maxLength - 3).trimEnd()}...`;
}
