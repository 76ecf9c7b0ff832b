/**
 * Text cleanup shared by normalizers
 */

/**
 * Trim and collapse runs of whitespace
 */
export function cleanTitle(title: string): string {
    return title.trim().replace(/\s+/g, ' ');
}

/**
 * Trimmed text, or null when nothing is left
 */
export function cleanText(value: string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
}

/**
 * Providers send some fields either as a string or as a list of strings
 */
export function firstString(value: string | string[] | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    if (Array.isArray(value)) {
        return cleanText(value.find(entry => entry.trim() !== ''));
    }
    return cleanText(value);
}

export function nonEmpty(values: (string | null | undefined)[]): string[] {
    return values.flatMap(value => {
        const cleaned = cleanText(value);
        return cleaned === null ? [] : [cleaned];
    });
}

/**
 * Absolute http(s) URL, or null for anything else (relative paths included)
 */
export function absoluteUrl(value: string | null): string | null {
    if (value === null || !URL.canParse(value)) return null;
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:' ? value : null;
}
