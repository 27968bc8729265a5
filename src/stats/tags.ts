// Dropped from auto-generated tags only; explicit tags keep them
const STOPWORDS = new Set([
    'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from',
    'get', 'has', 'have', 'in', 'is', 'it', 'its', 'of', 'on', 'or',
    'that', 'the', 'this', 'to', 'was', 'will', 'with'
]);

export const SHORT_DESCRIPTION_MAX_LENGTH = 160;

/**
 * Trim, lowercase and collapse inner whitespace of each tag, dropping empties
 * and duplicates. First occurrence wins, so order is preserved.
 */
export function normalizeTags(tags: Iterable<string>, options: { filterStopwords?: boolean } = {}): string[] {
    const result: string[] = [];
    const seen = new Set<string>();

    for (const tag of tags) {
        if (!tag) continue;
        const normalized = tag.trim().toLowerCase().replace(/\s+/g, ' ');
        if (!normalized || seen.has(normalized)) continue;
        if (options.filterStopwords && STOPWORDS.has(normalized)) continue;

        result.push(normalized);
        seen.add(normalized);
    }

    return result;
}

export function parseTagsString(value: string | null | undefined): string[] {
    if (!value) return [];
    return value.split(',').map(tag => tag.trim()).filter(tag => tag.length > 0);
}

export function tagsToString(tags: readonly string[]): string {
    return tags.join(',');
}

/**
 * Tags generated from an entity name: the name itself plus its `_`/`-` separated words.
 */
export function tagsFromName(name: string): string[] {
    const words = name.replace(/[-_]/g, ' ').split(/\s+/);
    return normalizeTags([name, ...words], { filterStopwords: true });
}

/**
 * First sentence of the description, capped at 160 chars.
 * Falls back to a humanised name: `my_cool_tool` -> `My cool tool`.
 */
export function deriveShortDescription(
    description: string | null | undefined,
    fallbackName: string,
    maxLength: number = SHORT_DESCRIPTION_MAX_LENGTH
): string {
    const base = (description ?? '').trim();

    if (base) {
        let collapsed = base.split(/\s+/).join(' ');
        for (const delimiter of ['. ', '! ', '? ']) {
            const idx = collapsed.indexOf(delimiter);
            if (idx !== -1) {
                collapsed = collapsed.slice(0, idx + 1);
                break;
            }
        }
        if (collapsed.length > maxLength) {
            return collapsed.slice(0, maxLength - 3).trimEnd() + '...';
        }
        return collapsed;
    }

    const readable = fallbackName.replace(/[_-]/g, ' ').trim();
    if (!readable) return 'No description available.';
    return readable.charAt(0).toUpperCase() + readable.slice(1).toLowerCase();
}
