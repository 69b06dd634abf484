/**
 * Tag and description helpers for the primitive catalog.
 *
 * Pure functions, no state. Every tag list returned here is lowercase,
 * deduplicated and sorted so stored and displayed tags are stable.
 */

const STOPWORDS: ReadonlySet<string> = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from',
  'get', 'has', 'have', 'in', 'is', 'it', 'its', 'of', 'on', 'or',
  'that', 'the', 'this', 'to', 'was', 'will', 'with',
]);

/** Characters that separate words inside a primitive name. */
const NAME_SEPARATORS = /[\s_\-./:]+/;

/**
 * Conservative characters-per-token ratio for estimating tokens from
 * response length when the host has no real counts.
 */
export const CHARS_PER_TOKEN = 3.5;

export const SHORT_DESCRIPTION_MAX = 160;

function normalizeTag(tag: string): string {
  return tag.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Normalizes caller-supplied tags: trims, collapses whitespace, lowercases,
 * drops empties and duplicates. With `filterStopwords`, also drops words
 * from the stopword list.
 */
export function normalizeTags(
  tags: Iterable<string>,
  options: { filterStopwords?: boolean } = {},
): string[] {
  const result = new Set<string>();
  for (const raw of tags) {
    const tag = normalizeTag(raw);
    if (!tag) continue;
    if (options.filterStopwords && STOPWORDS.has(tag)) continue;
    result.add(tag);
  }
  return [...result].sort();
}

/**
 * Derives tags from a primitive name by splitting it into words.
 *
 * @example
 * extractTags('fetch_weather_data') // ['data', 'fetch', 'weather']
 * extractTags('the-api-to-data')    // ['api', 'data']
 */
export function extractTags(rawName: string): string[] {
  return normalizeTags(rawName.split(NAME_SEPARATORS), { filterStopwords: true });
}

/**
 * Builds a one-line summary for catalog listings.
 *
 * Takes the first sentence of the description (cut after the first `.`, `!`
 * or `?` followed by a space) and truncates it to `maxLength` with `...`.
 * Without a description the name is humanized: `my_cool_tool` -> `My cool tool`.
 */
export function deriveShortDescription(
  description: string | null | undefined,
  fallbackName: string,
  maxLength: number = SHORT_DESCRIPTION_MAX,
): string {
  const collapsed = (description ?? '').split(/\s+/).filter(Boolean).join(' ');

  if (collapsed) {
    let sentence = collapsed;
    const match = /[.!?] /.exec(collapsed);
    if (match) {
      sentence = collapsed.slice(0, match.index + 1);
    }
    if (sentence.length > maxLength) {
      return sentence.slice(0, maxLength - 3).trimEnd() + '...';
    }
    return sentence;
  }

  const readable = fallbackName.replace(/[_-]/g, ' ').trim().toLowerCase();
  if (!readable) return 'No description available.';
  return readable.charAt(0).toUpperCase() + readable.slice(1);
}

/**
 * Estimated token count for a response of `responseChars` characters,
 * truncated toward zero.
 */
export function estimateTokensFromChars(responseChars: number): number {
  return Math.floor(responseChars / CHARS_PER_TOKEN);
}
