import categories from './categories.json';

const CATEGORY_KEYWORDS: ReadonlyMap<string, readonly string[]> = new Map(Object.entries(categories));

export const UNKNOWN_CATEGORY = 'Unknown';

/** Lower case words of all path parts, split at anything that is not a letter or digit. */
function words(parts: readonly string[]): string[] {
  return parts.flatMap((part) => part.toLowerCase().split(/[^\p{L}\p{N}]+/u)).filter((word) => word !== '');
}

/** First creator tag that appears as a word in the path, otherwise the fallback. */
export function detectCreator(parts: readonly string[], creatorTags: readonly string[], fallback: string): string {
  const found = new Set(words(parts));
  const tag = creatorTags.find((candidate) => {
    const tagWords = words([candidate]);
    return tagWords.length > 0 && tagWords.every((word) => found.has(word));
  });
  return tag ?? fallback;
}

export function detectCategory(parts: readonly string[]): string {
  // The file name is most specific, so search from the last part up.
  for (const part of [...parts].reverse()) {
    const found = new Set(words([part]));
    for (const [category, keywords] of CATEGORY_KEYWORDS) {
      if (keywords.some((keyword) => found.has(keyword))) return category;
    }
  }
  return UNKNOWN_CATEGORY;
}

export function detectKeywords(parts: readonly string[]): string[] {
  const found = new Set(words(parts));
  const keywords = new Set<string>();
  for (const list of CATEGORY_KEYWORDS.values()) {
    for (const keyword of list) {
      if (found.has(keyword)) keywords.add(keyword);
    }
  }
  return [...keywords].sort();
}
