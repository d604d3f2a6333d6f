/**
 * Tag normalization
 * Every tag comparison in the engine goes through here.
 */

/**
 * Trim, lower-case and collapse inner whitespace
 * "  Живая   Музыка " => "живая музыка"
 */
export function normalizeTag(tag: string): string {
  return tag.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Normalize a tag list, dropping empties and duplicates (first occurrence wins)
 */
export function normalizeTags(tags: Iterable<string> | null | undefined): string[] {
  if (!tags) return [];

  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of tags) {
    const tag = normalizeTag(raw);
    if (tag.length === 0 || seen.has(tag)) continue;
    seen.add(tag);
    result.push(tag);
  }
  return result;
}

/**
 * Normalized set for membership checks
 */
export function toTagSet(tags: Iterable<string> | null | undefined): Set<string> {
  return new Set(normalizeTags(tags));
}
