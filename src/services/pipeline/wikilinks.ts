import { MIN_KEYWORD_LENGTH } from '../../config/constants';

const EXISTING_LINK = /(\[\[[^\]]*\]\])/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Parse a comma-separated keyword reply. Terms shorter than three characters
 * are dropped, as are case-insensitive duplicates.
 */
export function parseKeywords(raw: string): string[] {
  const seen = new Set<string>();
  const keywords: string[] = [];
  for (const part of raw.split(',')) {
    const keyword = part.trim();
    if (keyword.length < MIN_KEYWORD_LENGTH) continue;
    const key = keyword.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    keywords.push(keyword);
  }
  return keywords;
}

/**
 * Wrap whole-word, case-insensitive occurrences of each keyword in [[...]].
 *
 * Longer keywords win over shorter ones they contain, and text already inside
 * a [[...]] marker is left alone, so running this twice changes nothing.
 */
export function addWikiLinks(text: string, keywords: string[]): string {
  const canonical = new Map<string, string>();
  for (const keyword of keywords) {
    const trimmed = keyword.trim();
    if (!trimmed) continue;
    const key = trimmed.toLowerCase();
    if (!canonical.has(key)) canonical.set(key, trimmed);
  }
  if (canonical.size === 0) return text;

  const alternation = [...canonical.values()]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
  const pattern = new RegExp(`(?<!\\w)(?:${alternation})(?!\\w)`, 'gi');

  return text
    .split(EXISTING_LINK)
    .map((segment, index) => {
      // split() with a capture group puts the existing links at odd indexes
      if (index % 2 === 1) return segment;
      return segment.replace(pattern, (match) => `[[${canonical.get(match.toLowerCase()) ?? match}]]`);
    })
    .join('');
}
