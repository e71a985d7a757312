/**
 * Normalizes a film title for matching:
 * 1. Lowercase and strip diacritics (é → e)
 * 2. Replace every non letter/digit character with a space
 * 3. Trim and collapse multiple spaces
 */
export function normalizeTitle(rawTitle: string): string {
  return rawTitle
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim()
    .replace(/\s+/g, ' ');
}

/**
 * Sørensen-Dice coefficient over character bigrams of the normalized titles,
 * ignoring spaces. 1 for identical titles, 0 for nothing in common.
 */
export function titleSimilarity(left: string, right: string): number {
  const a = normalizeTitle(left).replace(/ /g, '');
  const b = normalizeTitle(right).replace(/ /g, '');

  if (a.length === 0 || b.length === 0) return 0;
  if (a === b) return 1;
  if (a.length < 2 || b.length < 2) return 0;

  const bigrams = new Map<string, number>();
  for (let i = 0; i < a.length - 1; i++) {
    const bigram = a.slice(i, i + 2);
    bigrams.set(bigram, (bigrams.get(bigram) ?? 0) + 1);
  }

  let overlap = 0;
  for (let i = 0; i < b.length - 1; i++) {
    const bigram = b.slice(i, i + 2);
    const count = bigrams.get(bigram) ?? 0;
    if (count > 0) {
      bigrams.set(bigram, count - 1);
      overlap++;
    }
  }

  return (2 * overlap) / (a.length - 1 + (b.length - 1));
}

/**
 * Parses a year from upstream formats (e.g., "1982", "2024-05-01") to number
 */
export function parseYear(year: string | null | undefined): number | null {
  if (!year) return null;

  // Extract first 4-digit year
  const match = year.match(/(\d{4})/);
  if (match?.[1]) {
    const yearNum = parseInt(match[1], 10);
    if (yearNum >= 1888 && yearNum <= 2100) {
      return yearNum;
    }
  }

  return null;
}

/**
 * Splits a display title such as "Dune: Part Two (2024)" into its title
 * and trailing year. Titles without a trailing four-digit year are kept whole.
 */
export function splitTrailingYear(displayTitle: string): { title: string; year: number | null } {
  const trimmed = displayTitle.trim();
  const match = trimmed.match(/^(.*\S)\s*\((\d{4})\)$/);
  if (!match?.[1] || !match[2]) {
    return { title: trimmed, year: null };
  }
  return { title: match[1], year: parseYear(match[2]) };
}
