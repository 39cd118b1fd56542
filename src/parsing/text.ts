/**
 * Text cleaners for listing metadata: product names, ratings, review counts.
 */

const FILLER_WORDS = new Set(['new', 'original', 'genuine', 'authentic', 'latest']);

/**
 * Lower-case, collapse whitespace and drop marketing filler words so that
 * listings of the same product compare equal.
 */
export function normalizeProductName(name: unknown): string {
  if (typeof name !== 'string') return '';
  return name
    .toLowerCase()
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0 && !FILLER_WORDS.has(word))
    .join(' ');
}

/**
 * Extract a rating on a 5-point scale. "4.5", "4.5/5" and "4.5 out of 5"
 * read as 4.5; values above 5 are taken as a 10-point scale.
 */
export function cleanRating(raw: unknown): number | null {
  if (raw === null || raw === undefined || raw === '' || raw === 0) return null;
  const match = /(\d+(?:\.\d+)?)/.exec(String(raw));
  if (!match) return null;

  let rating = Number(match[1]);
  if (!Number.isFinite(rating)) return null;
  if (rating > 5) rating = rating / 2;
  return Math.min(rating, 5);
}

/**
 * Extract a whole count such as a review total: "1,234 ratings" -> 1234.
 */
export function cleanCount(raw: unknown): number | null {
  if (raw === null || raw === undefined || raw === '' || raw === 0) return null;
  const match = /(\d+(?:,\d{3})*)/.exec(String(raw));
  if (!match) return null;

  const count = parseInt(match[1].replace(/,/g, ''), 10);
  return Number.isFinite(count) ? count : null;
}

/**
 * Jaccard similarity of two names' word sets, after normalization.
 */
export function nameSimilarity(a: string, b: string): number {
  const wordsA = new Set(normalizeProductName(a).split(' ').filter(Boolean));
  const wordsB = new Set(normalizeProductName(b).split(' ').filter(Boolean));
  if (wordsA.size === 0 && wordsB.size === 0) return 0;

  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) intersection++;
  }
  const union = wordsA.size + wordsB.size - intersection;
  return union > 0 ? intersection / union : 0;
}
