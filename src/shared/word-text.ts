/**
 * Word text normalization
 */

/**
 * Normalized form used for deduplication and lookup: trimmed, inner
 * whitespace collapsed, lowercased.
 */
export function normalizeWord(text: string): string {
  return text.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Display form: trimmed with inner whitespace collapsed, case kept.
 */
export function cleanWord(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}
