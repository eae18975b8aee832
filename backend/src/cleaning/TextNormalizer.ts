/**
 * Text Normalizer
 * Line-ending and blank-line normalization shared by every body mode.
 */

/**
 * Convert `\r\n` and lone `\r` to `\n`.
 */
export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n|\r/g, '\n');
}

/**
 * Normalize newlines and collapse lines holding only spaces or tabs.
 */
export function normalizePlainText(text: string): string {
  return normalizeNewlines(text).replace(/\n[ \t]+\n/g, '\n');
}

/**
 * Limit runs of newlines to `max` (default 2).
 */
export function limitConsecutiveNewlines(text: string, max = 2): string {
  const pattern = new RegExp(`\\n{${max + 1},}`, 'g');
  return text.replace(pattern, '\n'.repeat(max));
}
