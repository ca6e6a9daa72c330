/**
 * Text processing helpers shared by extraction and formatting
 */

export const TRUNCATION_NOTICE = '[Content truncated due to size limits]';

/**
 * Truncate text to at most `maxLength` characters, marker included.
 * Cuts at a paragraph break when one sits in the second half of the budget.
 */
export function safeTruncate(text: string, maxLength: number, notice: string = TRUNCATION_NOTICE): string {
  if (text.length <= maxLength) {
    return text;
  }

  const suffix = `...\n${notice}`;
  const budget = Math.max(0, maxLength - suffix.length);
  const paragraphBreak = text.slice(0, budget).lastIndexOf('\n\n');

  if (paragraphBreak > budget / 2) {
    return `${text.slice(0, paragraphBreak)}\n\n${notice}`;
  }

  return text.slice(0, budget) + suffix;
}

/**
 * Collapse runs of whitespace into single spaces
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Hard cut used for titles, URLs and snippets
 */
export function clip(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}
