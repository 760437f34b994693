/**
 * Text Processor
 * Whitespace and Unicode normalization for extracted text
 */

export type UnicodeNormalizationForm = 'NFC' | 'NFD' | 'NFKC' | 'NFKD';

/**
 * Normalize Unicode, drop control characters and collapse whitespace.
 * Line breaks are kept (collapsed to one) so line-based matchers still work.
 */
export function cleanText(text: string, form: UnicodeNormalizationForm = 'NFC'): string {
  if (!text) {
    return '';
  }

  return text
    .normalize(form)
    .replace(/\u00a0/g, ' ')
    .replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g, '')
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/ ?\n ?/g, '\n')
    .replace(/\n{2,}/g, '\n')
    .trim();
}

/**
 * Collapse every whitespace run (line breaks included) to a single space
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Comparison key: case folded, whitespace collapsed
 */
export function foldForComparison(text: string): string {
  return collapseWhitespace(text.normalize('NFKC')).toLowerCase();
}
