/**
 * Text Cleaner
 *
 * Normalises text extracted from web pages while keeping paragraph structure.
 */

export function cleanText(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
