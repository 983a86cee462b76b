/**
 * Word Extraction
 *
 * Finds the word being typed at the cursor. No SQL awareness: the word is
 * whatever follows the last delimiter in the text before the cursor.
 */

export const WORD_DELIMITERS = [' ', ',', '\n', ')', ';', '(', '.'] as const

/**
 * Return the trailing run of characters after the rightmost delimiter.
 * Returns '' when the text is empty or ends with a delimiter.
 */
export function extractLastWord(textBeforeCursor: string): string {
  const lastPosition = Math.max(...WORD_DELIMITERS.map((d) => textBeforeCursor.lastIndexOf(d)))
  return textBeforeCursor.slice(lastPosition + 1)
}

/**
 * Text before the cursor, with the cursor clamped into the text.
 */
export function textBeforeCursor(text: string, cursorOffset: number): string {
  const cursor = Math.min(Math.max(0, Math.trunc(cursorOffset) || 0), text.length)
  return text.slice(0, cursor)
}
