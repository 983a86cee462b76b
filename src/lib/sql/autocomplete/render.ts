const MARKUP_ESCAPES: Record<string, string> = {
  '&': '&#38;',
  '<': '&#60;',
  '>': '&#62;',
}

export function escapeMarkup(text: string): string {
  return text.replace(/[&<>]/g, (ch) => MARKUP_ESCAPES[ch] ?? ch)
}

/**
 * Markup for a completion label: the first `offset` characters (the part the
 * user already typed) bold and red, the rest plain.
 */
export function renderDisplay(label: string, offset: number): string {
  const head = escapeMarkup(label.slice(0, offset))
  const tail = escapeMarkup(label.slice(offset))
  return `<b><style color='red'>${head}</style></b>${tail}`
}
