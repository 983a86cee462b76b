/**
 * Static suggestions: language keywords and built-in functions.
 */

import builtins from '../keywords.json'
import type { StaticKeywordLists, Suggestion } from './types'

export const DEFAULT_KEYWORD_LISTS: StaticKeywordLists = {
  keywords: builtins.keywords,
  functions: builtins.functions,
}

/**
 * Build the static catalog: every keyword, then every function.
 * The returned array and its entries are frozen.
 */
export function createStaticCatalog(lists: StaticKeywordLists = DEFAULT_KEYWORD_LISTS): readonly Suggestion[] {
  const suggestions: Suggestion[] = [
    ...lists.keywords.map((label) => Object.freeze<Suggestion>({ label, kind: 'KEYWORD' })),
    ...lists.functions.map((label) => Object.freeze<Suggestion>({ label, kind: 'FUNCTION' })),
  ]
  return Object.freeze(suggestions)
}
