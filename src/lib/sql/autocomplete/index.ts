/**
 * SQL Autocomplete Engine
 *
 * Keyword, function, table and column completion for an interactive SQL
 * prompt. Table and column names come from a one-shot background metadata
 * query; completion works from the static catalog until it lands.
 *
 * @example
 * ```ts
 * import { SqlCompleter } from './autocomplete'
 *
 * const completer = new SqlCompleter(executor)
 * for (const c of completer.complete('SELECT id FROM users WHERE i', 28)) {
 *   console.log(c.label, c.meta) // 'id' 'COLUMN (integer, users)' once loaded
 * }
 * ```
 */

export { SqlCompleter, candidateUniverse, columnDetail } from './completer'
export type { CompleterOptions } from './completer'
export { createStaticCatalog, DEFAULT_KEYWORD_LISTS } from './catalog'
export { SchemaIndex, createSnapshot, EMPTY_SNAPSHOT } from './schema-index'
export { loadSchema, toSchemaRow, METADATA_QUERY } from './schema-loader'
export type { SchemaLoadResult } from './schema-loader'
export { extractLastWord, textBeforeCursor, WORD_DELIMITERS } from './tokenizer'
export { renderDisplay, escapeMarkup } from './render'
export { QueryExecutionError } from './errors'

export type {
  Suggestion,
  SuggestionKind,
  SchemaRow,
  SchemaSnapshot,
  QueryExecutor,
  QueryRow,
  RenderedCompletion,
  StaticKeywordLists,
} from './types'
