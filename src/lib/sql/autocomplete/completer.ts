/**
 * SQL Completer
 *
 * Owns a SchemaIndex and its one-shot background load, and answers completion
 * requests synchronously from whatever snapshot is current.
 */

import { createStaticCatalog } from './catalog'
import { renderDisplay } from './render'
import { SchemaIndex } from './schema-index'
import { loadSchema, type SchemaLoadResult } from './schema-loader'
import { extractLastWord, textBeforeCursor } from './tokenizer'
import type {
  QueryExecutor,
  RenderedCompletion,
  SchemaSnapshot,
  StaticKeywordLists,
  Suggestion,
} from './types'

export interface CompleterOptions {
  /** Override the built-in keyword and function lists */
  keywordLists?: StaticKeywordLists
}

export function columnDetail(declaredType: string, table: string): string {
  return `COLUMN (${declaredType}, ${table})`
}

/**
 * Candidate universe for one request, in emission order:
 * static catalog, tables, then columns of tables mentioned anywhere in `text`.
 */
export function* candidateUniverse(
  catalog: readonly Suggestion[],
  snapshot: SchemaSnapshot,
  text: string
): Generator<Suggestion> {
  yield* catalog
  for (const table of snapshot.tables) {
    yield { label: table, kind: 'TABLE' }
  }
  for (const row of snapshot.rows) {
    // Plain substring test: a table named in a comment or literal still counts
    if (text.includes(row.table)) {
      yield { label: row.column, kind: 'COLUMN', detail: columnDetail(row.declaredType, row.table) }
    }
  }
}

function* matchCandidates(
  catalog: readonly Suggestion[],
  snapshot: SchemaSnapshot,
  text: string,
  word: string
): Generator<RenderedCompletion> {
  // Offsets count the typed word's UTF-16 units, even where upper-casing
  // changes the length (ß matches SS, and only one character is highlighted)
  const prefix = word.toUpperCase()
  for (const suggestion of candidateUniverse(catalog, snapshot, text)) {
    if (!suggestion.label.toUpperCase().startsWith(prefix)) continue
    yield {
      label: suggestion.label,
      insertionOffset: -word.length,
      display: renderDisplay(suggestion.label, word.length),
      meta: suggestion.detail ?? suggestion.kind,
    }
  }
}

export class SqlCompleter {
  readonly catalog: readonly Suggestion[]
  /**
   * Settles when the background schema load ends. Rejects only for errors
   * other than QueryExecutionError.
   */
  readonly loaded: Promise<SchemaLoadResult>
  private readonly index = new SchemaIndex()

  constructor(executor: QueryExecutor, options: CompleterOptions = {}) {
    this.catalog = createStaticCatalog(options.keywordLists)
    this.loaded = loadSchema(executor, this.index)
  }

  snapshot(): SchemaSnapshot {
    return this.index.snapshot()
  }

  /**
   * Completions for the word before `cursorOffset`. The schema snapshot is
   * taken now; iteration is lazy and never waits on the background load.
   */
  complete(text: string, cursorOffset: number): IterableIterator<RenderedCompletion> {
    const word = extractLastWord(textBeforeCursor(text, cursorOffset))
    if (word.length === 0) {
      const none: RenderedCompletion[] = []
      return none.values()
    }
    return matchCandidates(this.catalog, this.index.snapshot(), text, word)
  }
}
