/**
 * Autocomplete Engine Types
 *
 * Text + Cursor → Tokenizer → Catalog + SchemaIndex snapshot → Matcher → RenderedCompletion
 */

// ============================================================================
// 1. SUGGESTION TYPES
// ============================================================================

export type SuggestionKind = 'KEYWORD' | 'FUNCTION' | 'TABLE' | 'COLUMN'

export interface Suggestion {
  readonly label: string
  readonly kind: SuggestionKind
  /** For columns: "COLUMN (<declaredType>, <table>)" */
  readonly detail?: string
}

// ============================================================================
// 2. SCHEMA TYPES
// ============================================================================

/** One column discovered by the metadata introspection query */
export interface SchemaRow {
  readonly table: string
  readonly column: string
  readonly declaredType: string
}

export interface SchemaSnapshot {
  readonly rows: readonly SchemaRow[]
  /** Distinct table names, first-seen order */
  readonly tables: readonly string[]
}

// ============================================================================
// 3. QUERY EXECUTOR (consumed capability)
// ============================================================================

export type QueryRow = Record<string, unknown>

export interface QueryExecutor {
  /**
   * Run a statement and return its rows.
   * Rejects with QueryExecutionError for expected, recoverable failures
   * (lost connectivity, missing privileges, unknown relation).
   */
  execute(statement: string): Promise<QueryRow[]>
}

// ============================================================================
// 4. OUTPUT
// ============================================================================

export interface RenderedCompletion {
  label: string
  /** Negative offset: replace this many characters before the cursor */
  insertionOffset: number
  /** Label markup with the typed prefix emphasized */
  display: string
  /** Kind or column detail, shown beside the label */
  meta: string
}

export interface StaticKeywordLists {
  keywords: readonly string[]
  functions: readonly string[]
}
