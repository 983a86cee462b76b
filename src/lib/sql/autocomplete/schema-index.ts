/**
 * Schema Index
 *
 * Holds the table/column catalog used for dynamic completions. Readers take
 * a snapshot (an immutable object); the loader publishes a new one by
 * swapping a single reference, so a reader never sees a half-built row list.
 */

import type { SchemaRow, SchemaSnapshot } from './types'

export const EMPTY_SNAPSHOT: SchemaSnapshot = Object.freeze({
  rows: Object.freeze([]),
  tables: Object.freeze([]),
})

export function createSnapshot(rows: readonly SchemaRow[]): SchemaSnapshot {
  const frozenRows = Object.freeze(rows.map((row) => Object.freeze({ ...row })))
  const tables = Object.freeze(Array.from(new Set(frozenRows.map((row) => row.table))))
  return Object.freeze({ rows: frozenRows, tables })
}

export class SchemaIndex {
  private current: SchemaSnapshot = EMPTY_SNAPSHOT
  private published = false

  snapshot(): SchemaSnapshot {
    return this.current
  }

  isPopulated(): boolean {
    return this.published
  }

  /**
   * Replace the (empty) contents with `rows`. Only one publish is allowed per
   * index; the index has no refresh.
   */
  publish(rows: readonly SchemaRow[]): SchemaSnapshot {
    if (this.published) {
      throw new Error('Schema index has already been populated')
    }
    const next = createSnapshot(rows)
    this.current = next
    this.published = true
    return next
  }
}
