/**
 * Background Schema Loader
 *
 * Runs the metadata introspection query once and publishes the result into a
 * SchemaIndex. Expected query failures leave the index empty; completion then
 * offers keywords and functions only.
 */

import { QueryExecutionError } from './errors'
import type { SchemaIndex } from './schema-index'
import type { QueryExecutor, QueryRow, SchemaRow } from './types'

export const METADATA_QUERY =
  'SELECT table_name, column_name, data_type FROM information_schema.columns'

export type SchemaLoadResult =
  | { status: 'loaded'; rowCount: number; tableCount: number }
  | { status: 'unavailable'; error: QueryExecutionError }

function readField(row: QueryRow, name: string): unknown {
  // Some drivers report information_schema columns upper-cased
  return name in row ? row[name] : row[name.toUpperCase()]
}

/**
 * Convert a metadata row into a SchemaRow.
 * @throws Error when table_name or column_name is absent
 */
export function toSchemaRow(row: QueryRow): SchemaRow {
  const table = readField(row, 'table_name')
  const column = readField(row, 'column_name')
  const declaredType = readField(row, 'data_type')

  if (table === undefined || table === null || column === undefined || column === null) {
    throw new Error(`Metadata row is missing table_name or column_name: ${JSON.stringify(row)}`)
  }

  return {
    table: String(table),
    column: String(column),
    declaredType: declaredType === undefined || declaredType === null ? '' : String(declaredType),
  }
}

export async function loadSchema(executor: QueryExecutor, index: SchemaIndex): Promise<SchemaLoadResult> {
  let rows: QueryRow[]
  try {
    rows = await executor.execute(METADATA_QUERY)
  } catch (error) {
    if (error instanceof QueryExecutionError) {
      return { status: 'unavailable', error }
    }
    throw error
  }

  const snapshot = index.publish(rows.map(toSchemaRow))
  return { status: 'loaded', rowCount: snapshot.rows.length, tableCount: snapshot.tables.length }
}
