// tests/sql-autocomplete/schema-loader.test.ts

import { describe, it, expect } from 'vitest'
import { loadSchema, toSchemaRow, METADATA_QUERY } from '../../src/lib/sql/autocomplete/schema-loader'
import { SchemaIndex } from '../../src/lib/sql/autocomplete/schema-index'
import { QueryExecutionError } from '../../src/lib/sql/autocomplete/errors'
import { createDeferredExecutor, createStaticExecutor, metadataRow } from '../test-utils'

describe('toSchemaRow', () => {
  it('reads lower-case metadata columns', () => {
    expect(toSchemaRow(metadataRow('users', 'id', 'integer'))).toEqual({
      table: 'users',
      column: 'id',
      declaredType: 'integer',
    })
  })

  it('reads upper-case metadata columns', () => {
    expect(toSchemaRow({ TABLE_NAME: 'users', COLUMN_NAME: 'id', DATA_TYPE: 'int' })).toEqual({
      table: 'users',
      column: 'id',
      declaredType: 'int',
    })
  })

  it('uses an empty type when data_type is null', () => {
    expect(toSchemaRow({ table_name: 'users', column_name: 'id', data_type: null }).declaredType).toBe('')
  })

  it('throws when the column name is missing', () => {
    expect(() => toSchemaRow({ table_name: 'users' })).toThrow('Metadata row is missing table_name or column_name')
  })
})

describe('loadSchema', () => {
  it('runs the metadata query once and publishes the rows', async () => {
    const { executor, execute } = createStaticExecutor([
      metadataRow('users', 'id', 'int'),
      metadataRow('users', 'email', 'text'),
      metadataRow('orders', 'id', 'int'),
    ])
    const index = new SchemaIndex()

    const result = await loadSchema(executor, index)

    expect(execute).toHaveBeenCalledTimes(1)
    expect(execute).toHaveBeenCalledWith(METADATA_QUERY)
    expect(result).toEqual({ status: 'loaded', rowCount: 3, tableCount: 2 })
    expect(index.snapshot().tables).toEqual(['users', 'orders'])
    expect(index.snapshot().rows[1]).toEqual({ table: 'users', column: 'email', declaredType: 'text' })
  })

  it('leaves the index empty when the query fails with QueryExecutionError', async () => {
    const { executor, reject } = createDeferredExecutor()
    const index = new SchemaIndex()

    const pending = loadSchema(executor, index)
    const error = new QueryExecutionError('permission denied for view columns')
    reject(error)

    await expect(pending).resolves.toEqual({ status: 'unavailable', error })
    expect(index.snapshot().rows).toEqual([])
    expect(index.isPopulated()).toBe(false)
  })

  it('propagates other errors', async () => {
    const { executor, reject } = createDeferredExecutor()
    const index = new SchemaIndex()

    const pending = loadSchema(executor, index)
    reject(new TypeError('executor is not configured'))

    await expect(pending).rejects.toThrow('executor is not configured')
    expect(index.isPopulated()).toBe(false)
  })

  it('propagates malformed metadata rows without publishing', async () => {
    const { executor } = createStaticExecutor([metadataRow('users', 'id', 'int'), { table_name: 'orders' }])
    const index = new SchemaIndex()

    await expect(loadSchema(executor, index)).rejects.toThrow('Metadata row is missing table_name or column_name')
    expect(index.isPopulated()).toBe(false)
  })

  it('publishes an empty result as populated', async () => {
    const { executor } = createStaticExecutor([])
    const index = new SchemaIndex()

    await expect(loadSchema(executor, index)).resolves.toEqual({ status: 'loaded', rowCount: 0, tableCount: 0 })
    expect(index.isPopulated()).toBe(true)
  })
})
