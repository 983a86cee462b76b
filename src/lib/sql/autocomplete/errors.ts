/**
 * Raised by a QueryExecutor when a statement fails for a reason the caller
 * is expected to recover from. Anything else is treated as a defect.
 */
export class QueryExecutionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'QueryExecutionError'
  }
}
