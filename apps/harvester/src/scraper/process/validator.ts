/**
 * Row Validator (Fail-Closed)
 *
 * Checks handler output at the executor boundary. Every row must carry
 * exactly the declared columns with scalar values; one bad row rejects the
 * whole URL.
 */

import { SchemaViolation } from '../errors.js'
import type { Row, Scalar } from '../types.js'

function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === 'string' ||
    (typeof value === 'number' && Number.isFinite(value)) ||
    typeof value === 'boolean'
  )
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Validate handler output for one URL.
 *
 * @returns The rows, rebuilt with keys in column order
 * @throws SchemaViolation
 */
export function validateRows(url: string, columns: readonly string[], output: unknown): Row[] {
  if (!Array.isArray(output)) {
    throw new SchemaViolation(url, `Handler must return a list of rows, got ${describeValue(output)}`)
  }

  const declared = new Set(columns)

  return output.map((candidate: unknown, rowIndex) => {
    if (!isPlainObject(candidate)) {
      throw new SchemaViolation(url, `Row ${rowIndex} is not an object, got ${describeValue(candidate)}`)
    }

    const keys = Object.keys(candidate)
    const missing = columns.filter(column => !Object.prototype.hasOwnProperty.call(candidate, column))
    const unexpected = keys.filter(key => !declared.has(key))
    if (missing.length > 0 || unexpected.length > 0) {
      throw SchemaViolation.forRow(url, rowIndex, missing, unexpected)
    }

    const row: Row = {}
    for (const column of columns) {
      const value = candidate[column]
      if (!isScalar(value)) {
        throw new SchemaViolation(
          url,
          `Row ${rowIndex} column '${column}' must be a string, finite number, boolean or null, got ${describeValue(value)}`
        )
      }
      row[column] = value
    }
    return row
  })
}

function describeValue(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (typeof value === 'number' && !Number.isFinite(value)) return String(value)
  return typeof value
}
