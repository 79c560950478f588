import type { ColumnValueMap, Operation, TypedValue } from '../types.js';
import { UnsafeMutationError, ValidationError } from '../utils/errors.js';

const SAFE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function assertIdentifier(name: string, kind: 'table' | 'column'): void {
  if (!SAFE_IDENTIFIER.test(name)) {
    throw new ValidationError(`Invalid ${kind} name: ${JSON.stringify(name)}`);
  }
}

/**
 * SQL literal for a typed value. Strings are single-quoted with internal
 * quotes doubled; null becomes NULL.
 */
export function formatLiteral(value: TypedValue): string {
  if (value === null) return 'NULL';
  if (typeof value === 'string') return `'${value.replace(/'/g, "''")}'`;
  return String(value);
}

function normalizePredicate(whereClause: string | undefined): string {
  return (whereClause ?? '').trim().replace(/;+\s*$/, '').trim();
}

/**
 * Assembles the final statement for a validated record.
 *
 * @throws UnsafeMutationError for UPDATE/DELETE without a predicate
 * @throws ValidationError for unsafe identifiers or an empty record
 *
 * @example
 * ```typescript
 * finalizeSQL({ name: "O'Brien", salary: 50000 }, 'employee', 'insert');
 * // INSERT INTO employee (name, salary) VALUES ('O''Brien', 50000);
 * ```
 */
export function finalizeSQL(
  record: Readonly<ColumnValueMap>,
  table: string,
  operation: Operation,
  whereClause?: string
): string {
  assertIdentifier(table, 'table');
  const predicate = normalizePredicate(whereClause);
  const columns = Object.keys(record);
  columns.forEach(column => assertIdentifier(column, 'column'));

  switch (operation) {
    case 'insert': {
      if (columns.length === 0) {
        throw new ValidationError(`No values to insert into ${table}`);
      }
      const values = columns.map(column => formatLiteral(record[column]));
      return `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${values.join(', ')});`;
    }

    case 'update': {
      if (!predicate) {
        throw new UnsafeMutationError('update');
      }
      if (columns.length === 0) {
        throw new ValidationError(`No columns to update on ${table}`);
      }
      const assignments = columns.map(column => `${column} = ${formatLiteral(record[column])}`);
      return `UPDATE ${table} SET ${assignments.join(', ')} WHERE ${predicate};`;
    }

    case 'delete': {
      if (!predicate) {
        throw new UnsafeMutationError('delete');
      }
      return `DELETE FROM ${table} WHERE ${predicate};`;
    }

    case 'select':
      return `SELECT * FROM ${table} WHERE ${predicate || '1=1'};`;
  }
}
