import type { ColumnValueMap, TableSchema } from '../types.js';
import { DuplicateRecordError } from '../utils/errors.js';
import type { SqlExecutor } from './executor.js';
import { formatLiteral } from './finalizer.js';

/**
 * Count query used to look for an existing row with the same natural key,
 * or null when the table has no natural key or the record lacks a value.
 */
export function buildDuplicateQuery(record: Readonly<ColumnValueMap>, schema: TableSchema): string | null {
  const key = schema.naturalKey;
  if (!key) return null;
  const value = record[key];
  if (value === undefined || value === null) return null;
  return `SELECT COUNT(*) AS count FROM ${schema.name} WHERE ${key} = ${formatLiteral(value)}`;
}

/**
 * Pre-insert check: rejects the insert when a row with the same natural
 * key already exists.
 *
 * @throws DuplicateRecordError
 */
export async function assertNotDuplicate(
  executor: SqlExecutor,
  record: Readonly<ColumnValueMap>,
  schema: TableSchema
): Promise<void> {
  const query = buildDuplicateQuery(record, schema);
  if (!query) return;

  const result = await executor.execute(query);
  if (result.kind !== 'rows' || result.rows.length === 0) return;

  const count = Number(result.rows[0][0]);
  if (count > 0 && schema.naturalKey) {
    const value = String(record[schema.naturalKey]);
    throw new DuplicateRecordError(
      `A ${schema.name} with ${schema.naturalKey} '${value}' already exists. Please verify this is not a duplicate.`
    );
  }
}
