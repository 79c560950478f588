import type { Operation } from '../types.js';
import { detectOperation, findTopLevelKeyword } from './sqlExtractor.js';
import { splitTopLevel } from './valueParser.js';

/**
 * Result of SQL validation, including sanitized query if valid.
 */
export interface ValidationResult {
  /** Whether the SQL passed all safety checks */
  valid: boolean;
  /** Reason for validation failure (only present if valid is false) */
  reason?: string;
  /** Set when the failure is an UPDATE/DELETE without a predicate */
  unsafeMutation?: 'update' | 'delete';
  /** Statement kind (only present if valid is true) */
  operation?: Operation;
  /** Sanitized SQL with auto-added LIMIT and semicolon (only present if valid is true) */
  sanitizedSQL?: string;
}

export interface GuardOptions {
  maxRows: number;
}

const DANGEROUS_KEYWORDS = [
  'DROP', 'CREATE', 'ALTER', 'TRUNCATE', 'GRANT', 'REVOKE', 'EXEC', 'EXECUTE', 'CALL',
];

/**
 * Blanks out string literals so keyword checks never match quoted data
 * such as a department called 'Drop Shipping'.
 */
function stripLiterals(sql: string): string {
  return sql.replace(/'(?:[^']|'')*'/g, "''");
}

/**
 * Validates SQL statements for safety before execution.
 *
 * Safety checks performed:
 * - Only SELECT (or WITH ... SELECT), INSERT, UPDATE and DELETE statements
 * - Rejects DDL and privilege keywords (DROP, ALTER, GRANT, etc.)
 * - Rejects UPDATE/DELETE without a WHERE clause
 * - Rejects INSERT/UPDATE/DELETE nested in a SELECT or WITH query
 * - Blocks queries with "undefined" table names (common LLM error)
 * - Prevents multiple statement execution
 * - Auto-appends LIMIT to SELECT statements without one
 * - Ensures statement ends with semicolon
 *
 * @example
 * ```typescript
 * const result = validateSQL('SELECT name FROM employee');
 * if (result.valid) {
 *   console.log(result.sanitizedSQL); // "SELECT name FROM employee LIMIT 200;"
 * } else {
 *   console.error(result.reason);
 * }
 * ```
 */
export function validateSQL(sql: string, options: GuardOptions = { maxRows: 200 }): ValidationResult {
  const trimmed = sql.trim();

  if (!trimmed) {
    return { valid: false, reason: 'Empty SQL statement' };
  }

  const withoutLiterals = stripLiterals(trimmed);

  for (const keyword of DANGEROUS_KEYWORDS) {
    const regex = new RegExp(`\\b${keyword}\\b`, 'i');
    if (regex.test(withoutLiterals)) {
      return { valid: false, reason: `Dangerous keyword detected: ${keyword}` };
    }
  }

  const statements = splitTopLevel(trimmed, ';').filter(s => s.trim().length > 0);
  if (statements.length > 1) {
    return { valid: false, reason: 'Multiple statements are not allowed' };
  }

  const operation = detectOperation(trimmed);
  if (operation === 'unknown') {
    return { valid: false, reason: 'Only SELECT, INSERT, UPDATE or DELETE statements are allowed' };
  }

  // WITH x AS (DELETE ...) SELECT ... would skip the WHERE requirement below.
  if (operation === 'select' && /\b(?:INSERT|UPDATE|DELETE|MERGE)\b/i.test(withoutLiterals)) {
    return { valid: false, reason: 'Data-modifying statements are not allowed inside a query' };
  }

  if (/\b(?:FROM|JOIN|INTO|UPDATE)\s+["']?undefined["']?/i.test(trimmed)) {
    return {
      valid: false,
      reason: 'SQL contains "undefined" as table name - the table was not identified. Please check the schema and try again.',
    };
  }

  let sanitized = trimmed.replace(/;+\s*$/, '').trim();

  if ((operation === 'update' || operation === 'delete') && findTopLevelKeyword(sanitized, 'WHERE') === -1) {
    return {
      valid: false,
      reason: `WHERE clause required for safe ${operation.toUpperCase()} operation`,
      unsafeMutation: operation,
    };
  }

  if (operation === 'select' && !/\bLIMIT\s+\d+/i.test(withoutLiterals)) {
    sanitized = `${sanitized} LIMIT ${options.maxRows}`;
  }

  return { valid: true, operation, sanitizedSQL: `${sanitized};` };
}
