import type { QueryResult } from '../types.js';

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value);
}

/**
 * Plain-text table of a result, truncated to `maxRows` printed rows.
 */
export function formatResult(result: QueryResult, maxRows = 20): string {
  if (result.kind === 'ack') {
    return `${result.command}: ${result.rowsAffected} row(s) affected (${result.durationMs}ms)`;
  }
  if (result.rows.length === 0) {
    return `(no rows, ${result.durationMs}ms)`;
  }

  const shown = result.rows.slice(0, maxRows).map(row => row.map(formatCell));
  const widths = result.columns.map((column, i) =>
    Math.max(column.length, ...shown.map(row => (row[i] ?? '').length))
  );
  const line = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i])).join(' | ');

  const out = [line(result.columns), widths.map(w => '-'.repeat(w)).join('-+-'), ...shown.map(line)];
  if (result.rows.length > maxRows) {
    out.push(`... ${result.rows.length - maxRows} more row(s)`);
  }
  out.push(`(${result.rowCount} row(s), ${result.durationMs}ms)`);
  return out.join('\n');
}
