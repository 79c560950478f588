/**
 * SQL Text Extractor
 *
 * Decomposes generated INSERT/UPDATE statements into table, operation and
 * column → value map. SELECT and DELETE are not decomposed; they run as
 * generated once the guard accepts them.
 */

import type { ColumnValueMap, ExtractedStatement, Operation } from '../types.js';
import { ParseError } from '../utils/errors.js';
import { indexOfTopLevel, parseLiteral, splitTopLevel } from './valueParser.js';

const IDENTIFIER = '[`"\\[]?[A-Za-z_][\\w.]*[`"\\]]?';
const INSERT_PATTERN = new RegExp(`^INSERT\\s+INTO\\s+(${IDENTIFIER})\\s*\\(`, 'i');
const UPDATE_PATTERN = new RegExp(`^UPDATE\\s+(${IDENTIFIER})\\s+SET\\s+`, 'i');
const VALUES_PATTERN = /^\s*VALUES\s*\(/i;
const TABLE_PATTERN = new RegExp(`\\b(?:FROM|INTO|UPDATE)\\s+(${IDENTIFIER})`, 'i');

/**
 * Strips quoting and any schema prefix from an identifier.
 */
export function cleanIdentifier(raw: string): string {
  const unquoted = raw.trim().replace(/^[`"[]|[`"\]]$/g, '');
  const segments = unquoted.split('.');
  return segments[segments.length - 1].replace(/^[`"[]|[`"\]]$/g, '');
}

function normalizeStatement(sql: string): string {
  return sql.trim().replace(/;+\s*$/, '').trim();
}

/**
 * Index of the parenthesis closing the one at `openIndex`, respecting quotes.
 */
function findClosingParen(text: string, openIndex: number): number {
  let quote: string | null = null;
  let depth = 0;

  for (let i = openIndex; i < text.length; i++) {
    const char = text[i];
    if (quote) {
      if (char === '\\') i++;
      else if (char === quote) {
        if (text[i + 1] === quote) i++;
        else quote = null;
      }
      continue;
    }
    if (char === "'" || char === '"') quote = char;
    else if (char === '(') depth++;
    else if (char === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Position of `keyword` as a whole word outside quotes and parentheses.
 */
export function findTopLevelKeyword(text: string, keyword: string): number {
  const upper = keyword.toUpperCase();
  let quote: string | null = null;
  let depth = 0;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (quote) {
      if (char === '\\') i++;
      else if (char === quote) {
        if (text[i + 1] === quote) i++;
        else quote = null;
      }
      continue;
    }
    if (char === "'" || char === '"') {
      quote = char;
      continue;
    }
    if (char === '(') depth++;
    else if (char === ')') depth = Math.max(0, depth - 1);
    else if (
      depth === 0 &&
      text.slice(i, i + upper.length).toUpperCase() === upper &&
      !/\w/.test(text[i - 1] ?? '') &&
      !/\w/.test(text[i + upper.length] ?? '')
    ) {
      return i;
    }
  }
  return -1;
}

export function detectOperation(sql: string): Operation | 'unknown' {
  const body = sql
    .replace(/^(\s*--[^\n]*\n)+/, '')
    .replace(/^[\s(]+/, '')
    .toUpperCase();

  if (body.startsWith('SELECT') || body.startsWith('WITH')) return 'select';
  if (body.startsWith('INSERT')) return 'insert';
  if (body.startsWith('UPDATE')) return 'update';
  if (body.startsWith('DELETE')) return 'delete';
  return 'unknown';
}

export function extractTable(sql: string): string | null {
  const match = sql.match(TABLE_PATTERN);
  return match ? cleanIdentifier(match[1]) : null;
}

/**
 * Predicate after the top-level WHERE, without trailing semicolon or
 * RETURNING clause. Null when the statement has no WHERE.
 */
export function extractWhereClause(sql: string): string | null {
  const statement = normalizeStatement(sql);
  const whereIndex = findTopLevelKeyword(statement, 'WHERE');
  if (whereIndex === -1) return null;

  let clause = statement.slice(whereIndex + 'WHERE'.length);
  const returningIndex = findTopLevelKeyword(clause, 'RETURNING');
  if (returningIndex !== -1) {
    clause = clause.slice(0, returningIndex);
  }
  clause = clause.trim();
  return clause.length > 0 ? clause : null;
}

function extractInsert(statement: string, match: RegExpMatchArray): ExtractedStatement {
  const table = cleanIdentifier(match[1]);
  const columnsOpen = match[0].length - 1;
  const columnsClose = findClosingParen(statement, columnsOpen);
  if (columnsClose === -1) {
    throw new ParseError(`Unbalanced column list in INSERT for ${table}`);
  }

  const afterColumns = statement.slice(columnsClose + 1);
  const valuesMatch = afterColumns.match(VALUES_PATTERN);
  if (!valuesMatch) {
    throw new ParseError(`INSERT for ${table} has no VALUES list`);
  }

  const valuesOpen = columnsClose + 1 + valuesMatch[0].length - 1;
  const valuesClose = findClosingParen(statement, valuesOpen);
  if (valuesClose === -1) {
    throw new ParseError(`Unbalanced VALUES list in INSERT for ${table}`);
  }

  const columns = splitTopLevel(statement.slice(columnsOpen + 1, columnsClose)).map(cleanIdentifier);
  const values = splitTopLevel(statement.slice(valuesOpen + 1, valuesClose));
  if (columns.length !== values.length) {
    throw new ParseError(
      `INSERT for ${table} lists ${columns.length} column(s) but ${values.length} value(s)`
    );
  }

  const columnValueMap: ColumnValueMap = {};
  columns.forEach((column, index) => {
    if (column.toLowerCase() === 'id') return; // auto-increment key
    columnValueMap[column] = parseLiteral(values[index]);
  });

  return { table, operation: 'insert', columnValueMap };
}

function extractUpdate(statement: string, match: RegExpMatchArray): ExtractedStatement {
  const table = cleanIdentifier(match[1]);
  const rest = statement.slice(match[0].length);
  const whereIndex = findTopLevelKeyword(rest, 'WHERE');
  const setClause = whereIndex === -1 ? rest : rest.slice(0, whereIndex);

  const columnValueMap: ColumnValueMap = {};
  for (const assignment of splitTopLevel(setClause)) {
    const eq = indexOfTopLevel(assignment, '=');
    if (eq === -1) {
      throw new ParseError(`Malformed assignment in UPDATE for ${table}: ${assignment}`);
    }
    const column = cleanIdentifier(assignment.slice(0, eq));
    if (column.toLowerCase() === 'id') continue;
    columnValueMap[column] = parseLiteral(assignment.slice(eq + 1));
  }

  if (Object.keys(columnValueMap).length === 0) {
    throw new ParseError(`UPDATE for ${table} assigns no columns`);
  }

  return {
    table,
    operation: 'update',
    columnValueMap,
    whereClause: extractWhereClause(statement) ?? undefined,
  };
}

/**
 * Recognizes `INSERT INTO t (cols) VALUES (vals)` and
 * `UPDATE t SET a = 1, b = 'x' [WHERE ...]`.
 *
 * @returns null when the text has neither shape (SELECT, DELETE, prose)
 * @throws ParseError when the shape is recognized but malformed
 */
export function extractStatement(sqlText: string): ExtractedStatement | null {
  const statement = normalizeStatement(sqlText);

  const insertMatch = statement.match(INSERT_PATTERN);
  if (insertMatch) {
    return extractInsert(statement, insertMatch);
  }

  const updateMatch = statement.match(UPDATE_PATTERN);
  if (updateMatch) {
    return extractUpdate(statement, updateMatch);
  }

  return null;
}
