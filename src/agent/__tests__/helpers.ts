import { fileURLToPath } from 'url';
import type { DatabaseClient, IntrospectedColumn, QueryResult, TextGenerator, TypedValue } from '../../types.js';
import { SchemaRegistry } from '../../tools/schema.js';
import { detectOperation, extractStatement, extractTable, extractWhereClause } from '../sqlExtractor.js';
import { parseLiteral } from '../valueParser.js';

export const FIELD_CONFIG_PATH = fileURLToPath(new URL('../../../config/field_config.json', import.meta.url));

export function loadTestRegistry(): SchemaRegistry {
  return SchemaRegistry.fromFile(FIELD_CONFIG_PATH);
}

/**
 * Text generator that answers from a fixed list of replies, in order.
 */
export class ScriptedGenerator implements TextGenerator {
  readonly prompts: string[] = [];
  private readonly replies: Array<string | Error>;

  constructor(replies: Array<string | Error>) {
    this.replies = [...replies];
  }

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('No scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

type Row = Record<string, TypedValue>;

function compare(actual: TypedValue | undefined, op: string, expected: TypedValue): boolean {
  if (op === '=') return actual === expected;
  if (typeof actual !== 'number' || typeof expected !== 'number') return false;
  return op === '>' ? actual > expected : actual < expected;
}

function matches(row: Row, predicate: string | null): boolean {
  if (!predicate || predicate === '1=1') return true;
  return predicate.split(/\s+AND\s+/i).every(condition => {
    const match = condition.trim().match(/^(\w+)\s*(=|>|<)\s*(.+)$/);
    return match ? compare(row[match[1]], match[2], parseLiteral(match[3])) : false;
  });
}

/**
 * In-process table store understanding the statements the agent emits:
 * INSERT … VALUES, UPDATE/DELETE/SELECT with `col = literal [AND …]`
 * predicates, and `SELECT COUNT(*)`.
 */
export class InMemoryDatabase implements DatabaseClient {
  readonly executed: string[] = [];
  readonly tables = new Map<string, Row[]>();
  failWith: Error | null = null;

  constructor(private readonly columns: IntrospectedColumn[] = []) {}

  async introspectSchema(): Promise<IntrospectedColumn[]> {
    return this.columns;
  }

  async run(sql: string): Promise<QueryResult> {
    this.executed.push(sql);
    if (this.failWith) {
      throw this.failWith;
    }

    const statement = sql.trim().replace(/;+\s*$/, '').replace(/\s+LIMIT\s+\d+$/i, '');
    const table = extractTable(statement) ?? '';
    const rows = this.tables.get(table) ?? [];
    const predicate = extractWhereClause(statement);

    switch (detectOperation(statement)) {
      case 'insert': {
        const extracted = extractStatement(statement);
        rows.push({ ...(extracted?.columnValueMap ?? {}) });
        this.tables.set(table, rows);
        return { kind: 'ack', command: 'INSERT', rowsAffected: 1, durationMs: 1 };
      }

      case 'update': {
        const extracted = extractStatement(statement);
        const hit = rows.filter(row => matches(row, predicate));
        hit.forEach(row => Object.assign(row, extracted?.columnValueMap ?? {}));
        return { kind: 'ack', command: 'UPDATE', rowsAffected: hit.length, durationMs: 1 };
      }

      case 'delete': {
        const kept = rows.filter(row => !matches(row, predicate));
        this.tables.set(table, kept);
        return { kind: 'ack', command: 'DELETE', rowsAffected: rows.length - kept.length, durationMs: 1 };
      }

      case 'select': {
        const hit = rows.filter(row => matches(row, predicate));
        if (/COUNT\(\*\)/i.test(statement)) {
          return { kind: 'rows', columns: ['count'], rows: [[hit.length]], rowCount: 1, durationMs: 1 };
        }
        const columns = Array.from(new Set(hit.flatMap(row => Object.keys(row))));
        return {
          kind: 'rows',
          columns,
          rows: hit.map(row => columns.map(column => row[column] ?? null)),
          rowCount: hit.length,
          durationMs: 1,
        };
      }

      case 'unknown':
        throw new Error(`syntax error at or near "${statement.split(/\s+/)[0]}"`);
    }
  }
}
