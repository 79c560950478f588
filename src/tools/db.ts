import type pg from 'pg';
import type { DatabaseClient, IntrospectedColumn, QueryResult } from '../types.js';

export interface PgDatabaseOptions {
  statementTimeoutMs: number;
}

interface ColumnRow {
  table_name: string;
  column_name: string;
  data_type: string;
  is_nullable: string;
  column_default: string | null;
  character_maximum_length: number | null;
  is_primary_key: boolean;
}

const INTROSPECTION_QUERY = `
  SELECT
    c.table_name,
    c.column_name,
    c.data_type,
    c.is_nullable,
    c.column_default,
    c.character_maximum_length,
    EXISTS (
      SELECT 1
      FROM information_schema.table_constraints tc
      JOIN information_schema.key_column_usage kcu
        ON tc.constraint_name = kcu.constraint_name
        AND tc.table_schema = kcu.table_schema
      WHERE tc.constraint_type = 'PRIMARY KEY'
        AND tc.table_schema = c.table_schema
        AND tc.table_name = c.table_name
        AND kcu.column_name = c.column_name
    ) AS is_primary_key
  FROM information_schema.tables t
  JOIN information_schema.columns c ON t.table_name = c.table_name
    AND t.table_schema = c.table_schema
  WHERE t.table_schema = 'public'
    AND t.table_type = 'BASE TABLE'
  ORDER BY c.table_name, c.ordinal_position;
`;

/**
 * PostgreSQL implementation of the database seam. Pure execution: the
 * guard and error mapping live in SqlExecutor.
 */
export class PgDatabase implements DatabaseClient {
  constructor(
    private readonly pool: pg.Pool,
    private readonly options: PgDatabaseOptions
  ) {}

  async run(sql: string): Promise<QueryResult> {
    const client = await this.pool.connect();
    const startTime = Date.now();

    try {
      await client.query(`SET statement_timeout = ${Math.max(0, Math.floor(this.options.statementTimeoutMs))}`);

      const result = await client.query<unknown[]>({ text: sql, rowMode: 'array' });
      const durationMs = Date.now() - startTime;

      if (result.command === 'SELECT') {
        return {
          kind: 'rows',
          columns: result.fields.map(f => f.name),
          rows: result.rows,
          rowCount: result.rows.length,
          durationMs,
        };
      }

      return {
        kind: 'ack',
        command: result.command,
        rowsAffected: result.rowCount ?? 0,
        durationMs,
      };
    } finally {
      client.release();
    }
  }

  /**
   * Columns of every base table in the public schema, in declaration order.
   */
  async introspectSchema(): Promise<IntrospectedColumn[]> {
    const result = await this.pool.query<ColumnRow>(INTROSPECTION_QUERY);

    return result.rows.map(row => ({
      tableName: row.table_name,
      columnName: row.column_name,
      dataType: row.data_type,
      isNullable: row.is_nullable === 'YES',
      columnDefault: row.column_default ?? undefined,
      maxLength: row.character_maximum_length ?? undefined,
      isPrimaryKey: row.is_primary_key,
    }));
  }
}
