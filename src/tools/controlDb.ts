import type pg from 'pg';
import { z } from 'zod';
import type { ConversationState, RunLogEntry, RunLogger, ThreadStore } from '../types.js';

// ============================================================================
// CONTROL DATABASE - conversation states and run logs
// ============================================================================

/**
 * The slice of a pg pool the control database needs.
 */
export interface SqlRunner {
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
}

export function poolRunner(pool: pg.Pool): SqlRunner {
  return {
    async query(text, values) {
      const result = await pool.query<Record<string, unknown>>(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
  };
}

const TypedValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const QueryResultSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('rows'),
    columns: z.array(z.string()),
    rows: z.array(z.array(z.unknown())),
    rowCount: z.number(),
    durationMs: z.number(),
  }),
  z.object({
    kind: z.literal('ack'),
    command: z.string(),
    rowsAffected: z.number(),
    durationMs: z.number(),
  }),
]);

const PendingRequestSchema = z.object({
  table: z.string(),
  operation: z.enum(['insert', 'update']),
  partialValues: z.record(TypedValueSchema),
  missingFields: z.array(z.string()),
  rawGeneratedQuery: z.string(),
  whereClause: z.string().optional(),
  awaitingField: z.string().optional(),
});

export const ConversationStateSchema = z.object({
  threadId: z.string(),
  messages: z.array(
    z.object({
      role: z.enum(['user', 'assistant']),
      content: z.string(),
      timestamp: z.string(),
    })
  ),
  pending: PendingRequestSchema.nullable(),
  executionResult: QueryResultSchema.nullable(),
  finalQuery: z.string().nullable(),
  summary: z.string(),
  validationErrors: z.array(z.string()),
  operationCount: z.number(),
});

export interface RunLog extends RunLogEntry {
  id: number;
  createdAt: Date;
}

const RunLogRowSchema = z.object({
  id: z.coerce.number(),
  thread_id: z.string(),
  operation: z.enum(['select', 'insert', 'update', 'delete']),
  table_name: z.string().nullable(),
  sql_executed: z.string(),
  rows_affected: z.coerce.number(),
  duration_ms: z.coerce.number(),
  created_at: z.coerce.date(),
});

export class ControlDb implements RunLogger {
  constructor(private readonly db: SqlRunner) {}

  /**
   * Creates the control tables if they do not exist. Idempotent.
   */
  async initialize(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS conversation_states (
        thread_id TEXT PRIMARY KEY,
        state JSONB NOT NULL,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS run_logs (
        id SERIAL PRIMARY KEY,
        thread_id TEXT NOT NULL,
        operation TEXT NOT NULL,
        table_name TEXT,
        sql_executed TEXT NOT NULL,
        rows_affected INTEGER DEFAULT 0,
        duration_ms INTEGER DEFAULT 0,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);
    console.log('✓ Control database tables ready');
  }

  async saveRunLog(entry: RunLogEntry): Promise<void> {
    await this.db.query(
      `INSERT INTO run_logs (thread_id, operation, table_name, sql_executed, rows_affected, duration_ms)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [entry.threadId, entry.operation, entry.table, entry.sql, entry.rowsAffected, entry.durationMs]
    );
  }

  /**
   * Retrieve recent run logs, newest first.
   */
  async getRecentRunLogs(limit = 20): Promise<RunLog[]> {
    const result = await this.db.query(
      `SELECT id, thread_id, operation, table_name, sql_executed, rows_affected, duration_ms, created_at
       FROM run_logs
       ORDER BY created_at DESC, id DESC
       LIMIT $1`,
      [limit]
    );

    return result.rows.map(raw => {
      const row = RunLogRowSchema.parse(raw);
      return {
        id: row.id,
        threadId: row.thread_id,
        operation: row.operation,
        table: row.table_name,
        sql: row.sql_executed,
        rowsAffected: row.rows_affected,
        durationMs: row.duration_ms,
        createdAt: row.created_at,
      };
    });
  }

  async loadState(threadId: string): Promise<ConversationState | null> {
    const result = await this.db.query('SELECT state FROM conversation_states WHERE thread_id = $1', [threadId]);
    if (result.rows.length === 0) {
      return null;
    }

    const raw = result.rows[0].state;
    const parsed = ConversationStateSchema.safeParse(typeof raw === 'string' ? JSON.parse(raw) : raw);
    if (!parsed.success) {
      console.warn(`⚠️  Discarding unreadable conversation state for thread ${threadId}`);
      return null;
    }
    return parsed.data;
  }

  async saveState(threadId: string, state: ConversationState): Promise<void> {
    await this.db.query(
      `INSERT INTO conversation_states (thread_id, state, updated_at)
       VALUES ($1, $2, CURRENT_TIMESTAMP)
       ON CONFLICT (thread_id) DO UPDATE SET state = EXCLUDED.state, updated_at = CURRENT_TIMESTAMP`,
      [threadId, JSON.stringify(state)]
    );
  }
}

/**
 * Durable thread store backed by the control database.
 */
export class PgThreadStore implements ThreadStore {
  constructor(private readonly control: ControlDb) {}

  get(threadId: string): Promise<ConversationState | null> {
    return this.control.loadState(threadId);
  }

  put(threadId: string, state: ConversationState): Promise<void> {
    return this.control.saveState(threadId, state);
  }
}
