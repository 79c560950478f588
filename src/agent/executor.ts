import type { DatabaseClient, QueryResult } from '../types.js';
import { ExecutionError, UnsafeMutationError, isAgentError } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { validateSQL } from './guard.js';

export interface ExecutorOptions {
  timeoutMs: number;
  maxRows: number;
}

/**
 * Runs statements through the guard and the database client.
 * Driver failures and timeouts always come back as ExecutionError.
 */
export class SqlExecutor {
  constructor(
    private readonly db: DatabaseClient,
    private readonly options: ExecutorOptions
  ) {}

  /**
   * Guarded form of `sql` as it will be sent to the database.
   *
   * @throws UnsafeMutationError for UPDATE/DELETE without WHERE
   * @throws ExecutionError for anything else the guard rejects
   */
  prepare(sql: string): string {
    const validation = validateSQL(sql, { maxRows: this.options.maxRows });
    if (!validation.valid || !validation.sanitizedSQL) {
      if (validation.unsafeMutation) {
        throw new UnsafeMutationError(validation.unsafeMutation);
      }
      throw new ExecutionError(`SQL validation failed: ${validation.reason ?? 'unknown reason'}`);
    }
    return validation.sanitizedSQL;
  }

  async execute(sql: string): Promise<QueryResult> {
    const statement = this.prepare(sql);
    try {
      return await withTimeout(
        this.db.run(statement),
        this.options.timeoutMs,
        () => new ExecutionError(`Statement timed out after ${this.options.timeoutMs}ms`)
      );
    } catch (error) {
      if (isAgentError(error)) {
        throw error;
      }
      throw new ExecutionError(
        `SQL execution failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}
