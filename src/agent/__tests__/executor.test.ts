import { describe, it, expect, vi } from 'vitest';
import { SqlExecutor } from '../executor.js';
import { assertNotDuplicate, buildDuplicateQuery } from '../duplicateCheck.js';
import { DuplicateRecordError, ExecutionError, UnsafeMutationError } from '../../utils/errors.js';
import type { DatabaseClient, QueryResult } from '../../types.js';
import { InMemoryDatabase, loadTestRegistry } from './helpers.js';

describe('SqlExecutor', () => {
  it('runs the guarded statement', async () => {
    const db = new InMemoryDatabase();
    const executor = new SqlExecutor(db, { timeoutMs: 1000, maxRows: 50 });

    const result = await executor.execute('SELECT * FROM employee');

    expect(db.executed).toEqual(['SELECT * FROM employee LIMIT 50;']);
    expect(result).toEqual({ kind: 'rows', columns: [], rows: [], rowCount: 0, durationMs: 1 });
  });

  it('returns an acknowledgement for data changes', async () => {
    const executor = new SqlExecutor(new InMemoryDatabase(), { timeoutMs: 1000, maxRows: 50 });
    const result = await executor.execute("INSERT INTO employee (name) VALUES ('Ann')");
    expect(result).toEqual({ kind: 'ack', command: 'INSERT', rowsAffected: 1, durationMs: 1 });
  });

  it('raises UnsafeMutationError before touching the database', async () => {
    const db = new InMemoryDatabase();
    const executor = new SqlExecutor(db, { timeoutMs: 1000, maxRows: 50 });

    await expect(executor.execute('DELETE FROM employee')).rejects.toThrow(UnsafeMutationError);
    expect(db.executed).toEqual([]);
  });

  it('reports guard rejections as ExecutionError', async () => {
    const executor = new SqlExecutor(new InMemoryDatabase(), { timeoutMs: 1000, maxRows: 50 });
    await expect(executor.execute('DROP TABLE employee')).rejects.toThrow(
      'SQL validation failed: Dangerous keyword detected: DROP'
    );
  });

  it('wraps driver failures in ExecutionError', async () => {
    const db = new InMemoryDatabase();
    db.failWith = new Error('relation "employe" does not exist');
    const executor = new SqlExecutor(db, { timeoutMs: 1000, maxRows: 50 });

    const error = await executor.execute('SELECT * FROM employe').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExecutionError);
    expect(error).toHaveProperty('message', 'SQL execution failed: relation "employe" does not exist');
  });

  it('maps a hung statement to ExecutionError after the timeout', async () => {
    vi.useFakeTimers();
    try {
      const hanging: DatabaseClient = {
        run: () => new Promise<QueryResult>(() => undefined),
        introspectSchema: async () => [],
      };
      const executor = new SqlExecutor(hanging, { timeoutMs: 500, maxRows: 50 });

      const pending = executor.execute('SELECT 1');
      const assertion = expect(pending).rejects.toThrow('Statement timed out after 500ms');
      await vi.advanceTimersByTimeAsync(500);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });

  it('exposes the guarded form of a statement', () => {
    const executor = new SqlExecutor(new InMemoryDatabase(), { timeoutMs: 1000, maxRows: 10 });
    expect(executor.prepare('SELECT name FROM project;')).toBe('SELECT name FROM project LIMIT 10;');
  });
});

describe('duplicate check', () => {
  const schema = loadTestRegistry().getSchema('employee');

  it('builds a count query on the natural key', () => {
    expect(buildDuplicateQuery({ name: "O'Neil", salary: 1 }, schema)).toBe(
      "SELECT COUNT(*) AS count FROM employee WHERE name = 'O''Neil'"
    );
    expect(buildDuplicateQuery({ salary: 1 }, schema)).toBeNull();
  });

  it('passes when no row shares the natural key', async () => {
    const executor = new SqlExecutor(new InMemoryDatabase(), { timeoutMs: 1000, maxRows: 50 });
    await expect(assertNotDuplicate(executor, { name: 'Sarah' }, schema)).resolves.toBeUndefined();
  });

  it('rejects an insert whose natural key already exists', async () => {
    const db = new InMemoryDatabase();
    db.tables.set('employee', [{ name: 'Sarah', department: 'HR', salary: 1 }]);
    const executor = new SqlExecutor(db, { timeoutMs: 1000, maxRows: 50 });

    const error = await assertNotDuplicate(executor, { name: 'Sarah' }, schema).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DuplicateRecordError);
    expect(error).toHaveProperty(
      'message',
      "A employee with name 'Sarah' already exists. Please verify this is not a duplicate."
    );
    expect(db.executed).toEqual(["SELECT COUNT(*) AS count FROM employee WHERE name = 'Sarah' LIMIT 50;"]);
  });
});
