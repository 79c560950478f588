import type {
  ColumnValueMap,
  ContextSnapshot,
  Operation,
  OperationRecord,
  RecentQuery,
} from '../types.js';
import { RingBuffer } from '../utils/ringBuffer.js';
import { formatLiteral } from '../agent/finalizer.js';

export interface ContextStoreOptions {
  recentQueriesCap: number;
  historyCap?: number;
  /** Distinct values remembered per field; the least used is forgotten first. */
  knownValuesCap?: number;
}

function increment(counter: Map<string, number>, key: string): void {
  counter.set(key, (counter.get(key) ?? 0) + 1);
}

/**
 * Counts a value, dropping the least frequent entry (oldest on ties) when
 * a new value would push the counter past its cap.
 */
function incrementCapped(counter: Map<string, number>, key: string, cap: number): void {
  if (!counter.has(key) && counter.size >= cap) {
    let evict: string | undefined;
    let lowest = Infinity;
    for (const [candidate, count] of counter) {
      if (count < lowest) {
        evict = candidate;
        lowest = count;
      }
    }
    if (evict !== undefined) {
      counter.delete(evict);
    }
  }
  increment(counter, key);
}

function byCountDesc(counter: Map<string, number>): string[] {
  return Array.from(counter.entries())
    .sort((a, b) => b[1] - a[1])
    .map(([key]) => key);
}

/**
 * Process-wide conversation memory shared by all threads.
 *
 * Every mutation is a synchronous method, so two threads handled on the
 * same event loop can never interleave inside an update. Keep it that way:
 * no awaits inside the record* methods.
 */
export class ConversationContextStore {
  private lastOperation: Operation | null = null;
  private lastTable: string | null = null;
  private lastValues: ColumnValueMap = {};
  private readonly tableUsage = new Map<string, number>();
  private readonly operationCounts = new Map<string, number>();
  private readonly departmentCounts = new Map<string, number>();
  private salaryRange: { min: number; max: number } | null = null;
  private readonly recentQueries: RingBuffer<RecentQuery>;
  private readonly history: RingBuffer<OperationRecord>;
  private readonly fieldValues = new Map<string, Map<string, number>>();
  private readonly knownValuesCap: number;

  constructor(options: ContextStoreOptions) {
    this.recentQueries = new RingBuffer(options.recentQueriesCap);
    this.history = new RingBuffer(options.historyCap ?? 50);
    this.knownValuesCap = Math.max(1, options.knownValuesCap ?? 50);
  }

  recordQuery(prompt: string, sql: string): void {
    this.recentQueries.push({ prompt, sql, timestamp: new Date().toISOString() });
  }

  /**
   * Called after every successfully executed statement.
   */
  recordExecution(operation: Operation, table: string, values: ColumnValueMap, sql: string): void {
    this.lastOperation = operation;
    this.lastTable = table;
    this.lastValues = { ...values };
    increment(this.tableUsage, table);
    increment(this.operationCounts, operation);
    this.history.push({
      operation,
      table,
      values: { ...values },
      sql,
      timestamp: new Date().toISOString(),
    });

    for (const [field, value] of Object.entries(values)) {
      if (typeof value === 'string' && value.trim()) {
        const counter = this.fieldValues.get(field) ?? new Map<string, number>();
        incrementCapped(counter, value, this.knownValuesCap);
        this.fieldValues.set(field, counter);
      }
    }

    const department = values.department;
    if (typeof department === 'string' && department.trim()) {
      increment(this.departmentCounts, department);
    }

    const salary = values.salary;
    if (typeof salary === 'number') {
      this.salaryRange = this.salaryRange
        ? { min: Math.min(this.salaryRange.min, salary), max: Math.max(this.salaryRange.max, salary) }
        : { min: salary, max: salary };
    }
  }

  /** Values seen for a field, most frequent first. */
  knownValues(field: string): string[] {
    const counter = this.fieldValues.get(field);
    return counter ? byCountDesc(counter) : [];
  }

  snapshot(): ContextSnapshot {
    return {
      lastOperation: this.lastOperation,
      lastTable: this.lastTable,
      lastValues: { ...this.lastValues },
      tableUsage: Object.fromEntries(this.tableUsage),
      recentQueries: this.recentQueries.toArray(),
      operationHistory: this.history.toArray(),
      userPatterns: {
        frequentOperations: Object.fromEntries(this.operationCounts),
        preferredDepartments: Object.fromEntries(this.departmentCounts),
        salaryRange: this.salaryRange ? { ...this.salaryRange } : null,
      },
    };
  }

  /**
   * Context block for the text generator; empty when nothing has happened yet.
   */
  formatForPrompt(): string {
    const lines: string[] = [];

    if (this.lastOperation && this.lastTable) {
      lines.push(`- Last operation: ${this.lastOperation} on ${this.lastTable}`);
      const values = Object.entries(this.lastValues)
        .map(([column, value]) => `${column}=${formatLiteral(value)}`)
        .join(', ');
      if (values) {
        lines.push(`- Last values: ${values}`);
      }
    }

    if (this.tableUsage.size > 0) {
      const usage = byCountDesc(this.tableUsage)
        .map(table => `${table} (${this.tableUsage.get(table)})`)
        .join(', ');
      lines.push(`- Most used tables: ${usage}`);
    }

    const departments = byCountDesc(this.departmentCounts).slice(0, 3);
    if (departments.length > 0) {
      lines.push(`- Preferred departments: ${departments.join(', ')}`);
    }

    if (this.salaryRange) {
      lines.push(`- Salary range seen: ${this.salaryRange.min} - ${this.salaryRange.max}`);
    }

    const recent = this.recentQueries.latest(3);
    if (recent.length > 0) {
      lines.push('- Recent queries:');
      for (const query of recent) {
        lines.push(`  - "${query.prompt}" -> ${query.sql}`);
      }
    }

    if (lines.length === 0) {
      return '';
    }

    return [
      'Conversation context:',
      ...lines,
      'Use this context to resolve references such as "that record" or "the same department".',
    ].join('\n');
  }

  /**
   * Follow-up hints based on what the user just did.
   */
  suggestions(message = ''): string[] {
    const hints: string[] = [];
    const table = this.lastTable;

    if (this.lastOperation === 'insert' && table) {
      hints.push(`View the ${table} record you added`);
      hints.push(`Add another ${table} record`);
    } else if (this.lastOperation === 'select' && table) {
      hints.push(`Add a similar ${table} record`);
      hints.push(`Update existing ${table} data`);
    } else if (this.lastOperation === 'update' && table) {
      hints.push(`Show the updated ${table} records`);
    }

    const department = this.lastValues.department;
    if (/\b(another|same|similar)\b/i.test(message) && typeof department === 'string') {
      hints.push(`Use department '${department}' again`);
    }

    return hints;
  }
}
