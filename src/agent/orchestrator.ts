import type {
  ChatMessage,
  ColumnValueMap,
  ConversationState,
  Operation,
  PendingRequest,
  QueryResult,
  RunLogger,
  RunResponse,
  ThreadStore,
} from '../types.js';
import type { SchemaRegistry } from '../tools/schema.js';
import type { ConversationContextStore } from '../tools/contextStore.js';
import { createConversationState } from '../tools/threadStore.js';
import {
  ParseError,
  SynthesisError,
  UnsafeMutationError,
  ValidationError,
  describeError,
  isAgentError,
} from '../utils/errors.js';
import { classifyIntent } from './intent.js';
import { UNGENERATED } from './sqlWriter.js';
import type { QuerySynthesizer } from './sqlWriter.js';
import { detectOperation, extractStatement, extractTable, extractWhereClause } from './sqlExtractor.js';
import { canonicalizeColumns, formatFieldError, validateAssignments, validateRecord } from './schemaValidator.js';
import { finalizeSQL, formatLiteral } from './finalizer.js';
import type { SqlExecutor } from './executor.js';
import { assertNotDuplicate } from './duplicateCheck.js';

// ============================================================================
// State Machine Types
// ============================================================================

export type Step =
  | 'ANALYZE_INTENT'
  | 'PARSE_VALIDATE'
  | 'ASK_MISSING_FIELD'
  | 'UPDATE_CONTEXT'
  | 'DIRECT_EXECUTE'
  | 'GENERATE_AND_EXECUTE'
  | 'GENERATE_SUMMARY';

type Outcome = 'executed' | 'waiting' | 'failed' | 'cancelled' | 'idle';

/**
 * Everything one message carries through the steps. Handlers never mutate
 * a turn; they return a new one.
 */
interface Turn {
  readonly threadId: string;
  readonly message: string;
  readonly pending: PendingRequest | null;
  readonly generatedSQL: string | null;
  readonly record: Readonly<ColumnValueMap> | null;
  readonly executionResult: QueryResult | null;
  readonly finalQuery: string | null;
  readonly validationErrors: readonly string[];
  readonly missingField: string | null;
  readonly prompt: string | null;
  readonly errorMessage: string | null;
  readonly outcome: Outcome | null;
  readonly summary: string;
}

interface StepResult {
  turn: Turn;
  next: Step | null;
}

type StepHandler = (turn: Turn) => Promise<StepResult>;

export interface OrchestratorOptions {
  duplicateCheck: boolean;
  historyCap: number;
  shortReplyMaxWords: number;
}

export interface OrchestratorDeps {
  registry: SchemaRegistry;
  synthesizer: QuerySynthesizer;
  executor: SqlExecutor;
  threadStore: ThreadStore;
  contextStore: ConversationContextStore;
  runLogger?: RunLogger;
}

const MAX_STEPS = 16;

function rowsAffected(result: QueryResult): number {
  return result.kind === 'rows' ? result.rowCount : result.rowsAffected;
}

function describeValues(values: Readonly<ColumnValueMap>): string {
  return Object.entries(values)
    .filter(([, value]) => value !== null)
    .map(([column, value]) => `${column}=${formatLiteral(value)}`)
    .join(', ');
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * Conversation state machine. One instance serves every thread; each
 * thread's messages are processed strictly one after another.
 */
export class Orchestrator {
  private readonly queues = new Map<string, Promise<void>>();
  private readonly handlers: Record<Step, StepHandler>;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions
  ) {
    this.handlers = {
      ANALYZE_INTENT: turn => this.analyzeIntent(turn),
      PARSE_VALIDATE: turn => this.parseValidate(turn),
      ASK_MISSING_FIELD: turn => this.askMissingField(turn),
      UPDATE_CONTEXT: turn => this.updateContext(turn),
      DIRECT_EXECUTE: turn => this.directExecute(turn),
      GENERATE_AND_EXECUTE: turn => this.generateAndExecute(turn),
      GENERATE_SUMMARY: async turn => this.generateSummary(turn),
    };
  }

  /**
   * Handles one user message on `threadId`. Messages on the same thread
   * queue behind each other; other threads are not blocked.
   */
  run(threadId: string, message: string): Promise<RunResponse> {
    const previous = this.queues.get(threadId) ?? Promise.resolve();
    const current = previous.then(() => this.process(threadId, message));

    // The queue only orders work; callers see failures through `current`.
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(threadId, tail);
    void tail.then(() => {
      if (this.queues.get(threadId) === tail) {
        this.queues.delete(threadId);
      }
    });

    return current;
  }

  private async process(threadId: string, message: string): Promise<RunResponse> {
    let state: ConversationState;
    try {
      state = (await this.deps.threadStore.get(threadId)) ?? createConversationState(threadId);
    } catch (error) {
      console.error(`❌ Could not load thread ${threadId}: ${describeError(error)}`);
      return {
        executionResult: null,
        summary: `Error: Could not load the conversation: ${describeError(error)}`,
      };
    }
    const text = message.trim();

    let turn: Turn = {
      threadId,
      message: text,
      pending: state.pending,
      generatedSQL: null,
      record: null,
      executionResult: null,
      finalQuery: null,
      validationErrors: [],
      missingField: null,
      prompt: null,
      errorMessage: null,
      outcome: null,
      summary: '',
    };

    if (!text) {
      turn = { ...turn, outcome: 'idle' };
      turn = this.generateSummary(turn).turn;
    } else {
      turn = await this.runSteps(turn);
    }

    let summary = turn.summary;
    try {
      await this.deps.threadStore.put(threadId, this.nextState(state, turn));
    } catch (error) {
      console.error(`❌ Could not save thread ${threadId}: ${describeError(error)}`);
      summary += `\nWarning: this conversation could not be saved (${describeError(error)}).`;
    }

    const response: RunResponse = {
      executionResult: turn.executionResult,
      summary,
    };
    if (turn.finalQuery) response.finalQuery = turn.finalQuery;
    if (turn.validationErrors.length > 0) response.validationErrors = [...turn.validationErrors];
    if (turn.missingField) response.missingField = turn.missingField;
    if (turn.prompt) response.prompt = turn.prompt;
    return response;
  }

  private async runSteps(initial: Turn): Promise<Turn> {
    let turn = initial;
    let step: Step | null = 'ANALYZE_INTENT';
    let count = 0;

    while (step) {
      if (++count > MAX_STEPS) {
        console.error(`❌ Step limit reached on thread ${turn.threadId}`);
        return this.generateSummary(this.fail(turn, new Error('The request could not be completed'))).turn;
      }

      try {
        const result: StepResult = await this.handlers[step](turn);
        turn = result.turn;
        step = result.next;
      } catch (error) {
        turn = this.fail(turn, error);
        step = step === 'GENERATE_SUMMARY' ? null : 'GENERATE_SUMMARY';
      }
    }

    return turn;
  }

  private fail(turn: Turn, error: unknown): Turn {
    if (!isAgentError(error)) {
      console.error(`❌ Unexpected error on thread ${turn.threadId}:`, error);
    }
    const fieldErrors = error instanceof ValidationError ? error.fieldErrors : [];
    return {
      ...turn,
      pending: null,
      validationErrors: fieldErrors,
      missingField: null,
      prompt: null,
      errorMessage: describeError(error),
      outcome: 'failed',
      summary: describeError(error),
    };
  }

  private nextState(state: ConversationState, turn: Turn): ConversationState {
    const now = new Date().toISOString();
    const messages: ChatMessage[] = [
      ...state.messages,
      ...(turn.message ? [{ role: 'user' as const, content: turn.message, timestamp: now }] : []),
      { role: 'assistant', content: turn.summary, timestamp: now },
    ];

    return {
      threadId: state.threadId,
      messages: messages.slice(-this.options.historyCap),
      pending: turn.pending,
      executionResult: turn.executionResult,
      finalQuery: turn.finalQuery,
      summary: turn.summary,
      validationErrors: [...turn.validationErrors],
      operationCount: state.operationCount + (turn.outcome === 'executed' ? 1 : 0),
    };
  }

  // ==========================================================================
  // Steps
  // ==========================================================================

  private async analyzeIntent(turn: Turn): Promise<StepResult> {
    const tableTerms = [...this.deps.registry.tableNames(), ...this.deps.registry.aliasMap().keys()];
    const intent = classifyIntent(turn.message, turn.pending, {
      shortReplyMaxWords: this.options.shortReplyMaxWords,
      tableTerms,
    });

    switch (intent.kind) {
      case 'abandon':
        console.log(`🛑 Pending request abandoned on thread ${turn.threadId}`);
        return { turn: { ...turn, pending: null, outcome: 'cancelled' }, next: 'GENERATE_SUMMARY' };

      case 'reply':
        console.log(`💬 Reply for '${intent.field}'`);
        return { turn, next: 'UPDATE_CONTEXT' };

      case 'stray_reply':
        return { turn: { ...turn, outcome: 'idle' }, next: 'GENERATE_SUMMARY' };

      case 'new_request':
        break;
    }

    console.log('🔧 Generating SQL...');
    const sql = await this.deps.synthesizer.synthesize(turn.message);
    if (sql === UNGENERATED) {
      throw new SynthesisError('Could not generate a SQL statement for that request. Try rephrasing it.');
    }
    console.log(`   📄 SQL: ${sql}`);

    const operation = detectOperation(sql);
    const fresh: Turn = { ...turn, pending: null, generatedSQL: sql };

    switch (operation) {
      case 'insert':
      case 'update':
        return { turn: fresh, next: 'PARSE_VALIDATE' };
      case 'select':
      case 'delete':
        return { turn: fresh, next: 'DIRECT_EXECUTE' };
      case 'unknown':
        throw new ParseError(`Could not recognize the generated statement: ${sql}`);
    }
  }

  private async parseValidate(turn: Turn): Promise<StepResult> {
    const pending = turn.pending ?? this.pendingFromGenerated(turn.generatedSQL);
    const schema = this.deps.registry.getSchema(pending.table);

    let partialValues: ColumnValueMap = { ...pending.partialValues };
    const validate = () =>
      pending.operation === 'update'
        ? validateAssignments(partialValues, schema)
        : validateRecord(partialValues, schema);

    let outcome = validate();
    let surfaced = outcome.errors;

    // A rejected reply is cleared so the same field is asked again.
    const asked = pending.awaitingField;
    if (asked && outcome.errors.some(error => error.field === asked)) {
      surfaced = outcome.errors.filter(error => error.field === asked);
      partialValues = { ...partialValues, [asked]: null };
      outcome = validate();
    }

    const validationErrors = surfaced.map(formatFieldError);

    if (outcome.missingFields.length > 0) {
      return {
        turn: {
          ...turn,
          generatedSQL: null,
          validationErrors,
          pending: {
            ...pending,
            partialValues,
            missingFields: outcome.missingFields,
          },
        },
        next: 'ASK_MISSING_FIELD',
      };
    }

    if (outcome.errors.length > 0 || !outcome.validatedRecord) {
      const fieldErrors = outcome.errors.map(formatFieldError);
      throw new ValidationError(`Invalid values for ${pending.table}: ${fieldErrors.join('; ')}`, fieldErrors);
    }

    return {
      turn: {
        ...turn,
        generatedSQL: null,
        validationErrors: [],
        pending: { ...pending, partialValues, missingFields: [] },
        record: outcome.validatedRecord,
      },
      next: 'GENERATE_AND_EXECUTE',
    };
  }

  private pendingFromGenerated(sql: string | null): PendingRequest {
    if (!sql) {
      throw new ParseError('There is no request to validate');
    }
    const statement = extractStatement(sql);
    if (!statement) {
      throw new ParseError(`Could not extract values from the generated statement: ${sql}`);
    }
    if (statement.operation === 'update' && !statement.whereClause) {
      throw new UnsafeMutationError('update');
    }

    const schema = this.deps.registry.getSchema(statement.table);
    const pending: PendingRequest = {
      table: schema.name,
      operation: statement.operation,
      partialValues: canonicalizeColumns(statement.columnValueMap, schema),
      missingFields: [],
      rawGeneratedQuery: sql,
      ...(statement.whereClause ? { whereClause: statement.whereClause } : {}),
    };
    return pending;
  }

  private async askMissingField(turn: Turn): Promise<StepResult> {
    const pending = turn.pending;
    if (!pending || pending.missingFields.length === 0) {
      throw new ParseError('There is no missing field to ask for');
    }

    const field = pending.missingFields[0];
    const description = this.deps.registry.describeField(pending.table, field);
    const suggestions = Array.from(
      new Set([
        ...this.deps.registry.fieldSuggestions(pending.table, field),
        ...this.deps.contextStore.knownValues(field),
      ])
    ).slice(0, 5);

    let prompt = `Please provide a value for '${field}': ${description}`;
    if (suggestions.length > 0) {
      prompt += ` (suggestions: ${suggestions.join(', ')})`;
    }

    return {
      turn: {
        ...turn,
        pending: { ...pending, awaitingField: field },
        missingField: field,
        prompt,
        outcome: 'waiting',
      },
      next: 'GENERATE_SUMMARY',
    };
  }

  private async updateContext(turn: Turn): Promise<StepResult> {
    const pending = turn.pending;
    if (!pending) {
      throw new ParseError('There is no pending request to update');
    }

    const field = pending.awaitingField ?? pending.missingFields[0];
    // Replies stay text; the validator coerces them to the field type.
    const value = /^null$/i.test(turn.message) ? null : turn.message;

    return {
      turn: {
        ...turn,
        pending: {
          ...pending,
          partialValues: { ...pending.partialValues, [field]: value },
          awaitingField: field,
        },
      },
      next: 'PARSE_VALIDATE',
    };
  }

  private async directExecute(turn: Turn): Promise<StepResult> {
    const sql = turn.generatedSQL;
    if (!sql) {
      throw new ParseError('There is no statement to execute');
    }

    const operation = detectOperation(sql);
    let statement: string;
    let table: string | null = null;

    if (operation === 'delete') {
      const named = extractTable(sql);
      if (!named) {
        throw new ParseError(`Could not find the table in: ${sql}`);
      }
      table = this.deps.registry.resolveTable(named);
      statement = finalizeSQL({}, table, 'delete', extractWhereClause(sql) ?? undefined);
    } else {
      const named = extractTable(sql);
      table = named && this.deps.registry.hasTable(named) ? this.deps.registry.resolveTable(named) : named;
      statement = this.deps.executor.prepare(sql);
    }

    console.log('   Executing query...');
    const result = await this.deps.executor.execute(statement);
    console.log(`   ✓ Query executed: ${rowsAffected(result)} rows in ${result.durationMs}ms`);

    const executedOperation: Operation = operation === 'delete' ? 'delete' : 'select';
    await this.recordExecution(turn, executedOperation, table, {}, statement, result);

    return {
      turn: {
        ...turn,
        generatedSQL: null,
        pending: null,
        executionResult: result,
        finalQuery: statement,
        outcome: 'executed',
      },
      next: 'GENERATE_SUMMARY',
    };
  }

  private async generateAndExecute(turn: Turn): Promise<StepResult> {
    const pending = turn.pending;
    const record = turn.record;
    if (!pending || !record) {
      throw new ParseError('There is no complete record to execute');
    }

    const schema = this.deps.registry.getSchema(pending.table);
    if (pending.operation === 'insert' && this.options.duplicateCheck) {
      await assertNotDuplicate(this.deps.executor, record, schema);
    }

    const statement = finalizeSQL(record, schema.name, pending.operation, pending.whereClause);
    console.log(`   📄 Final SQL: ${statement}`);

    const result = await this.deps.executor.execute(statement);
    console.log(`   ✓ ${pending.operation.toUpperCase()} executed: ${rowsAffected(result)} rows in ${result.durationMs}ms`);

    await this.recordExecution(turn, pending.operation, schema.name, record, statement, result);

    return {
      turn: {
        ...turn,
        pending: null,
        executionResult: result,
        finalQuery: statement,
        outcome: 'executed',
      },
      next: 'GENERATE_SUMMARY',
    };
  }

  private async recordExecution(
    turn: Turn,
    operation: Operation,
    table: string | null,
    values: Readonly<ColumnValueMap>,
    sql: string,
    result: QueryResult
  ): Promise<void> {
    if (table) {
      this.deps.contextStore.recordExecution(operation, table, { ...values }, sql);
    }

    if (!this.deps.runLogger) return;
    try {
      await this.deps.runLogger.saveRunLog({
        threadId: turn.threadId,
        operation,
        table,
        sql,
        rowsAffected: rowsAffected(result),
        durationMs: result.durationMs,
      });
    } catch (error) {
      // The statement already ran; a lost log line must not fail the turn.
      console.warn(`⚠️  Failed to save run log: ${describeError(error)}`);
    }
  }

  private generateSummary(turn: Turn): StepResult {
    return { turn: { ...turn, summary: this.summarize(turn) }, next: null };
  }

  private summarize(turn: Turn): string {
    switch (turn.outcome) {
      case 'failed':
        return `Error: ${turn.errorMessage ?? 'unknown error'}`;

      case 'cancelled':
        return 'Cancelled the pending request. What would you like to do next?';

      case 'idle':
        return turn.message
          ? 'There is no pending request waiting for a value. Try a full request such as "Show all employees".'
          : 'Please enter a request.';

      case 'waiting': {
        const pending = turn.pending;
        const lines: string[] = [];
        if (turn.validationErrors.length > 0) {
          lines.push(`Invalid value: ${turn.validationErrors.join('; ')}`);
        }
        if (pending) {
          const known = describeValues(pending.partialValues);
          lines.push(
            `Still waiting for '${turn.missingField ?? pending.missingFields[0]}' to complete the ${pending.operation} on ${pending.table}` +
              (known ? ` (so far: ${known}).` : '.')
          );
        }
        if (turn.prompt) {
          lines.push(turn.prompt);
        }
        return lines.join('\n');
      }

      case 'executed': {
        const result = turn.executionResult;
        if (!result) return 'Done.';
        const headline =
          result.kind === 'rows'
            ? `Query returned ${result.rowCount} row${result.rowCount === 1 ? '' : 's'}.`
            : `${result.command} completed: ${result.rowsAffected} row${result.rowsAffected === 1 ? '' : 's'} affected.`;
        const hints = this.deps.contextStore.suggestions(turn.message);
        return hints.length > 0 ? `${headline}\nYou could also: ${hints.join('; ')}` : headline;
      }

      case null:
        return 'Nothing to report.';
    }
  }
}
