/**
 * Error taxonomy for the conversation pipeline.
 * Every error raised inside a step is caught at the step boundary and
 * turned into a summary; none of these reach the caller of `run()`.
 */

export type AgentErrorCode =
  | 'UNKNOWN_TABLE'
  | 'PARSE_ERROR'
  | 'VALIDATION_ERROR'
  | 'DUPLICATE_RECORD'
  | 'UNSAFE_MUTATION'
  | 'SYNTHESIS_ERROR'
  | 'EXECUTION_ERROR';

export abstract class AgentError extends Error {
  abstract readonly code: AgentErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownTableError extends AgentError {
  readonly code = 'UNKNOWN_TABLE';

  constructor(readonly table: string, knownTables: string[] = []) {
    super(
      knownTables.length > 0
        ? `Unknown table "${table}". Available tables: ${knownTables.join(', ')}`
        : `Unknown table "${table}"`
    );
  }
}

export class ParseError extends AgentError {
  readonly code = 'PARSE_ERROR';
}

export class ValidationError extends AgentError {
  readonly code: 'VALIDATION_ERROR' | 'DUPLICATE_RECORD' = 'VALIDATION_ERROR';

  constructor(message: string, readonly fieldErrors: string[] = [message]) {
    super(message);
  }
}

export class DuplicateRecordError extends ValidationError {
  override readonly code = 'DUPLICATE_RECORD';
}

export class UnsafeMutationError extends AgentError {
  readonly code = 'UNSAFE_MUTATION';

  constructor(operation: string) {
    super(`WHERE clause required for safe ${operation.toUpperCase()} operation`);
  }
}

export class SynthesisError extends AgentError {
  readonly code = 'SYNTHESIS_ERROR';
}

export class ExecutionError extends AgentError {
  readonly code = 'EXECUTION_ERROR';
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

/**
 * User-facing message for any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
