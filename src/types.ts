// ============================================================================
// Schema Types
// ============================================================================

export type FieldType = 'string' | 'number' | 'date' | 'boolean';

export interface FieldSchema {
  name: string;
  type: FieldType;
  required: boolean;
  format?: string;      // Regex source; dates default to YYYY-MM-DD
  maxLength?: number;
  minimum?: number;
  description?: string;
  prompt?: string;      // Question shown when the field is missing
  suggestions?: string[];
}

export interface TableSchema {
  name: string;
  primaryKey: string;
  naturalKey?: string;
  aliases: string[];
  /** Declaration order is the order missing fields are asked for. */
  fields: Map<string, FieldSchema>;
}

/**
 * Column row as returned by database introspection.
 */
export interface IntrospectedColumn {
  tableName: string;
  columnName: string;
  dataType: string;
  isNullable: boolean;
  columnDefault?: string;
  maxLength?: number;
  isPrimaryKey: boolean;
}

// ============================================================================
// Statement Types
// ============================================================================

export type Operation = 'select' | 'insert' | 'update' | 'delete';

export type TypedValue = string | number | boolean | null;

export type ColumnValueMap = Record<string, TypedValue>;

export interface ExtractedStatement {
  table: string;
  operation: 'insert' | 'update';
  columnValueMap: ColumnValueMap;
  whereClause?: string;
}

export interface ValidationOutcome {
  missingFields: string[];
  validatedRecord: ColumnValueMap | null;
  errors: FieldError[];
}

export interface FieldError {
  field: string;
  message: string;
}

// ============================================================================
// Execution Types
// ============================================================================

export interface RowsResult {
  kind: 'rows';
  columns: string[];
  rows: unknown[][];
  rowCount: number;
  durationMs: number;
}

export interface AckResult {
  kind: 'ack';
  command: string;
  rowsAffected: number;
  durationMs: number;
}

export type QueryResult = RowsResult | AckResult;

// ============================================================================
// Conversation Types
// ============================================================================

/**
 * In-progress insert/update awaiting field completion.
 * Treated as a value: transitions produce a new object.
 */
export interface PendingRequest {
  readonly table: string;
  readonly operation: 'insert' | 'update';
  readonly partialValues: Readonly<ColumnValueMap>;
  readonly missingFields: readonly string[];
  readonly rawGeneratedQuery: string;
  readonly whereClause?: string;
  readonly awaitingField?: string;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
  timestamp: string;
}

export interface ConversationState {
  threadId: string;
  messages: ChatMessage[];
  pending: PendingRequest | null;
  executionResult: QueryResult | null;
  finalQuery: string | null;
  summary: string;
  validationErrors: string[];
  operationCount: number;
}

export interface RunResponse {
  executionResult: QueryResult | null;
  summary: string;
  finalQuery?: string;
  validationErrors?: string[];
  missingField?: string;
  prompt?: string;
}

export interface OperationRecord {
  operation: Operation;
  table: string;
  values: ColumnValueMap;
  sql: string;
  timestamp: string;
}

export interface RecentQuery {
  prompt: string;
  sql: string;
  timestamp: string;
}

export interface ContextSnapshot {
  lastOperation: Operation | null;
  lastTable: string | null;
  lastValues: ColumnValueMap;
  tableUsage: Record<string, number>;
  recentQueries: RecentQuery[];
  operationHistory: OperationRecord[];
  userPatterns: {
    frequentOperations: Record<string, number>;
    preferredDepartments: Record<string, number>;
    salaryRange: { min: number; max: number } | null;
  };
}

// ============================================================================
// Collaborator Contracts
// ============================================================================

/**
 * Text-generation service: single-shot request/response.
 */
export interface TextGenerator {
  generate(prompt: string, schemaContext: string): Promise<string>;
}

/**
 * Relational database driver seam.
 */
export interface DatabaseClient {
  run(sql: string): Promise<QueryResult>;
  introspectSchema(): Promise<IntrospectedColumn[]>;
}

export interface RunLogEntry {
  threadId: string;
  operation: Operation;
  table: string | null;
  sql: string;
  rowsAffected: number;
  durationMs: number;
}

export interface RunLogger {
  saveRunLog(entry: RunLogEntry): Promise<void>;
}

export interface ThreadStore {
  get(threadId: string): Promise<ConversationState | null>;
  put(threadId: string, state: ConversationState): Promise<void>;
}

// ============================================================================
// Configuration
// ============================================================================

export interface Config {
  geminiApiKey: string;
  geminiModel: string;
  databaseUrl: string;
  controlDbUrl?: string;
  fieldConfigPath: string;
  statementTimeoutMs: number;
  llmTimeoutMs: number;
  maxRows: number;
  historyCap: number;
  recentQueriesCap: number;
  shortReplyMaxWords: number;
  duplicateCheck: boolean;
  retry: {
    maxRetries: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
  };
}
