import type { TextGenerator } from '../types.js';
import type { SchemaRegistry } from '../tools/schema.js';
import type { ConversationContextStore } from '../tools/contextStore.js';
import { SynthesisError, isAgentError } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { indexOfTopLevel } from './valueParser.js';

/** Returned when the generator's reply contains no SQL statement. */
export const UNGENERATED = '-- UNGENERATED --';

const LINE_START_KEYWORD = /^[ \t]*(SELECT|INSERT|UPDATE|DELETE|WITH)\b/im;
// Mid-sentence keywords only count in upper case; prose says "with" and "select".
const ANY_KEYWORD = /\b(SELECT|INSERT|UPDATE|DELETE|WITH)\b/;
const TABLE_POSITION = /\b(FROM|INTO|UPDATE|JOIN)(\s+)([A-Za-z_][A-Za-z0-9_]*)/gi;
const STRING_LITERAL = /('(?:[^']|'')*')/;

export interface SynthesizerOptions {
  timeoutMs: number;
}

function stripCodeFences(text: string): string {
  const fenced = text.match(/```[a-zA-Z]*[ \t]*\n?([\s\S]*?)```/);
  if (fenced) {
    return fenced[1];
  }
  return text.replace(/```[a-zA-Z]*/g, '');
}

/**
 * Replaces alias table names after FROM/INTO/UPDATE/JOIN. String literals
 * are left untouched.
 */
function rewriteAliases(sql: string, aliases: ReadonlyMap<string, string>): string {
  // Odd indexes of the split are the literals themselves.
  return sql
    .split(STRING_LITERAL)
    .map((part, index) =>
      index % 2 === 1
        ? part
        : part.replace(TABLE_POSITION, (whole: string, keyword: string, gap: string, name: string) => {
            const canonical = aliases.get(name.toLowerCase());
            return canonical ? `${keyword}${gap}${canonical}` : whole;
          })
    )
    .join('');
}

/**
 * Reduces a generator reply to a single SQL statement.
 *
 * Code fences and leading prose are dropped, anything after the first
 * top-level semicolon is discarded, and configured table aliases are
 * rewritten to their canonical names. Returns {@link UNGENERATED} when no
 * statement keyword is found.
 */
export function cleanGeneratedSQL(raw: string, aliases: ReadonlyMap<string, string> = new Map()): string {
  const body = stripCodeFences(raw.trim());

  const match = LINE_START_KEYWORD.exec(body) ?? ANY_KEYWORD.exec(body);
  if (!match) {
    return UNGENERATED;
  }
  const keywordIndex = match.index + match[0].length - match[1].length;

  let sql = body.slice(keywordIndex).trim();
  const end = indexOfTopLevel(sql, ';');
  if (end !== -1) {
    sql = sql.slice(0, end + 1);
  }

  if (aliases.size > 0) {
    sql = rewriteAliases(sql, aliases);
  }

  return sql.trim();
}

/**
 * Query Synthesizer: natural language → candidate SQL through the text
 * generator.
 */
export class QuerySynthesizer {
  constructor(
    private readonly generator: TextGenerator,
    private readonly registry: SchemaRegistry,
    private readonly context: ConversationContextStore,
    private readonly options: SynthesizerOptions
  ) {}

  /**
   * @throws SynthesisError when the generator fails or times out
   */
  async synthesize(naturalLanguagePrompt: string, schemaContext = this.registry.formatForPrompt()): Promise<string> {
    const prompt = this.buildPrompt(naturalLanguagePrompt);

    let reply: string;
    try {
      reply = await withTimeout(
        this.generator.generate(prompt, schemaContext),
        this.options.timeoutMs,
        () => new SynthesisError(`Text generation timed out after ${this.options.timeoutMs}ms`)
      );
    } catch (error) {
      if (isAgentError(error)) {
        throw error;
      }
      throw new SynthesisError(
        `Failed to generate SQL: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const sql = cleanGeneratedSQL(reply, this.registry.aliasMap());
    this.context.recordQuery(naturalLanguagePrompt, sql);
    return sql;
  }

  buildPrompt(request: string): string {
    const tableNames = this.registry.tableNames();
    const aliasLines = Array.from(this.registry.aliasMap())
      .map(([alias, table]) => `"${alias}" → ${table}`)
      .join(', ');
    const contextText = this.context.formatForPrompt();
    const today = new Date().toISOString().slice(0, 10);

    return `You are a SQL generation assistant for a PostgreSQL database. Translate the user's request into exactly one SQL statement.

Available table names: ${tableNames.join(', ')}
${aliasLines ? `Table aliases: ${aliasLines}\n` : ''}Current date: ${today}

${contextText ? `${contextText}\n\n` : ''}User Request: ${request}

RULES:
1. ONLY use table names from the "Available table names" list, spelled exactly as listed
2. ONLY use column names that exist in the schema
3. For additions write INSERT INTO <table> (<columns>) VALUES (<values>)
4. Include every REQUIRED column in an INSERT; use NULL for any value the user did not give
5. Never invent values the user did not mention
6. Never include the primary key column in an INSERT
7. UPDATE and DELETE statements must have a WHERE clause identifying the rows
8. Quote strings with single quotes and double any embedded single quote
9. Write dates as 'YYYY-MM-DD'
10. Do NOT include a LIMIT clause in SELECT statements (it will be added automatically)

Respond with ONLY the SQL statement, nothing else. No explanations, no markdown formatting, just the raw SQL.`;
  }
}
