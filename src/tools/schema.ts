import { readFileSync, existsSync } from 'fs';
import { z } from 'zod';
import type { FieldSchema, FieldType, IntrospectedColumn, TableSchema } from '../types.js';
import { UnknownTableError } from '../utils/errors.js';

// ----------------------------------------------------------------------------
// Field configuration file
// ----------------------------------------------------------------------------

const FieldConfigSchema = z.object({
  type: z.enum(['string', 'number', 'date', 'boolean']),
  required: z.boolean().default(false),
  format: z.string().refine(isValidRegex, { message: 'format must be a valid regular expression' }).optional(),
  maxLength: z.number().int().positive().optional(),
  minimum: z.number().optional(),
  description: z.string().optional(),
  prompt: z.string().optional(),
  suggestions: z.array(z.string()).optional(),
});

const TableConfigSchema = z.object({
  primaryKey: z.string().default('id'),
  naturalKey: z.string().optional(),
  aliases: z.array(z.string()).default([]),
  fields: z.record(FieldConfigSchema),
});

export const FieldConfigFileSchema = z.object({
  tables: z.record(TableConfigSchema),
});

export type FieldConfigFile = z.infer<typeof FieldConfigFileSchema>;

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

// ----------------------------------------------------------------------------
// Registry
// ----------------------------------------------------------------------------

/**
 * Authoritative table/field definitions. Read-only once constructed, so it
 * can be shared between conversation threads.
 */
export class SchemaRegistry {
  private readonly tables = new Map<string, TableSchema>();
  private readonly aliases = new Map<string, string>();

  constructor(tables: TableSchema[]) {
    for (const table of tables) {
      const key = table.name.toLowerCase();
      this.tables.set(key, table);
      for (const alias of table.aliases) {
        this.aliases.set(alias.toLowerCase(), key);
      }
    }
  }

  /**
   * Builds a registry from parsed field configuration JSON.
   * @throws Error naming the first invalid path
   */
  static fromConfig(data: unknown): SchemaRegistry {
    const parsed = FieldConfigFileSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const path = issue ? issue.path.join('.') : '';
      throw new Error(`Invalid field configuration at "${path}": ${issue?.message ?? 'unknown error'}`);
    }

    const tables: TableSchema[] = Object.entries(parsed.data.tables).map(([name, table]) => {
      const fields = new Map<string, FieldSchema>();
      for (const [fieldName, field] of Object.entries(table.fields)) {
        fields.set(fieldName, { name: fieldName, ...field });
      }
      return {
        name,
        primaryKey: table.primaryKey,
        naturalKey: table.naturalKey ?? (fields.has('name') ? 'name' : undefined),
        aliases: table.aliases,
        fields,
      };
    });

    return new SchemaRegistry(tables);
  }

  static fromFile(path: string): SchemaRegistry {
    if (!existsSync(path)) {
      throw new Error(`Field configuration file not found: ${path}`);
    }
    let data: unknown;
    try {
      data = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new Error(`Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return SchemaRegistry.fromConfig(data);
  }

  /**
   * Builds a registry from database columns. NOT NULL columns without a
   * default (other than the primary key) become required fields.
   */
  static fromIntrospection(columns: IntrospectedColumn[]): SchemaRegistry {
    const byTable = new Map<string, IntrospectedColumn[]>();
    for (const column of columns) {
      const list = byTable.get(column.tableName) ?? [];
      list.push(column);
      byTable.set(column.tableName, list);
    }

    const tables: TableSchema[] = [];
    for (const [tableName, tableColumns] of byTable) {
      const primaryKey = tableColumns.find(c => c.isPrimaryKey)?.columnName ?? 'id';
      const fields = new Map<string, FieldSchema>();

      for (const column of tableColumns) {
        if (column.columnName === primaryKey) continue;
        const type = mapSqlType(column.dataType);
        fields.set(column.columnName, {
          name: column.columnName,
          type,
          required: !column.isNullable && column.columnDefault === undefined,
          format: type === 'date' && /time/i.test(column.dataType) ? TIMESTAMP_FORMAT : undefined,
          maxLength: column.maxLength,
        });
      }

      tables.push({
        name: tableName,
        primaryKey,
        naturalKey: fields.has('name') ? 'name' : undefined,
        aliases: defaultAliases(tableName),
        fields,
      });
    }

    return new SchemaRegistry(tables);
  }

  tableNames(): string[] {
    return Array.from(this.tables.values(), t => t.name);
  }

  hasTable(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /**
   * Canonical table name for an exact name, configured alias or simple
   * plural/singular form.
   */
  resolveTable(name: string): string {
    return this.getSchema(name).name;
  }

  getSchema(table: string): TableSchema {
    const schema = this.lookup(table);
    if (!schema) {
      throw new UnknownTableError(table, this.tableNames());
    }
    return schema;
  }

  /** Required field names in declaration order. */
  requiredFields(table: string): string[] {
    const schema = this.getSchema(table);
    return Array.from(schema.fields.values())
      .filter(field => field.required)
      .map(field => field.name);
  }

  describeField(table: string, field: string): string {
    const schema = this.lookup(table);
    const fieldSchema = schema?.fields.get(field);
    return fieldSchema?.prompt ?? fieldSchema?.description ?? `Value for ${field}`;
  }

  fieldSuggestions(table: string, field: string): string[] {
    return this.lookup(table)?.fields.get(field)?.suggestions ?? [];
  }

  /** alias → canonical table name */
  aliasMap(): Map<string, string> {
    const result = new Map<string, string>();
    for (const [alias, key] of this.aliases) {
      const table = this.tables.get(key);
      if (table) result.set(alias, table.name);
    }
    return result;
  }

  /**
   * Schema text for the text generator.
   *
   * @example
   * ```
   * Table: employee (primary key: id)
   * Columns:
   *   - name: string REQUIRED max 100 -- Employee full name
   * ```
   */
  formatForPrompt(tableName?: string): string {
    const tables = tableName
      ? [this.lookup(tableName)].filter((t): t is TableSchema => t !== undefined)
      : Array.from(this.tables.values());

    if (tables.length === 0) {
      return tableName ? `Table "${tableName}" not found.` : 'No tables found.';
    }

    const parts: string[] = [];
    for (const table of tables) {
      parts.push(`Table: ${table.name} (primary key: ${table.primaryKey})`);
      parts.push('Columns:');
      for (const field of table.fields.values()) {
        const required = field.required ? 'REQUIRED' : 'optional';
        const extras: string[] = [];
        if (field.maxLength !== undefined) extras.push(`max ${field.maxLength}`);
        if (field.minimum !== undefined) extras.push(`min ${field.minimum}`);
        if (field.type === 'date') extras.push(field.format ? `format ${field.format}` : 'format YYYY-MM-DD');
        const extraText = extras.length > 0 ? ` ${extras.join(', ')}` : '';
        const description = field.description ? ` -- ${field.description}` : '';
        parts.push(`  - ${field.name}: ${field.type} ${required}${extraText}${description}`);
      }
      parts.push('');
    }

    return parts.join('\n');
  }

  private lookup(name: string): TableSchema | undefined {
    const key = name.trim().toLowerCase();
    if (!key) return undefined;

    const direct = this.tables.get(key) ?? this.tables.get(this.aliases.get(key) ?? '');
    if (direct) return direct;

    if (key.endsWith('s')) {
      const singular = this.tables.get(key.slice(0, -1));
      if (singular) return singular;
    }
    return this.tables.get(`${key}s`);
  }
}

const TIMESTAMP_FORMAT = '^\\d{4}-\\d{2}-\\d{2}([ T]\\d{2}:\\d{2}(:\\d{2})?)?$';

export function mapSqlType(dataType: string): FieldType {
  const type = dataType.toLowerCase();
  if (/bool/.test(type)) return 'boolean';
  if (/date|time/.test(type)) return 'date';
  if (/int|numeric|decimal|real|double|float|money|serial/.test(type)) return 'number';
  return 'string';
}

function defaultAliases(tableName: string): string[] {
  const name = tableName.toLowerCase();
  return name.endsWith('s') ? [name.slice(0, -1)] : [`${name}s`];
}
