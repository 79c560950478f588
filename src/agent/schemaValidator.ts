/**
 * Schema Validator
 *
 * Builds a typed record from a column → value map. A required field with
 * no value is *missing* (the user gets asked for it); a field whose value
 * is present but cannot be coerced is an *error* (never re-asked here).
 */

import type {
  ColumnValueMap,
  FieldError,
  FieldSchema,
  TableSchema,
  TypedValue,
  ValidationOutcome,
} from '../types.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)$/;
const TRUE_WORDS = new Set(['true', 't', 'yes', 'y', '1']);
const FALSE_WORDS = new Set(['false', 'f', 'no', 'n', '0']);

type Coerced = { ok: true; value: TypedValue } | { ok: false; message: string };

export type ValidationMode = 'record' | 'assignments';

/**
 * True when a value counts as "not supplied": undefined, null, the NULL
 * sentinel text, or a blank string.
 */
export function isAbsent(value: TypedValue | undefined): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' || trimmed.toUpperCase() === 'NULL';
  }
  return false;
}

export function formatFieldError(error: FieldError): string {
  return `${error.field}: ${error.message}`;
}

function isRealDate(text: string): boolean {
  const [year, month, day] = text.slice(0, 10).split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function coerceString(value: TypedValue, field: FieldSchema): Coerced {
  const text = String(value).trim();
  if (field.maxLength !== undefined && text.length > field.maxLength) {
    return { ok: false, message: `must be at most ${field.maxLength} characters` };
  }
  if (field.format && !new RegExp(field.format).test(text)) {
    return { ok: false, message: `must match format ${field.format}` };
  }
  return { ok: true, value: text };
}

function coerceNumber(value: TypedValue, field: FieldSchema): Coerced {
  let num: number;
  if (typeof value === 'number') {
    num = value;
  } else if (typeof value === 'string') {
    const cleaned = value.trim().replace(/^\$/, '').replace(/,/g, '');
    if (!NUMERIC.test(cleaned)) {
      return { ok: false, message: `expected a number, got "${value}"` };
    }
    num = Number(cleaned);
  } else {
    return { ok: false, message: `expected a number, got ${String(value)}` };
  }

  if (!Number.isFinite(num)) {
    return { ok: false, message: 'expected a finite number' };
  }
  if (field.minimum !== undefined && num < field.minimum) {
    return { ok: false, message: `must be at least ${field.minimum}` };
  }
  return { ok: true, value: num };
}

function coerceBoolean(value: TypedValue): Coerced {
  if (typeof value === 'boolean') return { ok: true, value };
  const word = String(value).trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return { ok: true, value: true };
  if (FALSE_WORDS.has(word)) return { ok: true, value: false };
  return { ok: false, message: `expected true or false, got "${String(value)}"` };
}

function coerceDate(value: TypedValue, field: FieldSchema): Coerced {
  if (typeof value !== 'string') {
    return { ok: false, message: 'must be in YYYY-MM-DD format' };
  }
  const text = value.trim();
  const pattern = field.format ? new RegExp(field.format) : ISO_DATE;
  if (!pattern.test(text)) {
    return {
      ok: false,
      message: field.format ? `must match format ${field.format}` : 'must be in YYYY-MM-DD format',
    };
  }
  if (/^\d{4}-\d{2}-\d{2}/.test(text) && !isRealDate(text)) {
    return { ok: false, message: `"${text}" is not a valid date` };
  }
  return { ok: true, value: text };
}

export function coerceValue(value: TypedValue, field: FieldSchema): Coerced {
  switch (field.type) {
    case 'string':
      return coerceString(value, field);
    case 'number':
      return coerceNumber(value, field);
    case 'boolean':
      return coerceBoolean(value);
    case 'date':
      return coerceDate(value, field);
  }
}

/**
 * Renames columns to the schema's spelling. Unquoted SQL identifiers are
 * case-insensitive, so `NAME` and `name` are the same column; when both
 * appear, the later entry wins. Unknown columns keep their name.
 */
export function canonicalizeColumns(
  columnValueMap: Readonly<ColumnValueMap>,
  tableSchema: TableSchema
): ColumnValueMap {
  const byLowerName = new Map<string, string>();
  for (const name of [tableSchema.primaryKey, ...tableSchema.fields.keys()]) {
    byLowerName.set(name.toLowerCase(), name);
  }

  const result: ColumnValueMap = {};
  for (const [column, value] of Object.entries(columnValueMap)) {
    const canonical = byLowerName.get(column.toLowerCase()) ?? column;
    delete result[canonical];
    result[canonical] = value;
  }
  return result;
}

/**
 * Validates a column → value map against a table schema.
 *
 * In `record` mode (INSERT) every required field must end up with a value.
 * In `assignments` mode (UPDATE) only the columns present in the map are
 * checked; a required column assigned NULL is still reported missing.
 *
 * Pure: the same input always yields the same outcome.
 */
export function validateRecord(
  columnValueMap: Readonly<ColumnValueMap>,
  tableSchema: TableSchema,
  mode: ValidationMode = 'record'
): ValidationOutcome {
  const missingFields: string[] = [];
  const errors: FieldError[] = [];
  const record: ColumnValueMap = {};
  const values = canonicalizeColumns(columnValueMap, tableSchema);

  for (const column of Object.keys(values)) {
    if (column === tableSchema.primaryKey) continue;
    if (!tableSchema.fields.has(column)) {
      console.warn(`⚠️  Dropping column "${column}" not declared on ${tableSchema.name}`);
    }
  }

  for (const field of tableSchema.fields.values()) {
    const supplied = Object.prototype.hasOwnProperty.call(values, field.name);
    if (mode === 'assignments' && !supplied) continue;

    const value = supplied ? values[field.name] : undefined;

    if (isAbsent(value)) {
      if (field.required) {
        missingFields.push(field.name);
      } else if (supplied) {
        record[field.name] = null;
      }
      continue;
    }

    const coerced = coerceValue(value ?? null, field);
    if (coerced.ok) {
      record[field.name] = coerced.value;
    } else {
      errors.push({ field: field.name, message: coerced.message });
    }
  }

  const complete = missingFields.length === 0 && errors.length === 0;
  return {
    missingFields,
    validatedRecord: complete ? record : null,
    errors,
  };
}

/** UPDATE mode: only the supplied columns are validated. */
export function validateAssignments(
  columnValueMap: Readonly<ColumnValueMap>,
  tableSchema: TableSchema
): ValidationOutcome {
  return validateRecord(columnValueMap, tableSchema, 'assignments');
}
