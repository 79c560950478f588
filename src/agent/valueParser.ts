/**
 * Literal parsing for generated SQL fragments.
 *
 * Values are read with a fixed grammar (NULL, quoted text, numbers, raw
 * text); nothing is ever evaluated as code.
 */

import type { TypedValue } from '../types.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.\d*|\.\d+)$/;

/**
 * Splits `text` on `separator` wherever it appears outside quotes and
 * parentheses.
 *
 * @example
 * ```typescript
 * splitTopLevel("'Smith, J', COALESCE(a, b), 3");
 * // ["'Smith, J'", "COALESCE(a, b)", "3"]
 * ```
 */
export function splitTopLevel(text: string, separator = ','): string[] {
  const parts: string[] = [];
  let current = '';
  let quote: string | null = null;
  let depth = 0;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (quote) {
      current += char;
      if (char === '\\' && i + 1 < text.length) {
        current += text[++i];
      } else if (char === quote) {
        if (text[i + 1] === quote) {
          current += text[++i]; // doubled quote stays inside the literal
        } else {
          quote = null;
        }
      }
      continue;
    }

    if (char === "'" || char === '"') {
      quote = char;
    } else if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth = Math.max(0, depth - 1);
    } else if (char === separator && depth === 0) {
      parts.push(current.trim());
      current = '';
      continue;
    }
    current += char;
  }

  if (current.trim() || parts.length > 0) {
    parts.push(current.trim());
  }
  return parts;
}

/**
 * Index of the first `target` character outside quotes and parentheses,
 * or -1.
 */
export function indexOfTopLevel(text: string, target: string): number {
  let quote: string | null = null;
  let depth = 0;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (quote) {
      if (char === '\\') {
        i++;
      } else if (char === quote) {
        if (text[i + 1] === quote) i++;
        else quote = null;
      }
      continue;
    }
    if (char === "'" || char === '"') quote = char;
    else if (char === '(') depth++;
    else if (char === ')') depth = Math.max(0, depth - 1);
    else if (char === target && depth === 0) return i;
  }
  return -1;
}

function isQuoted(text: string): boolean {
  if (text.length < 2) return false;
  const first = text[0];
  return (first === "'" || first === '"') && text[text.length - 1] === first;
}

function unquote(text: string): string {
  const quote = text[0];
  const inner = text.slice(1, -1);
  return inner
    .split(quote + quote).join(quote)
    .split('\\' + quote).join(quote);
}

/**
 * Converts one literal token into a typed value.
 *
 * - `NULL` (any case) → null
 * - quoted text → string without quotes, escaped quotes collapsed
 * - numeric token → number
 * - anything else → the raw (trimmed) text
 */
export function parseLiteral(literalText: string): TypedValue {
  const text = literalText.trim();

  if (/^null$/i.test(text)) {
    return null;
  }
  if (isQuoted(text)) {
    return unquote(text);
  }
  if (INTEGER_PATTERN.test(text)) {
    return parseInt(text, 10);
  }
  if (DECIMAL_PATTERN.test(text)) {
    return parseFloat(text);
  }
  return text;
}
