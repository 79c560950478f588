import type { PendingRequest } from '../types.js';

export type Intent =
  | { kind: 'reply'; field: string }
  | { kind: 'abandon' }
  | { kind: 'stray_reply' }
  | { kind: 'new_request' };

export interface IntentOptions {
  shortReplyMaxWords: number;
  /** Table names and aliases; a message naming one is a request. */
  tableTerms?: readonly string[];
}

const ABANDON_PATTERN = /^\s*(cancel|abort|never\s*mind|nevermind|start\s+over)\s*[.!]*\s*$/i;

const REQUEST_KEYWORDS = new Set([
  'show', 'list', 'find', 'get', 'display', 'select', 'count', 'search', 'view',
  'add', 'insert', 'create', 'new', 'hire', 'register',
  'update', 'change', 'set', 'modify', 'edit', 'raise',
  'delete', 'remove', 'drop', 'fire',
  'how', 'what', 'which', 'who',
]);

export function isAbandonment(message: string): boolean {
  return ABANDON_PATTERN.test(message);
}

function words(message: string): string[] {
  return message.toLowerCase().split(/[^a-z0-9_']+/).filter(Boolean);
}

/**
 * Decides whether a message answers the pending question or starts a new
 * request.
 *
 * A pending request with missing fields is the deciding signal. Without
 * one, a short message with no request keyword or table name is treated
 * as a stray reply rather than sent to the generator.
 */
export function classifyIntent(
  message: string,
  pending: PendingRequest | null,
  options: IntentOptions
): Intent {
  if (pending && pending.missingFields.length > 0) {
    if (isAbandonment(message)) {
      return { kind: 'abandon' };
    }
    return { kind: 'reply', field: pending.awaitingField ?? pending.missingFields[0] };
  }

  const tokens = words(message);
  if (tokens.length > 0 && tokens.length <= options.shortReplyMaxWords) {
    const terms = new Set((options.tableTerms ?? []).map(t => t.toLowerCase()));
    const looksLikeRequest = tokens.some(token => REQUEST_KEYWORDS.has(token) || terms.has(token));
    if (!looksLikeRequest) {
      return { kind: 'stray_reply' };
    }
  }

  return { kind: 'new_request' };
}
