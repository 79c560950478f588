import type { ConversationState, ThreadStore } from '../types.js';

export function createConversationState(threadId: string): ConversationState {
  return {
    threadId,
    messages: [],
    pending: null,
    executionResult: null,
    finalQuery: null,
    summary: '',
    validationErrors: [],
    operationCount: 0,
  };
}

/**
 * Process-lifetime thread store. States are copied in and out so callers
 * never share a mutable object with the store.
 */
export class InMemoryThreadStore implements ThreadStore {
  private readonly states = new Map<string, ConversationState>();

  async get(threadId: string): Promise<ConversationState | null> {
    const state = this.states.get(threadId);
    return state ? structuredClone(state) : null;
  }

  async put(threadId: string, state: ConversationState): Promise<void> {
    this.states.set(threadId, structuredClone(state));
  }

  threadIds(): string[] {
    return Array.from(this.states.keys());
  }
}
