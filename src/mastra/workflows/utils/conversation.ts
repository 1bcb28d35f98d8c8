import { ValidationError } from '../../../errors.js';
import type { ConversationMessage, ConversationState } from '../../../types/index.js';
import type { JudgeMessage } from '../../../types/collaborators.js';

export const EMPTY_CONVERSATION: ConversationState = Object.freeze([]);

/** Return a new log with the (question, answer) pair appended; `state` is left untouched. */
export function appendTurn(state: ConversationState, question: string, answer: string): ConversationState {
  const turn: ConversationMessage[] = [
    { role: 'user', content: question },
    { role: 'assistant', content: answer },
  ];
  return Object.freeze([...state, ...turn]);
}

/** Prior turns in original order, followed by the new question. */
export function toJudgeMessages(state: ConversationState, question: string): JudgeMessage[] {
  return [
    ...state.map((m) => ({ role: m.role, content: m.content })),
    { role: 'user', content: question },
  ];
}

/** Even length with roles alternating user, assistant. Throws ValidationError otherwise. */
export function assertWellFormed(state: ConversationState): void {
  if (state.length % 2 !== 0) {
    throw new ValidationError('Conversation history must hold complete turns', [`got ${state.length} messages`]);
  }
  const misplaced = state.findIndex((m, i) => m.role !== (i % 2 === 0 ? 'user' : 'assistant'));
  if (misplaced !== -1) {
    throw new ValidationError('Conversation roles must alternate user, assistant', [`message ${misplaced} is "${state[misplaced].role}"`]);
  }
}
