import { ValidationError } from '../../../errors.js';
import { QuestionSchema, type ConversationState, type RecommendationSet } from '../../../types/index.js';
import type { Judge } from '../../../types/collaborators.js';
import { buildQaInstructions, qaFailureAnswer } from '../../agents/prompts/qa.prompt.js';
import { buildGroundingBlock } from '../utils/context-block.js';
import { appendTurn, assertWellFormed, toJudgeMessages } from '../utils/conversation.js';
import { QA_MAX_OUTPUT_TOKENS, QA_TEMPERATURE } from '../utils/constants.js';

export interface QaTurn {
  answer: string;
  conversation: ConversationState;
}

export type QaPhase = 'idle' | 'awaiting-answer';

export function parseQuestion(question: string): string {
  const parsed = QuestionSchema.safeParse(question);
  if (!parsed.success) {
    throw new ValidationError('Invalid question', parsed.error.issues.map((i) => i.message));
  }
  return parsed.data;
}

/**
 * One Q&A turn. The judge sees the instructions and a freshly built grounding
 * block, then every prior turn in order, then the new question. A judge
 * failure becomes an apology answer; either way exactly one
 * (question, answer) pair is appended to a new log.
 */
export async function answerQuestion(
  judge: Judge,
  set: RecommendationSet,
  conversation: ConversationState,
  question: string,
): Promise<QaTurn> {
  const text = parseQuestion(question);
  assertWellFormed(conversation);
  const instructions = buildQaInstructions(buildGroundingBlock(set));

  console.log(`[pipeline:qa] 💬 Turn ${conversation.length / 2 + 1}: ${text.slice(0, 80)}`);
  const reply = await judge.complete(instructions, toJudgeMessages(conversation, text), {
    temperature: QA_TEMPERATURE,
    maxOutputTokens: QA_MAX_OUTPUT_TOKENS,
  });

  let answer: string;
  if (reply.ok) {
    answer = reply.value;
  } else {
    console.warn(`[pipeline:qa] ⚠️ Judge failed: ${reply.error}`);
    answer = qaFailureAnswer(reply.error);
  }

  return { answer, conversation: appendTurn(conversation, text, answer) };
}

/**
 * Serializes turns over one RecommendationSet. A question asked while the
 * previous one is still awaiting its answer is rejected.
 */
export class QaOrchestrator {
  private phase: QaPhase = 'idle';
  private readonly judge: Judge;

  constructor(judge: Judge) {
    this.judge = judge;
  }

  get state(): QaPhase {
    return this.phase;
  }

  async ask(set: RecommendationSet, conversation: ConversationState, question: string): Promise<QaTurn> {
    if (this.phase === 'awaiting-answer') {
      throw new ValidationError('A question is already awaiting an answer');
    }
    this.phase = 'awaiting-answer';
    try {
      return await answerQuestion(this.judge, set, conversation, question);
    } finally {
      this.phase = 'idle';
    }
  }
}
