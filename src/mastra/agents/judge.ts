import { Agent } from '@mastra/core/agent';
import { createAnthropic } from '@ai-sdk/anthropic';

import { errorMessage } from '../../errors.js';
import type { Result } from '../../types/index.js';
import type { Judge, JudgeCallOptions, JudgeMessage } from '../../types/collaborators.js';

export const DEFAULT_JUDGE_MODEL = 'claude-haiku-4-5';
export const DEFAULT_JUDGE_TIMEOUT_MS = 30_000;

export interface JudgeConfig {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
}

/**
 * Race a promise against a timer. The timer is always cleared so a settled
 * call leaves nothing pending. Cancelling the raced work is the caller's job.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Judge backed by a Mastra Agent. A fresh agent is built per call because the
 * instructions differ between scoring and Q&A turns.
 */
export class MastraJudge implements Judge {
  private readonly model: ReturnType<ReturnType<typeof createAnthropic>>;
  private readonly timeoutMs: number;

  constructor(config: JudgeConfig) {
    const anthropic = createAnthropic({ apiKey: config.apiKey });
    this.model = anthropic(config.model ?? DEFAULT_JUDGE_MODEL);
    this.timeoutMs = config.timeoutMs ?? DEFAULT_JUDGE_TIMEOUT_MS;
  }

  async complete(
    instructions: string,
    messages: readonly JudgeMessage[],
    options: JudgeCallOptions = {},
  ): Promise<Result<string, string>> {
    const agent = new Agent({
      id: 'event-judge',
      name: 'Event Judge',
      instructions,
      model: this.model,
    });

    const startTime = Date.now();
    // Aborts the model request itself once the time is up.
    const signal = AbortSignal.timeout(this.timeoutMs);
    try {
      const response = await withTimeout(
        agent.generate(
          messages.map((m) => ({ role: m.role, content: m.content })),
          {
            abortSignal: signal,
            modelSettings: {
              temperature: options.temperature,
              maxOutputTokens: options.maxOutputTokens,
            },
          },
        ),
        this.timeoutMs,
        'Judge call',
      );
      const text = response.text.trim();
      console.log(`[judge] Reply in ${Date.now() - startTime}ms (${text.length} chars)`);
      if (!text) return { ok: false, error: 'Judge returned an empty reply' };
      return { ok: true, value: text };
    } catch (err) {
      const message = signal.aborted ? `Judge call timed out after ${this.timeoutMs}ms` : errorMessage(err);
      console.warn(`[judge] Call failed after ${Date.now() - startTime}ms: ${message}`);
      return { ok: false, error: message };
    }
  }
}
