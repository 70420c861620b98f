import { z } from 'zod';
import type { Evaluation, Judge, TextCompleter } from './types.js';
import { extractFinalAnswer, extractJsonBlock, numbersEqual, parseNumber } from './parse.js';
import { getLogger, type Logger } from './logger.js';

const VerdictSchema = z.object({
  correct: z.boolean(),
  reasoning: z.string().default(''),
});

function normalize(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function buildJudgePrompt(question: string, candidate: string, expected: string): string {
  return `You are grading a math answer. Decide whether the candidate answer is mathematically equivalent to the expected answer. Ignore formatting and units unless they change the value.

PROBLEM:
${question}

EXPECTED ANSWER: ${expected}
CANDIDATE ANSWER: ${candidate}

Return JSON only:
{"correct": true, "reasoning": "one sentence"}`;
}

/** Options for constructing a MathJudge. */
export interface MathJudgeOptions {
  /** Consulted only when neither a numeric nor an exact comparison applies. */
  llm?: TextCompleter;
  tolerance?: number;
  logger?: Logger;
}

/**
 * Grades answers against a known value: numerically when both sides parse as
 * numbers, by normalized text otherwise, and by asking the model as a last
 * resort.
 */
export class MathJudge implements Judge {
  private readonly llm: TextCompleter | undefined;
  private readonly tolerance: number;
  private readonly logger: Logger;

  constructor(options?: MathJudgeOptions) {
    this.llm = options?.llm;
    this.tolerance = options?.tolerance ?? 1e-6;
    this.logger = options?.logger ?? getLogger();
  }

  async evaluate(question: string, candidateAnswer: string, expectedValue: string): Promise<Evaluation> {
    const extracted = extractFinalAnswer(candidateAnswer);
    const got = parseNumber(extracted);
    const want = parseNumber(expectedValue);

    if (got !== null && want !== null) {
      const success = numbersEqual(got, want, this.tolerance);
      return {
        success,
        expected: expectedValue,
        extracted,
        method: 'numeric',
        rationale: success ? `${got} equals ${want}` : `${got} differs from ${want}`,
      };
    }

    if (normalize(extracted) === normalize(expectedValue)) {
      return {
        success: true,
        expected: expectedValue,
        extracted,
        method: 'exact',
        rationale: 'answer text matches expected value',
      };
    }

    if (!this.llm) {
      return {
        success: false,
        expected: expectedValue,
        extracted,
        method: 'exact',
        rationale: 'answer text does not match expected value',
      };
    }

    const reply = await this.llm.complete(buildJudgePrompt(question, extracted, expectedValue), {
      maxTokens: 256,
      temperature: 0,
    });
    const verdict = VerdictSchema.safeParse(extractJsonBlock(reply, 'object'));
    if (!verdict.success) {
      this.logger.warn({ reply: reply.slice(0, 200) }, 'judge reply was not a JSON verdict');
      return {
        success: false,
        expected: expectedValue,
        extracted,
        method: 'llm',
        rationale: 'judge reply could not be parsed',
      };
    }
    return {
      success: verdict.data.correct,
      expected: expectedValue,
      extracted,
      method: 'llm',
      rationale: verdict.data.reasoning,
    };
  }
}
