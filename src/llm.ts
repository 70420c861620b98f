/**
 * Client for an OpenAI-compatible chat endpoint, such as the one exposed by
 * llama.cpp's server. Solves problems and serves plain completions for the
 * judge and the extractor.
 */

import OpenAI from 'openai';
import type { CompletionOptions, Solution, Solver, TextCompleter } from './types.js';
import { extractFinalAnswer } from './parse.js';
import { LlmConnectionError } from './errors.js';
import { getLogger, type Logger } from './logger.js';

const SYSTEM_PROMPT =
  'You are a careful mathematician. Reason step by step, then give the result on a final line of the form "Final Answer: <value>".';

/** Options for constructing a LlamaServerClient. */
export interface LlamaServerClientOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
  /** Forwarded on every request so repeated runs sample identically. */
  seed?: number;
  timeoutMs?: number;
  maxRetries?: number;
  logger?: Logger;
}

export function buildSolvePrompt(question: string, memoryContext: string = ''): string {
  if (!memoryContext) return `Solve the following problem.\n\nPROBLEM:\n${question}`;
  return (
    'The memories below come from earlier problems. Use them where they apply and ignore them otherwise.\n\n' +
    `${memoryContext}\n` +
    `Solve the following problem.\n\nPROBLEM:\n${question}`
  );
}

export class LlamaServerClient implements Solver, TextCompleter {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly baseUrl: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly seed: number | undefined;
  private readonly logger: Logger;

  constructor(options: LlamaServerClientOptions) {
    this.model = options.model;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.temperature = options.temperature ?? 0;
    this.maxTokens = options.maxTokens ?? 1024;
    this.seed = options.seed;
    this.logger = options.logger ?? getLogger();
    this.client = new OpenAI({
      apiKey: options.apiKey ?? 'sk-no-key-required',
      baseURL: this.baseUrl,
      timeout: options.timeoutMs ?? 120000,
      maxRetries: options.maxRetries ?? 2,
    });
  }

  async solve(question: string, memoryContext: string = ''): Promise<Solution> {
    const reasoning = await this.chat(
      [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildSolvePrompt(question, memoryContext) },
      ],
      {},
    );
    return { answer: extractFinalAnswer(reasoning), reasoning, model: this.model };
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    return this.chat([{ role: 'user', content: prompt }], options ?? {});
  }

  private async chat(
    messages: OpenAI.ChatCompletionMessageParam[],
    options: CompletionOptions,
  ): Promise<string> {
    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages,
        max_tokens: options.maxTokens ?? this.maxTokens,
        temperature: options.temperature ?? this.temperature,
        ...(this.seed !== undefined ? { seed: this.seed } : {}),
      });
    } catch (err: unknown) {
      if (err instanceof OpenAI.APIError && err.status !== undefined) {
        throw new LlmConnectionError(`Model server error (${err.status}): ${err.message}`, { cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new LlmConnectionError(`Cannot reach model server at ${this.baseUrl}: ${message}`, { cause: err });
    }

    const content = response.choices[0]?.message.content ?? '';
    this.logger.debug(
      { model: response.model, completionTokens: response.usage?.completion_tokens },
      'completion received',
    );
    return content;
  }
}
