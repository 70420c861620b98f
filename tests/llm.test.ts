import { describe, it, expect, vi, beforeEach } from 'vitest';
import OpenAI from 'openai';
import { LlamaServerClient, buildSolvePrompt } from '../src/llm.js';
import { LlmConnectionError } from '../src/errors.js';
import { silentLogger } from './helpers.js';

const { create, clientOptions } = vi.hoisted(() => {
  const clientOptions: unknown[] = [];
  return { create: vi.fn(), clientOptions };
});

vi.mock('openai', () => {
  class APIError extends Error {
    readonly status: number | undefined;
    constructor(status: number | undefined, _error: unknown, message: string | undefined) {
      super(message);
      this.status = status;
    }
  }
  class FakeOpenAI {
    static APIError = APIError;
    chat = { completions: { create } };
    constructor(options: unknown) {
      clientOptions.push(options);
    }
  }
  return { default: FakeOpenAI };
});

function reply(content: string) {
  return { model: 'served-model', choices: [{ message: { content } }], usage: { completion_tokens: 12 } };
}

function makeClient(seed?: number): LlamaServerClient {
  return new LlamaServerClient({
    baseUrl: 'http://localhost:8080/v1/',
    model: 'local-model',
    seed,
    logger: silentLogger,
  });
}

describe('LlamaServerClient', () => {
  beforeEach(() => {
    create.mockReset();
    clientOptions.length = 0;
  });

  it('configures the OpenAI client for the local server', () => {
    makeClient();
    expect(clientOptions[0]).toEqual({
      apiKey: 'sk-no-key-required',
      baseURL: 'http://localhost:8080/v1',
      timeout: 120000,
      maxRetries: 2,
    });
  });

  it('solve extracts the final answer', async () => {
    create.mockResolvedValue(reply('6 rows of 7.\nFinal Answer: 42'));
    const solution = await makeClient(7).solve('How many trees?');

    expect(solution).toEqual({ answer: '42', reasoning: '6 rows of 7.\nFinal Answer: 42', model: 'local-model' });
    const request = create.mock.calls[0][0];
    expect(request).toMatchObject({ model: 'local-model', max_tokens: 1024, temperature: 0, seed: 7 });
    expect(request.messages[1]).toEqual({
      role: 'user',
      content: 'Solve the following problem.\n\nPROBLEM:\nHow many trees?',
    });
  });

  it('omits the seed when none is configured', async () => {
    create.mockResolvedValue(reply('Final Answer: 1'));
    await makeClient().solve('q');
    expect(create.mock.calls[0][0]).not.toHaveProperty('seed');
  });

  it('places memory context before the problem', async () => {
    create.mockResolvedValue(reply('Final Answer: 1'));
    await makeClient().solve('How many trees?', '## Relevant Memories\n');
    expect(create.mock.calls[0][0].messages[1].content).toBe(buildSolvePrompt('How many trees?', '## Relevant Memories\n'));
    expect(create.mock.calls[0][0].messages[1].content.startsWith('The memories below')).toBe(true);
  });

  it('complete passes per-call options', async () => {
    create.mockResolvedValue(reply('{"correct": true}'));
    const text = await makeClient().complete('grade this', { maxTokens: 256, temperature: 0.5 });
    expect(text).toBe('{"correct": true}');
    expect(create.mock.calls[0][0]).toMatchObject({
      messages: [{ role: 'user', content: 'grade this' }],
      max_tokens: 256,
      temperature: 0.5,
    });
  });

  it('returns an empty string when the reply has no content', async () => {
    create.mockResolvedValue({ model: 'served-model', choices: [{ message: { content: null } }] });
    expect(await makeClient().complete('hi')).toBe('');
  });

  it('wraps server errors', async () => {
    create.mockRejectedValue(new OpenAI.APIError(503, undefined, 'overloaded', undefined));
    await expect(makeClient().complete('hi')).rejects.toThrow(
      new LlmConnectionError('Model server error (503): overloaded'),
    );
  });

  it('wraps connection failures', async () => {
    create.mockRejectedValue(new Error('ECONNREFUSED'));
    const client = makeClient();
    await expect(client.complete('hi')).rejects.toBeInstanceOf(LlmConnectionError);
    await expect(client.complete('hi')).rejects.toThrow(
      'Cannot reach model server at http://localhost:8080/v1: ECONNREFUSED',
    );
  });
});

describe('buildSolvePrompt', () => {
  it('is the bare problem without memory', () => {
    expect(buildSolvePrompt('2 + 2?')).toBe('Solve the following problem.\n\nPROBLEM:\n2 + 2?');
  });
});
