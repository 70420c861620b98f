import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { CONFIG_FILE, loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'rbank-test-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns defaults without a file or environment', () => {
    const config = loadConfig({ cwd: tmpDir, env: {} });
    expect(config).toEqual({
      llm: {
        baseUrl: 'http://localhost:8080/v1',
        model: 'local-model',
        apiKey: 'sk-no-key-required',
        temperature: 0,
        maxTokens: 1024,
        timeoutMs: 120000,
        maxRetries: 2,
      },
      bank: { path: 'memory_bank/reasoning_bank.json' },
      retrieval: { topK: 2 },
      experiment: {
        trainPath: 'data/train_problems.json',
        testPath: 'data/test_problems.json',
        trainLimit: 100,
        testLimit: 100,
        seed: 42,
        outputDir: 'results',
      },
      logging: { level: 'info', pretty: false },
    });
  });

  it('reads the YAML file in the working directory', () => {
    writeFileSync(join(tmpDir, CONFIG_FILE), 'retrieval:\n  topK: 4\nllm:\n  model: qwen-math\n');
    const config = loadConfig({ cwd: tmpDir, env: {} });
    expect(config.retrieval.topK).toBe(4);
    expect(config.llm.model).toBe('qwen-math');
    expect(config.llm.baseUrl).toBe('http://localhost:8080/v1');
  });

  it('environment beats the file and overrides beat both', () => {
    writeFileSync(join(tmpDir, CONFIG_FILE), 'llm:\n  model: from-file\nexperiment:\n  seed: 1\n');
    const config = loadConfig({
      cwd: tmpDir,
      env: { LLM_MODEL: 'from-env', LOG_LEVEL: 'debug' },
      overrides: { experiment: { seed: 9, outputDir: undefined } },
    });
    expect(config.llm.model).toBe('from-env');
    expect(config.logging.level).toBe('debug');
    expect(config.experiment.seed).toBe(9);
    expect(config.experiment.outputDir).toBe('results');
  });

  it('an explicit config path must exist', () => {
    expect(() => loadConfig({ configPath: join(tmpDir, 'missing.yaml'), env: {} })).toThrow(ConfigError);
  });

  it('rejects values outside the schema', () => {
    writeFileSync(join(tmpDir, CONFIG_FILE), 'retrieval:\n  topK: -1\n');
    expect(() => loadConfig({ cwd: tmpDir, env: {} })).toThrow(/retrieval\.topK/);
  });

  it('rejects a file that is not a mapping', () => {
    const path = join(tmpDir, 'list.yaml');
    writeFileSync(path, '- 1\n- 2\n');
    expect(() => loadConfig({ configPath: path, env: {} })).toThrow('must be a mapping');
  });

  it('rejects malformed YAML', () => {
    const path = join(tmpDir, 'broken.yaml');
    writeFileSync(path, 'llm: [unclosed\n');
    expect(() => loadConfig({ configPath: path, env: {} })).toThrow(/Failed to parse config/);
  });
});
