import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_BANK_PATH } from './bank.js';

export const CONFIG_FILE = 'reasoning-bank.yaml';

export const ConfigSchema = z.object({
  llm: z.object({
    baseUrl: z.string().url().default('http://localhost:8080/v1'),
    model: z.string().min(1).default('local-model'),
    apiKey: z.string().default('sk-no-key-required'),
    temperature: z.number().min(0).max(2).default(0),
    maxTokens: z.number().int().positive().default(1024),
    timeoutMs: z.number().int().positive().default(120000),
    maxRetries: z.number().int().min(0).default(2),
  }).default({}),
  bank: z.object({
    path: z.string().min(1).default(DEFAULT_BANK_PATH),
  }).default({}),
  retrieval: z.object({
    topK: z.number().int().min(0).default(2),
  }).default({}),
  experiment: z.object({
    trainPath: z.string().default('data/train_problems.json'),
    testPath: z.string().default('data/test_problems.json'),
    trainLimit: z.number().int().min(0).default(100),
    testLimit: z.number().int().min(0).default(100),
    seed: z.number().int().default(42),
    outputDir: z.string().default('results'),
  }).default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    pretty: z.boolean().default(false),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Nested partial of the raw configuration, as accepted from files and flags. */
export type ConfigOverrides = { [K in keyof Config]?: Partial<Config[K]> };

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = result[key];
    result[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    throw new ConfigError(`Failed to parse config at ${path}`, { cause: err });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config at ${path} must be a mapping`);
  }
  return parsed;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const llm: Record<string, unknown> = {};
  if (env.LLM_BASE_URL) llm.baseUrl = env.LLM_BASE_URL;
  if (env.LLM_MODEL) llm.model = env.LLM_MODEL;
  if (env.LLM_API_KEY) llm.apiKey = env.LLM_API_KEY;

  const logging: Record<string, unknown> = {};
  if (env.LOG_LEVEL) logging.level = env.LOG_LEVEL;

  return { llm, logging };
}

/**
 * Load configuration, merged in order:
 * defaults <- config file <- environment <- overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  let raw: Record<string, unknown> = {};

  if (options.configPath) {
    if (!existsSync(options.configPath)) {
      throw new ConfigError(`Config file not found: ${options.configPath}`);
    }
    raw = readConfigFile(options.configPath);
  } else {
    const defaultPath = join(cwd, CONFIG_FILE);
    if (existsSync(defaultPath)) raw = readConfigFile(defaultPath);
  }

  raw = deepMerge(raw, envOverrides(options.env ?? process.env));
  if (options.overrides) {
    raw = deepMerge(raw, options.overrides);
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, { cause: parsed.error });
  }
  return parsed.data;
}
