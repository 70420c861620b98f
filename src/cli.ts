#!/usr/bin/env node

/**
 * `reasoning-bank`: runs the memory experiment and manages the bank file.
 */

import { Command } from 'commander';
import { loadConfig, type Config, type ConfigOverrides } from './config.js';
import { createLogger, setLogger } from './logger.js';
import { ReasoningBank } from './bank.js';
import { MemoryRetriever } from './retriever.js';
import { LlamaServerClient } from './llm.js';
import { MathJudge } from './judge.js';
import { MemoryExtractor } from './extractor.js';
import { loadProblems } from './dataset.js';
import { Phase1Experiment } from './experiment.js';
import { formatSummary, writeResults } from './report.js';

interface RunOptions {
  config?: string;
  train?: string;
  test?: string;
  trainLimit?: number;
  testLimit?: number;
  topK?: number;
  seed?: number;
  bank?: string;
  output?: string;
  keepBank?: boolean;
  verbose?: boolean;
}

interface BankOptions {
  config?: string;
  bank?: string;
}

function parseInteger(value: string): number {
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n)) throw new Error(`Not an integer: ${value}`);
  return n;
}

function setup(configPath: string | undefined, overrides: ConfigOverrides): Config {
  const config = loadConfig({ configPath, overrides });
  setLogger(createLogger('reasoning-bank', config.logging));
  return config;
}

async function executeRun(options: RunOptions): Promise<void> {
  const config = setup(options.config, {
    bank: { path: options.bank },
    retrieval: { topK: options.topK },
    experiment: {
      trainPath: options.train,
      testPath: options.test,
      trainLimit: options.trainLimit,
      testLimit: options.testLimit,
      seed: options.seed,
      outputDir: options.output,
    },
    logging: options.verbose ? { level: 'debug', pretty: true } : {},
  });
  const { experiment: settings } = config;

  const trainProblems = loadProblems(settings.trainPath);
  const testProblems = loadProblems(settings.testPath);

  const llm = new LlamaServerClient({ ...config.llm, seed: settings.seed });
  const bank = new ReasoningBank({ store: config.bank.path });
  if (!options.keepBank) bank.clear();

  const experiment = new Phase1Experiment({
    bank,
    retriever: new MemoryRetriever(),
    solver: llm,
    judge: new MathJudge({ llm }),
    extractor: new MemoryExtractor(llm),
    topK: config.retrieval.topK,
    randomSeed: settings.seed,
  });

  await experiment.buildMemoryBank(trainProblems, settings.trainLimit);
  await experiment.runBaseline(testProblems, settings.testLimit);
  await experiment.runWithMemory(testProblems, settings.testLimit);

  const summary = experiment.summarize();
  const { resultsPath, summaryPath } = writeResults(settings.outputDir, experiment.results, summary);

  console.log(formatSummary(summary));
  console.log(`\nResults: ${resultsPath}`);
  console.log(`Summary: ${summaryPath}`);
}

function openBank(options: BankOptions): ReasoningBank {
  const config = setup(options.config, { bank: { path: options.bank } });
  return new ReasoningBank({ store: config.bank.path });
}

function createProgram(): Command {
  const program = new Command('reasoning-bank');
  program.description('Measure whether retrieved reasoning memories improve math accuracy');

  program
    .command('run')
    .description('Build the memory bank, then evaluate the test set with and without memory')
    .option('-c, --config <path>', 'Config file (YAML)')
    .option('--train <path>', 'Training problems (JSON)')
    .option('--test <path>', 'Test problems (JSON)')
    .option('--train-limit <n>', 'Training problems to use', parseInteger)
    .option('--test-limit <n>', 'Test problems to use', parseInteger)
    .option('-k, --top-k <n>', 'Memories retrieved per problem', parseInteger)
    .option('--seed <n>', 'Sampling seed', parseInteger)
    .option('--bank <path>', 'Memory bank file')
    .option('-o, --output <dir>', 'Results directory')
    .option('--keep-bank', 'Add to the existing bank instead of starting empty')
    .option('-v, --verbose', 'Pretty debug logging')
    .action(async (options: RunOptions) => {
      await executeRun(options);
    });

  const bank = program.command('bank').description('Inspect or reset the memory bank');

  bank
    .command('stats')
    .description('Show the number of stored memories')
    .option('-c, --config <path>', 'Config file (YAML)')
    .option('--bank <path>', 'Memory bank file')
    .action((options: BankOptions) => {
      const items = openBank(options).getAll();
      const strategies = items.filter((m) => m.success).length;
      console.log(`Memories:   ${items.length}`);
      console.log(`Strategies: ${strategies}`);
      console.log(`Pitfalls:   ${items.length - strategies}`);
    });

  bank
    .command('clear')
    .description('Remove every stored memory')
    .option('-c, --config <path>', 'Config file (YAML)')
    .option('--bank <path>', 'Memory bank file')
    .action((options: BankOptions) => {
      const bank = openBank(options);
      const removed = bank.size();
      bank.clear();
      console.log(`Removed ${removed} memories`);
    });

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    const message = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    console.error(message);
    process.exitCode = 1;
  });
