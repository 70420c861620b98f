export { ReasoningBank, DEFAULT_BANK_PATH } from './bank.js';
export type { ReasoningBankOptions } from './bank.js';
export { MemoryRetriever, leaksExpectedValue } from './retriever.js';
export type { MemoryRetrieverOptions } from './retriever.js';
export { formatMemoriesForPrompt } from './prompt.js';
export { wilsonInterval, accuracy, armStats, compare, Z_95 } from './stats.js';
export type { Interval, ArmStats, ComparisonSummary } from './stats.js';
export { createMemoryItem, assertValidMemory } from './memory.js';
export { cosineSimilarity, tokenize, termOverlap } from './embed.js';
export { Phase1Experiment } from './experiment.js';
export type { ExperimentOptions, ExperimentSummary, ExperimentResults } from './experiment.js';
export { LlamaServerClient } from './llm.js';
export { MathJudge } from './judge.js';
export { MemoryExtractor } from './extractor.js';
export { loadProblems } from './dataset.js';
export { loadConfig } from './config.js';
export type { Config } from './config.js';
export { writeResults, formatSummary, summaryToRecord } from './report.js';
export * from './errors.js';
export type * from './types.js';
export type { BankStore } from './store/index.js';
export { JsonFileStore, MemoryStore } from './store/index.js';
