export type { BankStore } from './base.js';
export { JsonFileStore } from './json.js';
export { MemoryStore } from './memory.js';
