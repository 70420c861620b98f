import type { MemoryItem } from '../types.js';

/**
 * Synchronous persistence for a memory bank. The whole sequence is written
 * on every save.
 */
export interface BankStore {
  /** Returns the persisted items, or null when nothing has been persisted yet. */
  load(): MemoryItem[] | null;
  save(items: readonly MemoryItem[]): void;
}
