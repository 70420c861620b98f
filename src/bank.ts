import type { BankStore } from './store/base.js';
import { JsonFileStore } from './store/json.js';
import type { MemoryItem } from './types.js';
import { assertValidMemory, freezeMemory } from './memory.js';
import { getLogger, type Logger } from './logger.js';

export const DEFAULT_BANK_PATH = 'memory_bank/reasoning_bank.json';

/** Options for constructing a ReasoningBank. */
export interface ReasoningBankOptions {
  /** Backing store, or a path for a JSON file store. */
  store?: BankStore | string;
  logger?: Logger;
}

/**
 * Append-only collection of memory items. Every mutation persists the full
 * sequence before returning; there is no locking, so one process should own
 * a given backing store at a time.
 */
export class ReasoningBank {
  private readonly store: BankStore;
  private readonly logger: Logger;
  private items: MemoryItem[];

  constructor(options?: ReasoningBankOptions) {
    const store = options?.store ?? DEFAULT_BANK_PATH;
    this.store = typeof store === 'string' ? new JsonFileStore(store) : store;
    this.logger = options?.logger ?? getLogger();

    const loaded = this.store.load();
    this.items = (loaded ?? []).map(freezeMemory);
    this.logger.debug({ size: this.items.length, persisted: loaded !== null }, 'memory bank loaded');
  }

  /** Append one item and persist. */
  add(item: MemoryItem): void {
    assertValidMemory(item);
    this.commit([...this.items, freezeMemory(item)]);
  }

  /**
   * Append several items and persist once. Items are validated up front, so
   * an invalid item leaves the bank untouched.
   */
  addBatch(items: readonly MemoryItem[]): void {
    items.forEach(assertValidMemory);
    this.commit([...this.items, ...items.map(freezeMemory)]);
  }

  /** Snapshot of the current items in insertion order. */
  getAll(): readonly MemoryItem[] {
    return [...this.items];
  }

  /** Drop every item and persist the empty bank. */
  clear(): void {
    this.commit([]);
  }

  size(): number {
    return this.items.length;
  }

  /** Persist `next`, then adopt it. A failed save leaves the bank as it was. */
  private commit(next: MemoryItem[]): void {
    this.store.save(next);
    this.items = next;
    this.logger.debug({ size: next.length }, 'memory bank saved');
  }
}
