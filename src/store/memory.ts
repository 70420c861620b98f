import type { BankStore } from './base.js';
import type { MemoryItem } from '../types.js';

function cloneItem(item: MemoryItem): MemoryItem {
  return {
    ...item,
    embedding: item.embedding !== null ? [...item.embedding] : null,
  };
}

/**
 * In-memory store for testing. Keeps a private copy of the last saved
 * sequence; `saveCount` tracks how often the bank persisted.
 */
export class MemoryStore implements BankStore {
  private items: MemoryItem[] | null;
  saveCount = 0;

  constructor(initial?: MemoryItem[]) {
    this.items = initial ? initial.map(cloneItem) : null;
  }

  load(): MemoryItem[] | null {
    return this.items ? this.items.map(cloneItem) : null;
  }

  save(items: readonly MemoryItem[]): void {
    this.items = items.map(cloneItem);
    this.saveCount += 1;
  }
}
