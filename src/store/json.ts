import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import type { BankStore } from './base.js';
import type { MemoryItem } from '../types.js';
import { MemoryRecordSchema, fromRecord, toRecord } from '../memory.js';
import { BankCorruptionError } from '../errors.js';

const BankFileSchema = z.array(MemoryRecordSchema);

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * JSON file store. Items are kept as an indented array of snake_case records
 * and the file is rewritten in full on every save.
 */
export class JsonFileStore implements BankStore {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  load(): MemoryItem[] | null {
    let raw: string;
    try {
      raw = readFileSync(this.path, 'utf-8');
    } catch (err: unknown) {
      if (isMissingFile(err)) return null;
      throw new BankCorruptionError(this.path, 'read failed', { cause: err });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err: unknown) {
      throw new BankCorruptionError(this.path, 'invalid JSON', { cause: err });
    }

    const parsed = BankFileSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new BankCorruptionError(
        this.path,
        `invalid record at ${issue.path.join('.') || '<root>'}: ${issue.message}`,
        { cause: parsed.error },
      );
    }
    return parsed.data.map(fromRecord);
  }

  save(items: readonly MemoryItem[]): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    writeFileSync(tmp, JSON.stringify(items.map(toRecord), null, 2), 'utf-8');
    renameSync(tmp, this.path);
  }
}
