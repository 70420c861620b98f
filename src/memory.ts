import { z } from 'zod';
import type { MemoryItem, NewMemoryItem } from './types.js';
import { InvalidMemoryError } from './errors.js';

const isoTimestamp = z
  .string()
  .min(1)
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'not an ISO-8601 timestamp' });

/** On-disk shape of a memory item. */
export const MemoryRecordSchema = z.object({
  title: z.string().min(1),
  description: z.string().min(1),
  content: z.string().min(1),
  source_problem_id: z.string().min(1),
  success: z.boolean(),
  created_at: isoTimestamp,
  embedding: z.array(z.number()).nullable().optional(),
});

export type MemoryRecord = z.infer<typeof MemoryRecordSchema>;

export function toRecord(item: MemoryItem): MemoryRecord {
  return {
    title: item.title,
    description: item.description,
    content: item.content,
    source_problem_id: item.sourceProblemId,
    success: item.success,
    created_at: item.createdAt,
    embedding: item.embedding !== null ? [...item.embedding] : null,
  };
}

export function fromRecord(record: MemoryRecord): MemoryItem {
  return {
    title: record.title,
    description: record.description,
    content: record.content,
    sourceProblemId: record.source_problem_id,
    success: record.success,
    createdAt: record.created_at,
    embedding: record.embedding ?? null,
  };
}

/**
 * Check the invariants every stored item must hold. Throws InvalidMemoryError
 * naming the first offending field.
 */
export function assertValidMemory(item: MemoryItem): void {
  const result = MemoryRecordSchema.safeParse(toRecord(item));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidMemoryError(`Invalid memory item: ${issue.path.join('.')}: ${issue.message}`);
  }
}

/** Build a validated memory item stamped with the current time. */
export function createMemoryItem(fields: NewMemoryItem, now: Date = new Date()): MemoryItem {
  const item: MemoryItem = {
    title: fields.title.trim(),
    description: fields.description.trim(),
    content: fields.content.trim(),
    sourceProblemId: fields.sourceProblemId,
    success: fields.success,
    createdAt: now.toISOString(),
    embedding: fields.embedding ?? null,
  };
  assertValidMemory(item);
  return item;
}

/** Deep-frozen copy of an item, so stored memories cannot be edited in place. */
export function freezeMemory(item: MemoryItem): MemoryItem {
  return Object.freeze({
    ...item,
    embedding: item.embedding !== null ? Object.freeze([...item.embedding]) : null,
  });
}
