import { readFileSync } from 'fs';
import { z } from 'zod';
import type { Problem } from './types.js';
import { DatasetError } from './errors.js';

const scalar = z.union([z.string(), z.number()]).transform((v) => String(v));

const ProblemSchema = z
  .object({
    id: scalar,
    question: z.string().min(1),
    expected_value: scalar,
  })
  .transform((p): Problem => ({ id: p.id, question: p.question, expectedValue: p.expected_value }));

const DatasetSchema = z.array(ProblemSchema);

/** Load a JSON array of `{ id, question, expected_value }` records. */
export function loadProblems(path: string): Problem[] {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    throw new DatasetError(path, 'cannot be read', { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err: unknown) {
    throw new DatasetError(path, 'invalid JSON', { cause: err });
  }

  const parsed = DatasetSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DatasetError(path, `invalid problem at ${issue.path.join('.') || '<root>'}: ${issue.message}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
