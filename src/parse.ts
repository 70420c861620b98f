/**
 * Helpers for reading structured values out of free-text model replies.
 */

const BOXED = /\\boxed\{((?:[^{}]|\{[^{}]*\})*)\}/g;
const FINAL_ANSWER = /final answer\s*(?:is)?\s*[:=]?\s*(.+)/gi;
const ANSWER_LINE = /^\s*answer\s*:\s*(.+)$/gim;
const NUMBER = /-?\d+(?:,\d{3})*(?:\.\d+)?(?:\s*\/\s*\d+(?:\.\d+)?)?/g;
const NUMERIC_LITERAL = /(-?\d+(?:\.\d+)?)(?:\s*\/\s*(\d+(?:\.\d+)?))?/;

function lastCapture(pattern: RegExp, text: string): string | undefined {
  let last: string | undefined;
  for (const match of text.matchAll(pattern)) {
    last = match[1] ?? match[0];
  }
  return last;
}

function tidy(answer: string): string {
  return answer.trim().replace(/[.;]+$/, '').replace(/^\$+|\$+$/g, '').trim();
}

/**
 * Pull the final answer out of a solution: the last \boxed{...}, else the
 * last "Final Answer:" or "Answer:" line, else the last number or simple
 * fraction, else the whole text trimmed.
 */
export function extractFinalAnswer(text: string): string {
  const boxed = lastCapture(BOXED, text);
  if (boxed !== undefined) return tidy(boxed);

  const stated = lastCapture(FINAL_ANSWER, text) ?? lastCapture(ANSWER_LINE, text);
  if (stated !== undefined) return tidy(stated);

  const number = lastCapture(NUMBER, text);
  if (number !== undefined) return number;

  return text.trim();
}

/**
 * First numeric literal in `text`, ignoring thousands separators. Simple
 * fractions such as "3/4" are evaluated.
 */
export function parseNumber(text: string): number | null {
  const cleaned = text.replace(/(\d),(?=\d{3}\b)/g, '$1');
  const match = NUMERIC_LITERAL.exec(cleaned);
  if (!match) return null;

  const value = Number(match[1]);
  if (match[2] === undefined) return value;

  const divisor = Number(match[2]);
  return divisor === 0 ? null : value / divisor;
}

/** Relative comparison with an absolute floor, so 0.1 + 0.2 equals 0.3. */
export function numbersEqual(a: number, b: number, tolerance: number = 1e-6): boolean {
  return Math.abs(a - b) <= tolerance * Math.max(1, Math.abs(a), Math.abs(b));
}

/**
 * Parse the outermost JSON object or array embedded in a reply, which models
 * tend to wrap in prose or code fences. Returns undefined when none parses.
 */
export function extractJsonBlock(text: string, kind: 'object' | 'array'): unknown {
  const [open, close] = kind === 'object' ? ['{', '}'] : ['[', ']'];
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  if (start === -1 || end <= start) return undefined;

  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return undefined;
  }
}
