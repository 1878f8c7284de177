/**
 * Helpers for turning raw benchmark tool output into metrics.
 */

import { ParseError } from './errors.js';
import { isRecord } from '../../src/utils/env-config.js';

const SNIPPET_LENGTH = 500;

export function snippet(output: string, length = SNIPPET_LENGTH): string {
  return output.length > length ? `${output.slice(0, length)}...` : output;
}

/**
 * Index just past the balanced object starting at `start`, or -1.
 * Braces inside string literals are ignored.
 */
function objectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return i + 1;
      }
    }
  }
  return -1;
}

/**
 * Decodes the first JSON object embedded in `output`, ignoring log lines
 * before it and any bytes after it.
 *
 * @throws ParseError carrying the start of the output
 */
export function extractJsonObject(output: string): Record<string, unknown> {
  let start = output.indexOf('{');
  while (start !== -1) {
    const end = objectEnd(output, start);
    if (end !== -1) {
      try {
        const decoded: unknown = JSON.parse(output.slice(start, end));
        if (isRecord(decoded)) {
          return decoded;
        }
      } catch {
        // not JSON at this brace, keep scanning
      }
    }
    start = output.indexOf('{', start + 1);
  }

  throw new ParseError('No JSON object found in benchmark output', snippet(output));
}

/**
 * Number at a nested path, or null when absent or not numeric
 */
export function numberAt(value: unknown, path: string[]): number | null {
  let current: unknown = value;
  for (const key of path) {
    if (!isRecord(current)) {
      return null;
    }
    current = current[key];
  }
  return typeof current === 'number' && Number.isFinite(current) ? current : null;
}

/**
 * Captured groups of `pattern` as numbers
 *
 * @throws ParseError when the pattern does not match
 */
export function matchNumbers(output: string, pattern: RegExp, what: string): number[] {
  const match = pattern.exec(output);
  if (!match) {
    throw new ParseError(`Could not find ${what} in benchmark output`, snippet(output));
  }
  return match.slice(1).map(group => Number(group));
}

export function optionalNumbers(output: string, pattern: RegExp): number[] | null {
  const match = pattern.exec(output);
  return match ? match.slice(1).map(group => Number(group)) : null;
}
