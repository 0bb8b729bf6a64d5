import { SerializationError, describeError } from './sync.errors';
import { stableStringify } from './utils/stableStringify';

export type DiffOutcome = 'new' | 'changed' | 'unchanged';

export function decodeDocument(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new SerializationError(`malformed cached document: ${describeError(error)}`, error);
  }
}

/**
 * Both sides are compared through `stableStringify`, so object key order never
 * matters while array order and exact text always do. `stored` is the decoded
 * document, or null/undefined when nothing usable is cached.
 */
export function compareRecords(candidate: unknown, stored: unknown): DiffOutcome {
  if (stored === null || stored === undefined) return 'new';
  return stableStringify(candidate) === stableStringify(stored) ? 'unchanged' : 'changed';
}
