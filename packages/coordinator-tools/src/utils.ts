/**
 * Shared value helpers for validation and dispatch.
 */

import { createHash } from 'node:crypto';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively freeze objects and arrays in place.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Detached copy of a value for storage in an immutable record.
 *
 * Values structuredClone cannot copy (functions, class instances with
 * private state) fall back to their JSON form, then to their string form.
 */
export function snapshotValue(value: unknown): unknown {
  try {
    return structuredClone(value);
  } catch {
    try {
      const json = JSON.stringify(value);
      return json === undefined ? String(value) : JSON.parse(json);
    } catch {
      return String(value);
    }
  }
}

/**
 * md5 fingerprint of a JSON-shaped value. Key order is significant;
 * `undefined` members are encoded so `{a: undefined}` differs from `{}`.
 * Returns null for values that cannot be serialized.
 */
export function fingerprint(value: unknown): string | null {
  let serialized: string | undefined;
  try {
    serialized = JSON.stringify(value, (_key, member: unknown) => (member === undefined ? '\u0000undefined' : member));
  } catch {
    return null;
  }
  if (serialized === undefined) {
    return null;
  }
  return createHash('md5').update(serialized).digest('hex');
}

/**
 * Render a value for an error message (`actual` fields).
 */
export function describeValue(value: unknown): string {
  if (value === undefined) {
    return 'undefined';
  }
  if (typeof value === 'string') {
    return value.length > 60 ? `"${value.slice(0, 57)}..."` : `"${value}"`;
  }
  if (Array.isArray(value)) {
    return `array(${value.length})`;
  }
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'object') {
    return 'object';
  }
  return String(value);
}

/**
 * Levenshtein edit distance.
 */
export function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min((previous[j] ?? 0) + 1, (current[j - 1] ?? 0) + 1, (previous[j - 1] ?? 0) + cost);
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}
