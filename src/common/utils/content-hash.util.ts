import { createHash } from 'crypto';

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : normalize(item)));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, item] of entries) {
      if (item !== undefined) {
        sorted[key] = normalize(item);
      }
    }
    return sorted;
  }
  return value;
}

/**
 * JSON encoding with object keys sorted at every depth, so that two values
 * with the same content always encode to the same string.
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(normalize(value)) ?? 'null';
}

/**
 * SHA-256 over a set of values. Order of `items` does not affect the hash.
 */
export function computeContentHash(items: readonly unknown[]): string {
  const encoded = items.map(canonicalize).sort();
  return createHash('sha256').update(JSON.stringify(encoded)).digest('hex');
}
