/**
 * Order-independent JSON serialization.
 *
 * Object keys are sorted recursively and `undefined` members are dropped, so
 * two mappings holding the same entries serialize to the same string no
 * matter how they were built.
 */

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(item => (item === undefined ? null : normalize(item)));
  }

  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, item] of entries) {
      sorted[key] = normalize(item);
    }
    return sorted;
  }

  return value;
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(normalize(value));
}
