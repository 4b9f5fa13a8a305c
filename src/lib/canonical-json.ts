/**
 * Deterministic JSON serialization: object keys sorted recursively, array order kept.
 */

type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

function canonicalize(value: unknown): Json | undefined {
  if (value === null) return null;
  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item) ?? null);
  }
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return value;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new TypeError(`Cannot serialize non-finite number: ${String(value)}`);
      }
      return value;
    case 'object': {
      const out: { [key: string]: Json } = {};
      const entries: Array<[string, unknown]> = Object.entries(value);
      entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      for (const [key, raw] of entries) {
        const child = canonicalize(raw);
        if (child !== undefined) out[key] = child;
      }
      return out;
    }
    default:
      // undefined, functions and symbols are dropped like JSON.stringify does.
      return undefined;
  }
}

/** Serialize with sorted keys, two-space indent and a trailing newline. */
export function canonicalJson(value: unknown): string {
  return `${JSON.stringify(canonicalize(value) ?? null, null, 2)}\n`;
}
