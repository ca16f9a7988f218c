/**
 * Deterministic JSON stringify:
 * - Sorts object keys recursively
 * - Preserves array order
 *
 * Reports written by the CLI go through this so CI diffs stay stable.
 */
export function stableStringify(value: unknown, space: number = 2): string {
  return JSON.stringify(sortKeysDeep(value), null, space) + '\n';
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function sortKeysDeep(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(sortKeysDeep);
  if (!isPlainObject(v)) return v;

  const out: Record<string, unknown> = {};
  for (const k of Object.keys(v).sort()) {
    out[k] = sortKeysDeep(v[k]);
  }
  return out;
}
