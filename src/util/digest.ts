import { createHash } from 'node:crypto';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function canonicalize(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }
  if (!isPlainObject(value)) {
    return JSON.stringify(value) ?? 'null';
  }
  // Keys holding undefined are dropped, as JSON.stringify does.
  const encoded = Object.keys(value)
    .filter((key) => value[key] !== undefined)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${canonicalize(value[key])}`);
  return `{${encoded.join(',')}}`;
}

/**
 * JSON with object keys in sorted order, so equal values encode identically.
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}

/** Hex sha256 of the canonical JSON encoding. */
export function digestOf(value: unknown): string {
  return createHash('sha256').update(canonicalize(value), 'utf8').digest('hex');
}
