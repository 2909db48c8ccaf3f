/**
 * Accessors for untyped API objects as they arrive from watch streams.
 */

export type Json = Record<string, unknown>;

export function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Walks `path` through nested records; undefined as soon as a step is missing. */
export function dig(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function str(value: unknown, fallback = ''): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fallback;
}

export function num(value: unknown, fallback = 0): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function records(value: unknown): Json[] {
  return list(value).filter(isRecord);
}

export function objectName(obj: unknown): string {
  return str(dig(obj, 'metadata', 'name'));
}

export function objectNamespace(obj: unknown): string {
  return str(dig(obj, 'metadata', 'namespace'));
}

/** Identity used by informer caches: `namespace/name`, or `name` when cluster-scoped. */
export function objectKey(obj: unknown): string {
  const ns = objectNamespace(obj);
  const name = objectName(obj);
  return ns ? `${ns}/${name}` : name;
}
