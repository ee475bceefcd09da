/**
 * Pure helpers for combining, trimming and comparing KeyValues.
 */
import type { KeyValues, SecretObject } from './types.js';

/** Overlay `incoming` onto `stored`: supplied keys win, other stored keys survive. */
export function mergeKeyValues(stored: KeyValues, incoming: KeyValues): KeyValues {
  return { ...stored, ...incoming };
}

/** Copy of `data` without the keys named in `remove`. Values in `remove` are ignored. */
export function withoutKeys(data: KeyValues, remove: KeyValues): KeyValues {
  return Object.fromEntries(Object.entries(data).filter(([key]) => !Object.hasOwn(remove, key)));
}

/** Byte-wise equality of two KeyValues. */
export function keyValuesEqual(a: KeyValues, b: KeyValues): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => {
    if (!Object.hasOwn(b, key)) return false;
    const other = b[key];
    const value = a[key];
    return value !== undefined && other !== undefined && value.equals(other);
  });
}

function stringMapsEqual(a: Record<string, string>, b: Record<string, string>): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => Object.hasOwn(b, key) && a[key] === b[key]);
}

/** Content equality of two objects, ignoring resourceVersion. */
export function secretObjectsEqual(a: SecretObject, b: SecretObject): boolean {
  return (
    a.name === b.name &&
    a.namespace === b.namespace &&
    a.type === b.type &&
    stringMapsEqual(a.labels, b.labels) &&
    stringMapsEqual(a.annotations, b.annotations) &&
    keyValuesEqual(a.data, b.data)
  );
}

/** Deep copy so callers never share Buffers with a store. */
export function cloneKeyValues(data: KeyValues): KeyValues {
  return Object.fromEntries(
    Object.entries(data).map(([key, value]) => [key, Buffer.from(value)]),
  );
}
