/**
 * Option helpers for reading loosely-shaped upstream JSON.
 * `none()` means the field is absent or of the wrong type.
 */

export type Option<T> = { readonly some: true; readonly value: T } | { readonly some: false };

export type JsonObject = Record<string, unknown>;

export function some<T>(value: T): Option<T> {
  return { some: true, value };
}

export function none<T>(): Option<T> {
  return { some: false };
}

export function getOrElse<T>(option: Option<T>, fallback: T): T {
  return option.some ? option.value : fallback;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(source: unknown, key: string): Option<string> {
  if (!isJsonObject(source)) return none();
  const value = source[key];
  return typeof value === 'string' ? some(value) : none();
}

/** Reads a finite, non-negative integer. */
export function readCount(source: unknown, key: string): Option<number> {
  if (!isJsonObject(source)) return none();
  const value = source[key];
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? some(value) : none();
}

export function readObject(source: unknown, key: string): Option<JsonObject> {
  if (!isJsonObject(source)) return none();
  const value = source[key];
  return isJsonObject(value) ? some(value) : none();
}

export function readArray(source: unknown, key: string): Option<unknown[]> {
  if (!isJsonObject(source)) return none();
  const value = source[key];
  return Array.isArray(value) ? some(value) : none();
}
