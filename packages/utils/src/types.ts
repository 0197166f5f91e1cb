/**
 * Predicate for narrowing a `Record` type, with string, symbol, or number (arrays) keys.
 * @param value - The value to check
 * @returns True if the value is a record object
 */
export function isRecord(
  value: unknown,
): value is Record<string | number | symbol, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Predicate for narrowing a non-array/non-null `object` type.
 */
export function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Predicate for objects created by a literal, `Object.create(null)` or
 * `JSON.parse`. Class instances (byte arrays, dates, CIDs) do not qualify.
 */
export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  if (!isObject(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
