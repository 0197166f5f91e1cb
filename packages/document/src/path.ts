import type { Path, PathSegment, Value } from "./interface.ts";
import { classify } from "./link.ts";
import { unreachable } from "./control.ts";

export const SEPARATOR = "/";
export const ESCAPE = "\\";

const INDEX = /^(0|[1-9][0-9]*)$/;

/**
 * Splits a path on `/`. A backslash makes the character after it literal, so
 * `a\/b` names the single key `a/b` and `\\@x` the key `\@x`. Empty segments
 * are dropped.
 */
export const parsePath = (path: string): string[] => {
  const segments: string[] = [];
  let segment = "";
  for (let offset = 0; offset < path.length; offset++) {
    const char = path[offset];
    if (char === ESCAPE && offset + 1 < path.length) {
      segment += path[++offset];
    } else if (char === SEPARATOR) {
      if (segment !== "") segments.push(segment);
      segment = "";
    } else {
      segment += char;
    }
  }
  if (segment !== "") segments.push(segment);
  return segments;
};

/**
 * Inverse of {@link parsePath} for non-empty segments.
 */
export const formatPath = (segments: Path): string =>
  segments
    .map((segment) => String(segment).replace(/[\\/]/g, `${ESCAPE}$&`))
    .join(SEPARATOR);

const toIndex = (segment: PathSegment): number | undefined => {
  if (typeof segment === "number") {
    return Number.isSafeInteger(segment) && segment >= 0 ? segment : undefined;
  }
  if (!INDEX.test(segment)) return undefined;
  const index = Number(segment);
  return Number.isSafeInteger(index) ? index : undefined;
};

const child = (value: Value, segment: PathSegment): Value | undefined => {
  const view = classify(value);
  switch (view.kind) {
    case "map": {
      const key = String(segment);
      return Object.hasOwn(view.value, key) ? view.value[key] : undefined;
    }
    case "list": {
      const index = toIndex(segment);
      return index !== undefined && index < view.value.length
        ? view.value[index]
        : undefined;
    }
    case "scalar":
      return undefined;
    default:
      return unreachable(view);
  }
};

/**
 * Resolves `path` against `node`. Returns `undefined` when any segment
 * misses: an absent key, a non-numeric or out of range index, or a scalar
 * with segments left over.
 *
 * Links met along the way are plain maps, so `{ "/": { "/": "Qm…" } }` under
 * `test` is reached as `test/\/`.
 */
export const get = (
  node: Value,
  path: string | Path,
): Value | undefined => {
  const segments = typeof path === "string" ? parsePath(path) : path;
  let current: Value = node;
  for (const segment of segments) {
    const next = child(current, segment);
    if (next === undefined) return undefined;
    current = next;
  }
  return current;
};
