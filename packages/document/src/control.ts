import type { Fail, Step, TraversalOptions } from "./interface.ts";
import * as Settings from "./settings.ts";

export const isFail = <E extends Error>(step: Step<E>): step is Fail<E> =>
  typeof step === "object" && step !== null;

/**
 * Narrows a callback step to the outcomes that end a traversal.
 */
export const halt = <E extends Error>(
  step: Step<E>,
): "abort" | Fail<E> | undefined =>
  step === "abort" ? step : isFail(step) ? step : undefined;

/**
 * Orders map keys by code point, which matches the byte order of their
 * UTF-8 encoding.
 */
export const compareKeys = (left: string, right: string): number => {
  const length = Math.min(left.length, right.length);
  for (let offset = 0; offset < length; offset++) {
    const a = left.charCodeAt(offset);
    const b = right.charCodeAt(offset);
    if (a !== b) {
      return codePointRank(a) - codePointRank(b);
    }
  }
  return left.length - right.length;
};

// Surrogates stand for code points above U+FFFF.
const codePointRank = (unit: number): number =>
  unit >= 0xe000 ? unit - 0x800 : unit >= 0xd800 ? unit + 0x2000 : unit;

export const sortedKeys = (node: object): string[] =>
  Object.keys(node).sort(compareKeys);

/**
 * Depth limit a traversal runs with. Anything but a non-negative integer
 * falls back to the default.
 */
export const depthLimitOf = (options?: TraversalOptions): number => {
  const limit = options?.maxDepth;
  return limit !== undefined && Number.isInteger(limit) && limit >= 0
    ? limit
    : Settings.maxDepth;
};

export const unreachable = (value: never): never => {
  throw new TypeError(`Unexpected variant ${JSON.stringify(value)}`);
};
