import type { MultihashDigest } from "multiformats";

export type { MultihashDigest };

/**
 * Leaf value of a document. Anything that is not a plain object or an array
 * is opaque to traversal (byte strings, big integers, a decoder's CID
 * instances).
 */
export type Scalar =
  | string
  | number
  | boolean
  | null
  | bigint
  | Uint8Array
  | object;

export type Value = Scalar | Node | Value[];

/**
 * One decoded document snapshot: a plain object mapping string keys to
 * values.
 */
export interface Node {
  [key: string]: Value;
}

/**
 * Merkle-link to another block:
 *
 * ```json
 * { "/": "QmZku7..." }
 * ```
 *
 * A link has exactly one key. To attach properties to a link, nest it inside
 * a larger map.
 */
export type Link = { "/": string };

/**
 * Closed view of a value used for traversal dispatch.
 */
export type Kind =
  | { kind: "map"; value: Node }
  | { kind: "list"; value: Value[] }
  | { kind: "scalar"; value: Scalar };

export type PathSegment = string | number;

export type Path = readonly PathSegment[];

export type Token =
  | { type: "start-map" }
  | { type: "key"; key: string }
  | { type: "end-map" }
  | { type: "start-array" }
  | { type: "index"; index: number }
  | { type: "end-array" }
  | { type: "value"; value: Scalar };

export type TokenType = Token["type"];

/**
 * What a traversal callback wants to happen next.
 *
 * - `continue` keeps going.
 * - `skip` leaves out whatever the current token introduces.
 * - `abort` ends the traversal without an error.
 */
export type Control = "continue" | "skip" | "abort";

/**
 * Return value of a traversal callback. `undefined` means continue; a
 * `Fail` ends the traversal and becomes its result.
 */
export type Step<E extends Error = Error> = Control | Fail<E> | void;

export type WalkVisitor<E extends Error = Error> = (
  root: Node,
  current: Node,
  path: string,
  error?: DepthLimitError,
) => Step<E>;

export type WalkOutcome = "completed" | "aborted";

export type ReadCallback<E extends Error = Error> = (
  path: Path,
  token: Token,
) => Step<E>;

export interface TraversalOptions {
  /**
   * Deepest container nesting a traversal will enter. The root is at
   * depth 0.
   */
  maxDepth?: number;
}

export type LinkIndex = Map<string, Link>;

export type Unit = NonNullable<unknown>;

export type Result<T extends Unit = Unit, E extends Error = Error> =
  | Ok<T>
  | Fail<E>;

export interface Ok<T extends Unit> {
  ok: T;
  /**
   * Discriminant to differentiate between Ok and Fail.
   */
  error?: undefined;
}

export interface Fail<E extends Error> {
  error: E;
  /**
   * Discriminant to differentiate between Ok and Fail.
   */
  ok?: undefined;
}

export interface DecodeError extends Error {
  name: "DecodeError";
  /**
   * `missing` when the link holds no identifier, `malformed` when it does
   * not decode.
   */
  reason: "missing" | "malformed";
  source: string;
}

export interface DepthLimitError extends Error {
  name: "DepthLimitError";
  path: string;
  limit: number;
}

export type ToJSON<T> = T & { toJSON(): T };
