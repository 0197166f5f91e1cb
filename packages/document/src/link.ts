import { CID } from "multiformats/cid";
import { base58btc } from "multiformats/bases/base58";
import * as Digest from "multiformats/hashes/digest";
import { deepEqual } from "@merkle-doc/utils/deep-equal";
import { isPlainObject } from "@merkle-doc/utils/types";
import { getLogger } from "@merkle-doc/utils/logger";
import type {
  DecodeError,
  Kind,
  Link,
  MultihashDigest,
  Node,
  Result,
  Value,
} from "./interface.ts";
import * as Error from "./error.ts";
import { fromString, refer } from "./reference.ts";

const logger = getLogger("document", { enabled: false, level: "debug" });

/**
 * Key that marks a merkle-link.
 */
export const LINK_KEY = "/" as const;

export const isNode = (value: unknown): value is Node => isPlainObject(value);

export const classify = (value: Value): Kind => {
  if (Array.isArray(value)) {
    return { kind: "list", value };
  } else if (isNode(value)) {
    return { kind: "map", value };
  } else {
    return { kind: "scalar", value };
  }
};

/**
 * A link is a map with the single key `"/"` holding a string. Maps with
 * sibling keys next to `"/"`, or whose `"/"` holds anything else, are plain
 * maps.
 */
export const isLink = (value: unknown): value is Link =>
  isNode(value) && Object.keys(value).length === 1 &&
  typeof value[LINK_KEY] === "string";

/**
 * Returns a copy of `value` as a link, or `undefined` if it is not one.
 */
export const linkCast = (value: unknown): Link | undefined =>
  isLink(value) ? { [LINK_KEY]: value[LINK_KEY] } : undefined;

/**
 * The identifier under `"/"`, or `""` when there is none.
 */
export const linkString = (link: Node): string => {
  const source = link[LINK_KEY];
  return typeof source === "string" ? source : "";
};

const decoders: ((source: string) => MultihashDigest)[] = [
  (source) => CID.parse(source).multihash,
  (source) => fromString(source).multihash,
  (source) => Digest.decode(base58btc.baseDecode(source)),
];

/**
 * Decodes the multihash a link points to. Accepts CID strings (v0 `Qm…` and
 * multibase-prefixed v1), merkle references as printed by {@link linkTo},
 * and base58btc-encoded raw multihashes.
 */
export const hash = (link: Node): Result<MultihashDigest, DecodeError> => {
  const source = linkString(link);
  if (source === "") {
    return { error: Error.missingHash() };
  }

  let reason: unknown;
  for (const decode of decoders) {
    try {
      return { ok: decode(source) };
    } catch (error) {
      reason ??= error;
    }
  }
  logger.debug(() => ["hash decode failed", source, reason]);
  return { error: Error.malformedHash(source, reason) };
};

/**
 * Structural comparison, independent of key order.
 */
export const equal = (left: Node, right: Node): boolean =>
  deepEqual(left, right);

/**
 * Creates a link to the merkle reference of `value`.
 */
export const linkTo = (value: Value): Link => ({
  [LINK_KEY]: refer(value).toString(),
});
