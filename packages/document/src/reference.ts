import * as Reference from "merkle-reference";

/**
 * Compute the merkle reference of a value. The reference prints as a
 * multibase CID string carrying a sha2-256 multihash.
 */
export const refer = <T>(source: T): Reference.View<T> =>
  Reference.refer(source);

/**
 * Parses the string form of a merkle reference.
 */
export const fromString = (source: string) =>
  Reference.fromString(source);
