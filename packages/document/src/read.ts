import { getLogger } from "@merkle-doc/utils/logger";
import type {
  DepthLimitError,
  Fail,
  Node,
  Path,
  ReadCallback,
  Result,
  TraversalOptions,
  Unit,
  Value,
} from "./interface.ts";
import { depthLimit } from "./error.ts";
import { classify } from "./link.ts";
import { depthLimitOf, halt, sortedKeys, unreachable } from "./control.ts";

const logger = getLogger("document", { enabled: false, level: "debug" });

/**
 * An announced container whose children are being emitted. `next` is the
 * position of the next child; the frame closes once it runs past the end.
 */
type Frame =
  | { kind: "map"; path: Path; node: Node; keys: string[]; next: number }
  | { kind: "list"; path: Path; list: Value[]; next: number };

type Stop<E extends Error> = "abort" | Fail<E | DepthLimitError>;

/**
 * Streams `node` to `callback` as tokens, depth first. Map keys come out in
 * code point order whatever order the object stores them in, so the same
 * document always produces the same token sequence. List elements come out
 * in stored order.
 *
 * `callback` steers the traversal:
 * - `"skip"` on `key` or `index` leaves out the value that follows; on
 *   `start-map` or `start-array` it leaves out the children, and the
 *   matching end token still follows.
 * - `"abort"` stops right away.
 * - A `Fail` stops right away and becomes the result.
 *
 * Skipping or aborting is a successful read. A container nested deeper than
 * `maxDepth` fails the read with a {@link DepthLimitError}.
 */
export const read = <E extends Error = never>(
  node: Value,
  callback: ReadCallback<E>,
  options?: TraversalOptions,
): Result<Unit, E | DepthLimitError> => {
  const limit = depthLimitOf(options);
  const stack: Frame[] = [];

  const enter = (value: Value, path: Path): Stop<E> | undefined => {
    const view = classify(value);
    switch (view.kind) {
      case "scalar":
        return halt(callback(path, { type: "value", value: view.value }));
      case "map": {
        if (stack.length > limit) {
          return { error: depthLimit(path.join("/"), limit) };
        }
        const step = callback(path, { type: "start-map" });
        if (step === "skip") {
          return halt(callback(path, { type: "end-map" }));
        }
        const stop = halt(step);
        if (!stop) {
          stack.push({
            kind: "map",
            path,
            node: view.value,
            keys: sortedKeys(view.value),
            next: 0,
          });
        }
        return stop;
      }
      case "list": {
        if (stack.length > limit) {
          return { error: depthLimit(path.join("/"), limit) };
        }
        const step = callback(path, { type: "start-array" });
        if (step === "skip") {
          return halt(callback(path, { type: "end-array" }));
        }
        const stop = halt(step);
        if (!stop) {
          stack.push({ kind: "list", path, list: view.value, next: 0 });
        }
        return stop;
      }
      default:
        return unreachable(view);
    }
  };

  const advance = (frame: Frame): Stop<E> | undefined => {
    switch (frame.kind) {
      case "map": {
        if (frame.next >= frame.keys.length) {
          stack.pop();
          return halt(callback(frame.path, { type: "end-map" }));
        }
        const key = frame.keys[frame.next++];
        const step = callback(frame.path, { type: "key", key });
        if (step === "skip") return undefined;
        return halt(step) ?? enter(frame.node[key], [...frame.path, key]);
      }
      case "list": {
        if (frame.next >= frame.list.length) {
          stack.pop();
          return halt(callback(frame.path, { type: "end-array" }));
        }
        const index = frame.next++;
        const step = callback(frame.path, { type: "index", index });
        if (step === "skip") return undefined;
        return halt(step) ?? enter(frame.list[index], [...frame.path, index]);
      }
      default:
        return unreachable(frame);
    }
  };

  let stop = enter(node, []);
  for (let frame = stack.at(-1); !stop && frame; frame = stack.at(-1)) {
    stop = advance(frame);
  }

  if (stop === "abort") {
    logger.debug("read aborted");
  } else if (stop) {
    return stop;
  }
  return { ok: {} };
};
