import { getLogger } from "@merkle-doc/utils/logger";
import type {
  DepthLimitError,
  LinkIndex,
  Node,
  Result,
  TraversalOptions,
  Value,
  WalkOutcome,
  WalkVisitor,
} from "./interface.ts";
import { depthLimit } from "./error.ts";
import { classify, isNode, linkCast } from "./link.ts";
import { depthLimitOf, isFail, sortedKeys, unreachable } from "./control.ts";

const logger = getLogger("document", { enabled: false, level: "debug" });

type Entry = {
  value: Value;
  path: string;
  depth: number;
  /**
   * Closest map at or above this entry.
   */
  owner: Node;
};

const join = (path: string, segment: string | number) =>
  path === "" ? String(segment) : `${path}/${segment}`;

const isContainer = (value: Value) => Array.isArray(value) || isNode(value);

/**
 * Visits every map reachable from `root`, root first, depth first. Keys are
 * visited in code point order and list elements in stored order. The `path`
 * handed to `visit` joins the raw keys and indices with `/` without escaping.
 *
 * A map nested deeper than `maxDepth` is handed to `visit` together with a
 * {@link DepthLimitError} and is not descended into. Containers past the
 * limit inside a list are reported against the closest enclosing map.
 *
 * Runs on an explicit stack, so document depth never grows the call stack.
 */
export const walk = <E extends Error = never>(
  root: Node,
  visit: WalkVisitor<E>,
  options?: TraversalOptions,
): Result<WalkOutcome, E> => {
  const limit = depthLimitOf(options);
  const stack: Entry[] = [{ value: root, path: "", depth: 0, owner: root }];

  for (let entry = stack.pop(); entry !== undefined; entry = stack.pop()) {
    const { path, depth, owner } = entry;
    const view = classify(entry.value);
    if (view.kind === "scalar") continue;

    if (depth > limit) {
      logger.debug(() => ["depth limit reached at", path]);
      const current = view.kind === "map" ? view.value : owner;
      const step = visit(root, current, path, depthLimit(path, limit));
      if (step === "abort") return { ok: "aborted" };
      if (isFail(step)) return step;
      continue;
    }

    switch (view.kind) {
      case "map": {
        const step = visit(root, view.value, path);
        if (step === "abort") {
          logger.debug(() => ["walk aborted at", path]);
          return { ok: "aborted" };
        }
        if (isFail(step)) return step;
        if (step === "skip") break;

        const keys = sortedKeys(view.value);
        for (let index = keys.length - 1; index >= 0; index--) {
          const key = keys[index];
          const value = view.value[key];
          if (isContainer(value)) {
            stack.push({
              value,
              path: join(path, key),
              depth: depth + 1,
              owner: view.value,
            });
          }
        }
        break;
      }
      case "list": {
        for (let index = view.value.length - 1; index >= 0; index--) {
          const value = view.value[index];
          if (isContainer(value)) {
            stack.push({
              value,
              path: join(path, index),
              depth: depth + 1,
              owner,
            });
          }
        }
        break;
      }
      default:
        return unreachable(view);
    }
  }

  return { ok: "completed" };
};

/**
 * Collects every link in the document, keyed by the raw slash-joined path
 * that leads to it. The root itself is keyed by `""`.
 */
export const links = (
  node: Node,
  options?: TraversalOptions,
): Result<LinkIndex, DepthLimitError> => {
  const index: LinkIndex = new Map();
  const result = walk<DepthLimitError>(node, (_root, current, path, error) => {
    if (error) {
      return { error };
    }
    const link = linkCast(current);
    if (link) {
      index.set(path, link);
    }
  }, options);

  if (result.error) {
    return result;
  }
  return { ok: index };
};
