export * from "./interface.ts";
export {
  classify,
  equal,
  hash,
  isLink,
  isNode,
  LINK_KEY,
  linkCast,
  linkString,
  linkTo,
} from "./link.ts";
export { ESCAPE, formatPath, get, parsePath, SEPARATOR } from "./path.ts";
export { links, walk } from "./walk.ts";
export { read } from "./read.ts";
export { compareKeys } from "./control.ts";
export { TheDecodeError, TheDepthLimitError } from "./error.ts";
export { refer } from "./reference.ts";
export * as Settings from "./settings.ts";
