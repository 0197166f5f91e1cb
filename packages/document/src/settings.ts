/**
 * Deepest container nesting `walk`, `links` and `read` enter unless told
 * otherwise. Documents may come from untrusted peers.
 */
export const maxDepth = 1024;
