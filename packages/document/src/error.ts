import type { DecodeError, DepthLimitError, ToJSON } from "./interface.ts";

export const missingHash = (): ToJSON<DecodeError> =>
  new TheDecodeError("missing", "", "Link has no hash");

export const malformedHash = (
  source: string,
  cause: unknown,
): ToJSON<DecodeError> =>
  new TheDecodeError(
    "malformed",
    source,
    `Link hash "${source}" is not a valid content identifier`,
    cause,
  );

export const depthLimit = (
  path: string,
  limit: number,
): ToJSON<DepthLimitError> => new TheDepthLimitError(path, limit);

export class TheDecodeError extends Error implements DecodeError {
  override name = "DecodeError" as const;
  constructor(
    public reason: "missing" | "malformed",
    public source: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
  }

  toJSON(): DecodeError {
    return {
      name: this.name,
      stack: this.stack ?? "",
      message: this.message,
      reason: this.reason,
      source: this.source,
    };
  }
}

/**
 * Raised when a document nests containers deeper than a traversal allows.
 * `path` is the slash-joined location of the first container past the limit.
 */
export class TheDepthLimitError extends Error implements DepthLimitError {
  override name = "DepthLimitError" as const;
  constructor(public path: string, public limit: number) {
    super(
      `Document nests deeper than ${limit} levels at "${path}"`,
    );
  }

  toJSON(): DepthLimitError {
    return {
      name: this.name,
      stack: this.stack ?? "",
      message: this.message,
      path: this.path,
      limit: this.limit,
    };
  }
}
