import { afterEach, describe, expect, it, vi } from "vitest";
import { getEnv } from "../src/env.ts";

describe("env", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads variables from the process environment", () => {
    vi.stubEnv("MERKLE_DOC_TEST_VAR", "value");
    expect(getEnv("MERKLE_DOC_TEST_VAR")).toBe("value");
  });

  it("treats empty variables as unset", () => {
    vi.stubEnv("MERKLE_DOC_TEST_VAR", "");
    expect(getEnv("MERKLE_DOC_TEST_VAR")).toBeUndefined();
  });
});
