import { describe, expect, it } from "vitest";
import { isObject, isPlainObject, isRecord } from "@merkle-doc/utils/types";

describe("types", () => {
  it("isRecord accepts objects and arrays", () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(true);
    expect(isRecord(null)).toBe(false);
    expect(isRecord("x")).toBe(false);
  });

  it("isObject rejects arrays", () => {
    expect(isObject({})).toBe(true);
    expect(isObject([])).toBe(false);
    expect(isObject(null)).toBe(false);
  });

  it("isPlainObject rejects class instances", () => {
    expect(isPlainObject({ a: 1 })).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject(JSON.parse('{"a":1}'))).toBe(true);
    expect(isPlainObject(new Uint8Array(2))).toBe(false);
    expect(isPlainObject(new Date(0))).toBe(false);
    expect(isPlainObject([])).toBe(false);
  });
});
