import { describe, expect, test } from "vitest";
import { parseTodoId } from "./context.js";

describe("parseTodoId", () => {
  test("accepts plain and #-prefixed ids", () => {
    expect(parseTodoId("12")).toBe(12);
    expect(parseTodoId("#7")).toBe(7);
  });

  test("rejects missing, fractional and non-positive ids", () => {
    expect(parseTodoId(undefined)).toBeNull();
    expect(parseTodoId("")).toBeNull();
    expect(parseTodoId("1.5")).toBeNull();
    expect(parseTodoId("0")).toBeNull();
    expect(parseTodoId("abc")).toBeNull();
  });
});
