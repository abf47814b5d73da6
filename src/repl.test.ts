import { describe, it, expect } from "vitest";
import { isComplete } from "./repl.js";

describe("isComplete", () => {
  it("should accept balanced input", () => {
    expect(isComplete("var x = 1")).toBe(true);
    expect(isComplete("func f() {\n  return 1\n}")).toBe(true);
  });

  it("should wait for closing brackets", () => {
    expect(isComplete("func f() {")).toBe(false);
    expect(isComplete("[1, 2")).toBe(false);
  });

  it("should ignore brackets inside quotes", () => {
    expect(isComplete('"{"')).toBe(true);
    expect(isComplete("'dir(")).toBe(false);
  });
});
