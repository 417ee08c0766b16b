import { describe, it, expect } from "vitest";
import { loadKeyTable, pronunciations } from "../../src/keys.js";

describe("key table", () => {
  it("maps spoken names to key names", () => {
    const keys = pronunciations();
    expect(keys.get("alpha")).toBe("a");
    expect(keys.get("x-ray")).toBe("x");
    expect(keys.get("page up")).toBe("Prior");
    expect(keys.get("function twelve")).toBe("F12");
  });

  it("includes modifiers", () => {
    expect(pronunciations().get("control")).toBe("ctrl");
    expect(pronunciations().get("command")).toBe("super");
  });

  it("is loaded once", () => {
    expect(loadKeyTable()).toBe(loadKeyTable());
  });
});
