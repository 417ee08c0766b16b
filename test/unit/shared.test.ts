import { describe, it, expect, vi, afterEach } from "vitest";
import { columns, jsonOutput, textOutput } from "../../src/shared.js";
import { extractOption, getAllFlagValues, getPositionals } from "../../src/args.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("columns", () => {
  it("pads the left column to the widest entry", () => {
    expect(columns([["basic", "keys"], ["speech", "talk"]])).toBe("  basic   keys\n  speech  talk");
  });

  it("renders nothing for no rows", () => {
    expect(columns([])).toBe("");
  });
});

describe("output helpers", () => {
  it("writes pretty JSON followed by a newline", () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    jsonOutput({ ok: true });
    expect(write).toHaveBeenCalledWith('{\n  "ok": true\n}\n');
  });

  it("writes text followed by a newline", () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    textOutput("hello");
    expect(write).toHaveBeenCalledWith("hello\n");
  });
});

describe("arg helpers", () => {
  it("getPositionals skips flags and their values", () => {
    expect(getPositionals(["say", "--socket", "/tmp/x.sock", "alpha", "--json"])).toEqual(["say", "alpha"]);
  });

  it("extractOption returns the flag value", () => {
    expect(extractOption(["--mode", "660"], "--mode")).toBe("660");
    expect(extractOption(["serve"], "--mode")).toBeUndefined();
  });

  it("extractOption rejects a flag without a value", () => {
    expect(() => extractOption(["--socket"], "--socket")).toThrow("--socket requires a value");
  });

  it("getAllFlagValues collects repeated flags", () => {
    expect(getAllFlagValues(["--plugin", "basic", "x", "--plugin", "speech"], "--plugin")).toEqual(["basic", "speech"]);
  });
});
