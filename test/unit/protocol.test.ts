import { describe, it, expect } from "vitest";
import {
  LIMITS,
  OUTCOME_KINDS,
  TERMINATOR,
  cancelled,
  decodeFrame,
  encodeLine,
  handled,
  handlerFailed,
  isFailure,
  rejected,
  unrecognized,
} from "../../src/protocol.js";

describe("LIMITS", () => {
  it("has the documented defaults", () => {
    expect(LIMITS.MAX_FRAME_LENGTH).toBe(16384);
    expect(LIMITS.RECEIVE_SIZE).toBe(4096);
    expect(LIMITS.LISTEN_BACKLOG).toBe(100);
    expect(LIMITS.MAX_IN_FLIGHT).toBe(32);
  });

  it("uses a newline terminator", () => {
    expect(TERMINATOR.toString()).toBe("\n");
  });
});

describe("outcome factories", () => {
  it("build each outcome kind", () => {
    expect(handled('"ok"', 3)).toEqual({ kind: OUTCOME_KINDS.HANDLED, pattern: '"ok"', durationMs: 3 });
    expect(unrecognized("hm", "no match")).toEqual({
      kind: "unrecognized",
      reason: "no_match",
      text: "hm",
      message: "no match",
    });
    expect(unrecognized("?", "bad bytes", "invalid_utf8").reason).toBe("invalid_utf8");
    expect(cancelled('"hold"')).toEqual({ kind: "cancelled", pattern: '"hold"' });
    expect(rejected("ok")).toEqual({ kind: "rejected", reason: "saturated", text: "ok" });
  });

  it("isFailure only matches handler failures", () => {
    expect(isFailure(handlerFailed('"boom"', new Error("x")))).toBe(true);
    expect(isFailure(handled('"ok"', 0))).toBe(false);
    expect(isFailure(cancelled('"ok"'))).toBe(false);
  });
});

describe("encodeLine", () => {
  it("appends the terminator", () => {
    expect(encodeLine("say alpha").toString("utf-8")).toBe("say alpha\n");
  });

  it("encodes as UTF-8", () => {
    expect(encodeLine("é")).toEqual(Buffer.from([0xc3, 0xa9, 0x0a]));
  });

  it("rejects embedded newlines", () => {
    expect(() => encodeLine("a\nb")).toThrow("Command text must not contain a newline");
  });
});

describe("decodeFrame", () => {
  it("decodes valid UTF-8", () => {
    expect(decodeFrame(Buffer.from("write café", "utf-8"))).toBe("write café");
  });

  it("keeps a leading byte order mark", () => {
    expect(decodeFrame(Buffer.from([0xef, 0xbb, 0xbf, 0x61]))).toBe("\uFEFFa");
  });

  it("returns null for malformed input", () => {
    expect(decodeFrame(Buffer.from([0x61, 0xff]))).toBeNull();
    expect(decodeFrame(Buffer.from([0xc3]))).toBeNull();
  });
});
