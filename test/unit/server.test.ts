import { describe, it, expect } from "vitest";
import { isStaleEndpointError } from "../../src/server.js";

describe("isStaleEndpointError", () => {
  it("treats refused and missing endpoints as stale", () => {
    expect(isStaleEndpointError("ECONNREFUSED")).toBe(true);
    expect(isStaleEndpointError("ENOENT")).toBe(true);
  });

  it("leaves a busy or unreadable endpoint alone", () => {
    expect(isStaleEndpointError("EAGAIN")).toBe(false);
    expect(isStaleEndpointError("EACCES")).toBe(false);
    expect(isStaleEndpointError(undefined)).toBe(false);
  });
});
