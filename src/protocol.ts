// Wire protocol definitions for the utterd command server
// Transport: Unix Domain Socket, UTF-8 text, one utterance per newline-terminated line.
// Fire-and-forget: the server never writes back to the peer.

export const TERMINATOR = Buffer.from("\n");

export const LIMITS = {
  MAX_FRAME_LENGTH: 16_384, // bytes buffered without a terminator before the connection is dropped
  RECEIVE_SIZE: 4_096,      // max bytes taken from the socket per read
  LISTEN_BACKLOG: 100,
  MAX_IN_FLIGHT: 32,        // concurrent commands per connection
} as const;

export const OUTCOME_KINDS = {
  HANDLED: "handled",
  UNRECOGNIZED: "unrecognized",
  HANDLER_FAILED: "handler_failed",
  CANCELLED: "cancelled",
  REJECTED: "rejected",
} as const;

export type OutcomeKind = (typeof OUTCOME_KINDS)[keyof typeof OUTCOME_KINDS];

export interface HandledOutcome {
  kind: "handled";
  pattern: string;
  durationMs: number;
}

export interface UnrecognizedOutcome {
  kind: "unrecognized";
  reason: "no_match" | "invalid_utf8";
  text: string;
  message: string;
}

export interface HandlerFailedOutcome {
  kind: "handler_failed";
  pattern: string;
  cause: unknown;
}

export interface CancelledOutcome {
  kind: "cancelled";
  pattern: string;
}

export interface RejectedOutcome {
  kind: "rejected";
  reason: "saturated";
  text: string;
}

export type Outcome =
  | HandledOutcome
  | UnrecognizedOutcome
  | HandlerFailedOutcome
  | CancelledOutcome
  | RejectedOutcome;

// Factory helpers

export function handled(pattern: string, durationMs: number): HandledOutcome {
  return { kind: "handled", pattern, durationMs };
}

export function unrecognized(
  text: string,
  message: string,
  reason: UnrecognizedOutcome["reason"] = "no_match",
): UnrecognizedOutcome {
  return { kind: "unrecognized", reason, text, message };
}

export function handlerFailed(pattern: string, cause: unknown): HandlerFailedOutcome {
  return { kind: "handler_failed", pattern, cause };
}

export function cancelled(pattern: string): CancelledOutcome {
  return { kind: "cancelled", pattern };
}

export function rejected(text: string): RejectedOutcome {
  return { kind: "rejected", reason: "saturated", text };
}

// Type guard
export function isFailure(outcome: Outcome): outcome is HandlerFailedOutcome {
  return outcome.kind === "handler_failed";
}

/** Encode one utterance as a wire line. Embedded terminators are not representable. */
export function encodeLine(text: string): Buffer {
  if (text.includes("\n")) {
    throw new Error("Command text must not contain a newline");
  }
  return Buffer.from(text + "\n", "utf-8");
}

// ignoreBOM keeps a leading U+FEFF in the text instead of stripping it
const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** Strict UTF-8 decode; returns null for malformed input. */
export function decodeFrame(frame: Uint8Array): string | null {
  try {
    return utf8.decode(frame);
  } catch {
    return null;
  }
}
