// stats.ts: Global connection and outcome counters (singleton)
// Exposed through the server status and logged on shutdown.

import type { OutcomeKind } from "./protocol.js";

interface ServerStats {
  connections: { opened: number; closed: number };
  frames: number;
  framing_errors: number;
  outcomes: Record<OutcomeKind, number>;
}

function emptyStats(): ServerStats {
  return {
    connections: { opened: 0, closed: 0 },
    frames: 0,
    framing_errors: 0,
    outcomes: { handled: 0, unrecognized: 0, handler_failed: 0, cancelled: 0, rejected: 0 },
  };
}

let _stats: ServerStats = emptyStats();

export function recordConnection(event: "opened" | "closed"): void {
  _stats.connections[event]++;
}

export function recordFrame(): void {
  _stats.frames++;
}

export function recordFramingError(): void {
  _stats.framing_errors++;
}

export function recordOutcome(kind: OutcomeKind): void {
  _stats.outcomes[kind]++;
}

export function getStats(): ServerStats & { connections: { open: number } } {
  return {
    connections: {
      ..._stats.connections,
      open: _stats.connections.opened - _stats.connections.closed,
    },
    frames: _stats.frames,
    framing_errors: _stats.framing_errors,
    outcomes: { ..._stats.outcomes },
  };
}

/** Reset all counters (tests). */
export function resetStats(): void {
  _stats = emptyStats();
}
