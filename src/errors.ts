// errors.ts: Error classes for framing, grammar assembly, scopes and binding

export class FramingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FramingError";
  }
}

/** Accumulated frame data exceeded the bound without a terminator. */
export class FrameTooLongError extends FramingError {
  constructor(readonly length: number, readonly maxFrameLength: number) {
    super(`Frame too long: ${length} bytes buffered without terminator (max ${maxFrameLength})`);
    this.name = "FrameTooLongError";
  }
}

/** Peer closed the stream in the middle of a frame. */
export class IncompleteFrameError extends FramingError {
  constructor(readonly pending: number) {
    super(`Incomplete frame: stream closed with ${pending} unterminated bytes`);
    this.name = "IncompleteFrameError";
  }
}

export class GrammarError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source === undefined ? message : `${message} in pattern ${JSON.stringify(source)}`);
    this.name = "GrammarError";
  }
}

export class RegistryConflictError extends Error {
  constructor(readonly kind: "command" | "rule" | "transformer", readonly key: string, detail: string) {
    super(`Conflicting ${kind} "${key}": ${detail}`);
    this.name = "RegistryConflictError";
  }
}

export class RegistrySealedError extends Error {
  constructor(registry: string) {
    super(`Registry "${registry}" is sealed: its grammar has already been compiled`);
    this.name = "RegistrySealedError";
  }
}

export class ScopeClosedError extends Error {
  constructor() {
    super("Task scope is closed");
    this.name = "ScopeClosedError";
  }
}

export class BindError extends Error {
  constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
    super(`Cannot bind ${path}: ${message}`, options);
    this.name = "BindError";
  }
}

export class UnknownPluginError extends Error {
  constructor(readonly plugin: string, available: readonly string[]) {
    super(`Unknown plugin "${plugin}". Available: ${available.join(", ")}`);
    this.name = "UnknownPluginError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
