// dispatcher.ts: Per-connection frame loop with concurrent command execution
//
// Every frame is spawned into the connection's TaskScope without being awaited, so a
// slow handler never holds up the next line. End of stream joins outstanding work;
// a framing or read error cancels it.

import type { Duplex } from "node:stream";
import type { Logger } from "pino";
import { FrameReceiver, streamSource } from "./framing.js";
import { TaskScope, Semaphore } from "./scope.js";
import { FramingError, errorMessage } from "./errors.js";
import { LIMITS, decodeFrame, rejected, unrecognized } from "./protocol.js";
import { logger as rootLogger } from "./logger.js";
import { recordConnection, recordFrame, recordFramingError } from "./stats.js";
import type { CommandProcessor } from "./processor.js";

export type SaturationPolicy = "wait" | "drop";

export interface DispatcherOptions {
  maxFrameLength?: number;
  /** Commands allowed to run concurrently on one connection. */
  maxInFlight?: number;
  /** What to do with a new command while maxInFlight are running. */
  saturationPolicy?: SaturationPolicy;
}

let _connectionSeq = 0;

function nextConnectionId(): string {
  return `conn-${++_connectionSeq}`;
}

export class ConnectionDispatcher {
  private readonly maxFrameLength: number;
  private readonly maxInFlight: number;
  private readonly saturationPolicy: SaturationPolicy;

  constructor(private readonly processor: CommandProcessor, opts: DispatcherOptions = {}) {
    this.maxFrameLength = opts.maxFrameLength ?? LIMITS.MAX_FRAME_LENGTH;
    this.maxInFlight = opts.maxInFlight ?? LIMITS.MAX_IN_FLIGHT;
    this.saturationPolicy = opts.saturationPolicy ?? "wait";
  }

  /**
   * Serve one connection until the peer closes it, a framing error occurs or
   * `parent` is aborted. Never rejects; the connection is destroyed on return.
   */
  async handle(connection: Duplex, parent?: AbortSignal): Promise<void> {
    const connectionId = nextConnectionId();
    const log = rootLogger.child({ connection: connectionId });
    const scope = new TaskScope({
      parent,
      onError: (err) => log.error({ err }, "Command task failed outside the processor"),
    });
    const limiter = new Semaphore(this.maxInFlight);
    const receiver = new FrameReceiver(streamSource(connection), { maxFrameLength: this.maxFrameLength });

    // a cancelled scope must also unblock a pending read
    const onCancel = () => connection.destroy();
    scope.signal.addEventListener("abort", onCancel, { once: true });
    if (scope.cancelled) connection.destroy();
    // read errors surface through the frame loop; late ones after it ends land here
    connection.on("error", (err) => log.debug({ err }, "Connection error"));

    recordConnection("opened");
    log.debug("Connection opened");

    try {
      for await (const frame of receiver) {
        recordFrame();
        const admitted = await this.admit(limiter, scope);
        if (!admitted) {
          this.processor.report(rejected(frame.toString("utf-8")), connectionId, log);
          continue;
        }
        this.spawn(scope, limiter, frame, connectionId, log);
      }
      await scope.join();
      log.debug("Connection closed by peer");
    } catch (err) {
      this.logTeardown(err, scope, log);
      // drop the peer first: tasks that ignore their signal must not keep it open
      connection.destroy();
      await scope.close(err);
    } finally {
      scope.signal.removeEventListener("abort", onCancel);
      connection.destroy();
      recordConnection("closed");
    }
  }

  private async admit(limiter: Semaphore, scope: TaskScope): Promise<boolean> {
    if (this.saturationPolicy === "drop") return limiter.tryAcquire();
    await limiter.acquire();
    if (scope.cancelled) {
      limiter.release();
      throw scope.signal.reason;
    }
    return true;
  }

  private spawn(scope: TaskScope, limiter: Semaphore, frame: Buffer, connectionId: string, log: Logger): void {
    scope.spawn(async (signal) => {
      try {
        const text = decodeFrame(frame);
        if (text === null) {
          this.processor.report(
            unrecognized(frame.toString("utf-8"), "Frame is not valid UTF-8", "invalid_utf8"),
            connectionId,
            log,
          );
          return;
        }
        await this.processor.process(text, { connectionId, signal, logger: log });
      } finally {
        limiter.release();
      }
    });
  }

  private logTeardown(err: unknown, scope: TaskScope, log: Logger): void {
    if (err instanceof FramingError) {
      recordFramingError();
      log.warn({ err: errorMessage(err), pending: scope.size }, "Dropping connection: framing error");
    } else if (scope.cancelled) {
      log.debug({ pending: scope.size }, "Connection cancelled");
    } else {
      log.warn({ err, pending: scope.size }, "Dropping connection: read failed");
    }
  }
}
