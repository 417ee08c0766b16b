// Command server over a Unix Domain Socket
// The daemon runs this server; every accepted connection gets its own dispatcher scope.

import net from "node:net";
import { chmodSync, existsSync } from "node:fs";
import { unlink } from "node:fs/promises";
import { BindError, errorMessage } from "./errors.js";
import { LIMITS } from "./protocol.js";
import { ConnectionDispatcher, type DispatcherOptions } from "./dispatcher.js";
import type { CommandProcessor } from "./processor.js";
import { logger } from "./logger.js";
import { getStats } from "./stats.js";

export interface ServerOptions extends DispatcherOptions {
  socketPath: string;
  /** File mode applied to the socket right after bind, e.g. 0o600. */
  permissions?: number;
  backlog?: number;
}

const LIVENESS_TIMEOUT_MS = 500;

export class CommandServer {
  private srv: net.Server | null = null;
  private controller = new AbortController();
  private readonly connections = new Set<Promise<void>>();
  private readonly dispatcher: ConnectionDispatcher;
  private startedAt = 0;

  constructor(private readonly processor: CommandProcessor, private readonly opts: ServerOptions) {
    this.dispatcher = new ConnectionDispatcher(processor, opts);
  }

  get socketPath(): string {
    return this.opts.socketPath;
  }

  get listening(): boolean {
    return this.srv !== null;
  }

  async start(): Promise<void> {
    if (this.srv) throw new Error("Server already started");
    const socketPath = this.opts.socketPath;
    await removeStaleEndpoint(socketPath);

    this.controller = new AbortController();
    const srv = net.createServer((socket) => this.accept(socket));

    await new Promise<void>((resolve, reject) => {
      const onError = (err: NodeJS.ErrnoException) => {
        reject(new BindError(socketPath, err.code ?? err.message, { cause: err }));
      };
      srv.once("error", onError);
      srv.listen({ path: socketPath, backlog: this.opts.backlog ?? LIMITS.LISTEN_BACKLOG }, () => {
        srv.removeListener("error", onError);
        // synchronous, so it lands before the first connection callback runs
        if (this.opts.permissions !== undefined) {
          try {
            chmodSync(socketPath, this.opts.permissions);
          } catch (err) {
            srv.close();
            reject(new BindError(socketPath, `chmod failed: ${errorMessage(err)}`, { cause: err }));
            return;
          }
        }
        resolve();
      });
    });

    srv.on("error", (err) => logger.error({ err }, "Listener error"));
    this.srv = srv;
    this.startedAt = Date.now();
    logger.info({ socket: socketPath, commands: this.processor.grammar.patterns().length }, "Listening");
  }

  /** Stop accepting, cancel every connection, wait for them and release the endpoint. */
  async close(): Promise<void> {
    const srv = this.srv;
    if (!srv) return;
    this.srv = null;

    const closed = new Promise<void>((resolve) => srv.close(() => resolve()));
    this.controller.abort(new Error("Server shutting down"));
    await Promise.allSettled([...this.connections]);
    await closed;
    await unlink(this.opts.socketPath).catch((err: NodeJS.ErrnoException) => {
      if (err.code !== "ENOENT") logger.warn({ err }, "Could not remove socket file");
    });
    logger.info({ stats: getStats() }, "Server stopped");
  }

  /** Start, run until `signal` aborts, then close. */
  async serve(signal: AbortSignal): Promise<void> {
    await this.start();
    if (!signal.aborted) {
      await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
    }
    await this.close();
  }

  status(): object {
    const used = process.memoryUsage();
    return {
      ok: this.listening,
      pid: process.pid,
      uptime_s: this.startedAt ? Math.floor((Date.now() - this.startedAt) / 1000) : 0,
      memory_mb: Math.round(used.rss / 1024 / 1024),
      socket: this.opts.socketPath,
      connections: this.connections.size,
      commands: this.processor.grammar.patterns().length,
      stats: getStats(),
    };
  }

  private accept(socket: net.Socket): void {
    const handling = this.dispatcher.handle(socket, this.controller.signal).finally(() => {
      this.connections.delete(handling);
    });
    this.connections.add(handling);
  }
}

/**
 * Connect errors that prove nobody is listening. Anything else (EAGAIN from a full
 * backlog, EACCES) may hide a live server.
 */
export function isStaleEndpointError(code: string | undefined): boolean {
  return code === "ECONNREFUSED" || code === "ENOENT";
}

/**
 * Remove whatever is left at `socketPath` by a previous run.
 * A socket that still accepts connections belongs to a live server: refuse to steal it.
 */
export async function removeStaleEndpoint(socketPath: string): Promise<void> {
  if (!existsSync(socketPath)) return;

  // "stale", or why the endpoint must be left alone
  const status = await new Promise<string>((resolve) => {
    const conn = net.createConnection(socketPath);
    const timer = setTimeout(() => { conn.destroy(); resolve("endpoint did not answer in time"); }, LIVENESS_TIMEOUT_MS);
    conn.once("connect", () => { clearTimeout(timer); conn.end(); resolve("another server is already listening"); });
    conn.once("error", (err: NodeJS.ErrnoException) => {
      clearTimeout(timer);
      resolve(isStaleEndpointError(err.code) ? "stale" : `liveness check failed (${err.code ?? err.message})`);
    });
  });

  if (status !== "stale") {
    throw new BindError(socketPath, status);
  }
  try {
    await unlink(socketPath);
  } catch (err) {
    const code = err instanceof Error && "code" in err ? String(err.code) : "";
    if (code !== "ENOENT") {
      throw new BindError(socketPath, `cannot remove stale endpoint: ${errorMessage(err)}`, { cause: err });
    }
  }
}
