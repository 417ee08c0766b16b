// Command client over Unix Domain Socket
// Used by cli.ts (send) and the daemon readiness check. Fire-and-forget: no replies.

import net from "node:net";
import { encodeLine } from "./protocol.js";

export function getSocketPath(): string {
  const instance = process.env.UTTERD_INSTANCE;
  return instance
    ? `/tmp/utterd-${instance}.sock`
    : "/tmp/utterd.sock";
}

// Connect to server socket. Returns socket or throws.
export function connectToSocket(socketPath?: string): Promise<net.Socket> {
  const path = socketPath ?? getSocketPath();
  return new Promise((resolve, reject) => {
    const socket = net.createConnection(path);
    socket.once("connect", () => resolve(socket));
    socket.once("error", reject);
  });
}

// Try to connect with timeout. Returns null if no server is listening.
export async function tryConnect(timeoutMs = 1500, socketPath?: string): Promise<net.Socket | null> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      connectToSocket(socketPath),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error("connection timeout")), timeoutMs);
      }),
    ]);
  } catch {
    return null;
  } finally {
    clearTimeout(timer);
  }
}

// Write one utterance as a newline-terminated line; resolves once it is flushed.
export function sendCommand(socket: net.Socket, text: string): Promise<void> {
  const line = encodeLine(text);
  return new Promise((resolve, reject) => {
    socket.write(line, (err) => (err ? reject(err) : resolve()));
  });
}

// Open a connection, send every line, then close our side and wait for the server to hang up.
export async function send(texts: readonly string[], socketPath?: string): Promise<void> {
  const socket = await connectToSocket(socketPath);
  try {
    for (const text of texts) await sendCommand(socket, text);
    await new Promise<void>((resolve, reject) => {
      socket.once("close", () => resolve());
      socket.once("error", reject);
      socket.end();
    });
  } finally {
    socket.destroy();
  }
}
