// Daemon process lifecycle management
// Dual-purpose: (1) imported by cli.ts for start/stop/status, (2) runs as daemon process

import { spawn } from "node:child_process";
import { existsSync, readFileSync, writeFileSync, openSync } from "node:fs";
import { unlink } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { tryConnect } from "./client.js";
import { readConfig, parseSocketMode, parsePluginList, type RuntimeConfig } from "./config.js";
import { logger, setLogLevel } from "./logger.js";
import { createAutomation } from "./automation.js";
import { assembleGrammar, resolvePlugins } from "./plugins.js";
import { CommandProcessor } from "./processor.js";
import { CommandServer } from "./server.js";
import { errorMessage } from "./errors.js";

// --- PID / log file paths ---

export function getPidFilePath(): string {
  const instance = process.env.UTTERD_INSTANCE;
  return instance
    ? `/tmp/utterd-daemon-${instance}.pid`
    : "/tmp/utterd-daemon.pid";
}

export function getLogFilePath(): string {
  const instance = process.env.UTTERD_INSTANCE;
  return instance
    ? `/tmp/utterd-daemon-${instance}.log`
    : "/tmp/utterd-daemon.log";
}

// --- Daemon status checks ---

export function getDaemonPid(): number | null {
  const pidFile = getPidFilePath();
  if (!existsSync(pidFile)) return null;
  try {
    const pid = parseInt(readFileSync(pidFile, "utf-8").trim(), 10);
    return isNaN(pid) || pid <= 0 ? null : pid;
  } catch {
    return null;
  }
}

export function isDaemonRunning(): boolean {
  const pid = getDaemonPid();
  if (pid === null) return false;
  try {
    process.kill(pid, 0); // signal 0 = process existence check
    return true;
  } catch {
    return false;
  }
}

// --- Build a server from config (shared by the daemon and `serve`) ---

export interface ServeOverrides {
  socketPath?: string;
  plugins?: string[];
  socketMode?: string;
}

export async function createServerFromConfig(overrides: ServeOverrides = {}): Promise<CommandServer> {
  const config: RuntimeConfig = await readConfig();
  setLogLevel(config["log-level"]);

  const plugins = resolvePlugins(overrides.plugins ?? parsePluginList(config.plugins));
  const grammar = assembleGrammar(plugins, { automation: createAutomation(), logger });

  return new CommandServer(new CommandProcessor(grammar), {
    socketPath: overrides.socketPath ?? config["socket-path"],
    permissions: parseSocketMode(overrides.socketMode ?? config["socket-mode"]),
    maxFrameLength: config["max-frame-length"],
    maxInFlight: config["max-in-flight"],
    saturationPolicy: config["saturation-policy"],
  });
}

/** Run a server in this process until SIGTERM/SIGINT. */
export async function runForeground(overrides: ServeOverrides = {}, onStop?: () => Promise<void>): Promise<void> {
  const server = await createServerFromConfig(overrides);
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGTERM", stop);
  process.once("SIGINT", stop);

  try {
    await server.serve(controller.signal);
  } finally {
    process.removeListener("SIGTERM", stop);
    process.removeListener("SIGINT", stop);
    await onStop?.();
  }
}

// --- Start daemon (invoked by CLI) ---

const DAEMON_START_TIMEOUT_MS = 12_000;
const DAEMON_SOCKET_POLL_MS = 150;

export async function startDaemon(): Promise<void> {
  if (isDaemonRunning()) {
    logger.warn("Daemon already running");
    return;
  }

  // Resolve path to the daemon entry point (dist/daemon.js)
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = dirname(__filename);
  const daemonEntry = join(__dirname, "daemon.js");

  if (!existsSync(daemonEntry)) {
    throw new Error(
      `Daemon entry not found: ${daemonEntry}. Run 'npm run build' first.`,
    );
  }

  const logPath = getLogFilePath();
  const logFd = openSync(logPath, "a");

  const child = spawn(process.execPath, [daemonEntry], {
    detached: true,
    stdio: ["ignore", logFd, logFd],
    env: { ...process.env, UTTERD_DAEMON_MODE: "1" },
  });
  child.unref();

  // Wait until socket is ready to accept connections
  const { "socket-path": socketPath } = await readConfig();
  const deadline = Date.now() + DAEMON_START_TIMEOUT_MS;

  while (Date.now() < deadline) {
    await sleep(DAEMON_SOCKET_POLL_MS);
    if (existsSync(socketPath)) {
      const socket = await tryConnect(500, socketPath);
      if (socket) {
        socket.end();
        return; // Daemon is ready
      }
    }
  }

  throw new Error(
    `Daemon failed to start within ${DAEMON_START_TIMEOUT_MS / 1000}s. ` +
    `Check log: ${logPath}`,
  );
}

// --- Stop daemon (invoked by CLI) ---

const DAEMON_STOP_TIMEOUT_MS = 5_000;

export async function stopDaemon(): Promise<void> {
  const pidFile = getPidFilePath();
  const pid = getDaemonPid();

  if (pid === null || !isDaemonRunning()) {
    // Clean up stale files
    await removeIfPresent(pidFile);
    throw new Error("Daemon is not running");
  }

  process.kill(pid, "SIGTERM");

  // Wait for PID file to be removed (daemon cleans up on exit)
  const deadline = Date.now() + DAEMON_STOP_TIMEOUT_MS;
  while (Date.now() < deadline) {
    await sleep(100);
    if (!existsSync(pidFile)) return;
  }

  // Force kill if still running
  try {
    process.kill(pid, "SIGKILL");
  } catch (err) {
    logger.debug({ err, pid }, "Daemon already gone");
  }
  await removeIfPresent(pidFile);
  const { "socket-path": socketPath } = await readConfig();
  await removeIfPresent(socketPath);
}

export async function getDaemonStatus(): Promise<object> {
  const { "socket-path": socketPath } = await readConfig();
  const running = isDaemonRunning();
  const socket = running ? await tryConnect(500, socketPath) : null;
  socket?.end();
  return {
    running,
    pid: getDaemonPid(),
    socket: socketPath,
    accepting: socket !== null,
    log: getLogFilePath(),
  };
}

// --- Daemon main (runs when UTTERD_DAEMON_MODE=1) ---

async function runDaemonMain(): Promise<void> {
  logger.info({ pid: process.pid }, "Daemon starting");

  const pidFile = getPidFilePath();
  writeFileSync(pidFile, String(process.pid), "utf-8");

  await runForeground({}, async () => {
    await removeIfPresent(pidFile);
    logger.info("Daemon stopped");
  });
}

// --- Entry point guard ---

// Run as daemon when UTTERD_DAEMON_MODE is set (spawned by startDaemon())
if (process.env.UTTERD_DAEMON_MODE === "1") {
  runDaemonMain().then(
    () => process.exit(0),
    (err: unknown) => {
      logger.fatal({ err: errorMessage(err) }, "Daemon failed");
      process.exit(1);
    },
  );
}

// --- Utility ---

async function removeIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code !== "ENOENT") throw err;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
