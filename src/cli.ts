#!/usr/bin/env node
// utterd CLI: run the command server, send utterances, manage the daemon

import { jsonOutput, textOutput, columns } from "./shared.js";
import { getPositionals, extractOption, getAllFlagValues } from "./args.js";
import { send } from "./client.js";
import {
  startDaemon,
  stopDaemon,
  getDaemonStatus,
  runForeground,
} from "./daemon.js";
import {
  readConfig,
  resetConfig,
  getDefaults,
  getConfigValue,
  setConfigValue,
  isValidConfigKey,
  parsePluginList,
  getConfigPath,
} from "./config.js";
import { BUILTIN_PLUGINS, assembleGrammar, resolvePlugins } from "./plugins.js";
import { createAutomation } from "./automation.js";
import { logger } from "./logger.js";
import { errorMessage } from "./errors.js";
import type { CommandGrammar } from "./registry.js";

function usage(): never {
  textOutput(`utterd: local voice/text command server

SERVER:
  serve [--socket <path>] [--plugin <name>...] [--mode <octal>]
                             Run the server in the foreground
  daemon start               Start the server as a background daemon
  daemon stop                Stop the daemon
  daemon status              Show daemon status

CLIENT:
  send <text...>             Send one utterance (each argument joined by spaces)

GRAMMAR:
  commands [--plugin <name>...]          List command patterns
  parse <text...> [--plugin <name>...]   Parse without executing, print the result
  plugins                                List builtin plugins

CONFIG:
  config get <key>
  config set <key> <value>
  config list
  config reset

  Keys: socket-path, socket-mode, max-frame-length, max-in-flight,
        saturation-policy (wait|drop), plugins, log-level

ENV:
  UTTERD_INSTANCE=<id>       Instance isolation (socket + PID file per instance)
  UTTERD_CONFIG=<path>       Config file (default /tmp/utterd-config.json)
  UTTERD_LOG_LEVEL=<level>   Log level, overrides config`);
  process.exit(0);
}

async function loadGrammar(args: string[]): Promise<CommandGrammar> {
  const flagged = getAllFlagValues(args, "--plugin");
  const names = flagged.length > 0 ? flagged : parsePluginList((await readConfig()).plugins);
  return assembleGrammar(resolvePlugins(names), { automation: createAutomation(), logger });
}

async function runConfigSubcommand(sub: string, args: string[]): Promise<void> {
  const pos = getPositionals(args);
  switch (sub) {
    case "get": {
      const key = pos[0] ?? "";
      if (!isValidConfigKey(key)) throw new Error(`Unknown config key: "${key}". Use config list to see valid keys.`);
      jsonOutput({ ok: true, key, value: await getConfigValue(key) });
      return;
    }
    case "set": {
      const key = pos[0] ?? "";
      const value = pos[1];
      if (!isValidConfigKey(key)) throw new Error(`Unknown config key: "${key}". Use config list to see valid keys.`);
      if (value === undefined) throw new Error("value is required");
      await setConfigValue(key, value);
      jsonOutput({ ok: true, key, value: await getConfigValue(key) });
      return;
    }
    case "list": {
      const config = await readConfig();
      const defaults = getDefaults();
      const entries = Object.entries(config).map(([key, value]) => ({
        key,
        value,
        default: isValidConfigKey(key) ? defaults[key] : undefined,
        modified: isValidConfigKey(key) ? value !== defaults[key] : false,
      }));
      jsonOutput({ ok: true, file: getConfigPath(), entries });
      return;
    }
    case "reset":
      await resetConfig();
      jsonOutput({ ok: true, message: "Config reset to defaults", config: getDefaults() });
      return;
    default:
      throw new Error(`Unknown config subcommand: ${sub}`);
  }
}

async function runDaemonSubcommand(sub: string): Promise<void> {
  switch (sub) {
    case "start":
      await startDaemon();
      jsonOutput({ ok: true, message: "Daemon started" });
      return;
    case "stop":
      await stopDaemon();
      jsonOutput({ ok: true, message: "Daemon stopped" });
      return;
    case "status":
      jsonOutput(await getDaemonStatus());
      return;
    default:
      throw new Error(`Unknown daemon subcommand: ${sub}`);
  }
}

// --- Main ---

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (!args.length || args[0] === "--help" || args[0] === "-h") usage();

  const command = args[0] ?? "";
  const rest = args.slice(1);

  try {
    switch (command) {
      case "serve": {
        const plugins = getAllFlagValues(rest, "--plugin");
        await runForeground({
          socketPath: extractOption(rest, "--socket"),
          socketMode: extractOption(rest, "--mode"),
          plugins: plugins.length > 0 ? plugins : undefined,
        });
        break;
      }

      case "daemon":
        await runDaemonSubcommand(rest[0] ?? "status");
        break;

      case "send": {
        const text = getPositionals(rest).join(" ");
        if (!text) throw new Error("send requires the text of a command");
        const socketPath = extractOption(rest, "--socket") ?? (await readConfig())["socket-path"];
        await send([text], socketPath);
        jsonOutput({ ok: true, sent: text });
        break;
      }

      case "parse": {
        const grammar = await loadGrammar(rest);
        const result = grammar.parse(getPositionals(rest).join(" "));
        jsonOutput(result.ok ? { ok: true, ...result.command } : { ok: false, error: result.error });
        if (!result.ok) process.exitCode = 1;
        break;
      }

      case "commands": {
        const grammar = await loadGrammar(rest);
        textOutput(grammar.patterns().join("\n"));
        break;
      }

      case "plugins":
        textOutput(columns(BUILTIN_PLUGINS.map((p) => [p.name, p.description] as const)));
        break;

      case "config": {
        const sub = rest[0];
        if (!sub || sub.startsWith("--")) {
          textOutput("Usage: utterd config <get|set|list|reset> [args]. Use --help for details.");
          process.exit(1);
        }
        await runConfigSubcommand(sub, rest.slice(1));
        break;
      }

      default:
        throw new Error(`Unknown command: ${command}. Use --help for usage.`);
    }
  } catch (error) {
    jsonOutput({ ok: false, error: errorMessage(error) });
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`[utterd] Fatal: ${errorMessage(err)}\n`);
  process.exit(1);
});
