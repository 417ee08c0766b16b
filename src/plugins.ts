// plugins.ts: Plugin descriptors and one-time grammar assembly
// The plugin set is a static table selected by name from config or CLI flags.

import type { Logger } from "pino";
import type { Automation } from "./automation.js";
import { CommandRegistry, type CommandGrammar } from "./registry.js";
import { UnknownPluginError } from "./errors.js";
import { basicPlugin } from "./commands/basic.js";
import { dictationPlugin } from "./commands/dictation.js";
import { speechPlugin } from "./commands/speech.js";

export interface PluginDeps {
  automation: Automation;
  logger: Logger;
}

export interface PluginDescriptor {
  name: string;
  description: string;
  /** Build this plugin's registrations. Called once, before the grammar is compiled. */
  contribute(deps: PluginDeps): CommandRegistry;
}

export const BUILTIN_PLUGINS: readonly PluginDescriptor[] = [basicPlugin, dictationPlugin, speechPlugin];

export function resolvePlugins(
  names: readonly string[],
  available: readonly PluginDescriptor[] = BUILTIN_PLUGINS,
): PluginDescriptor[] {
  const byName = new Map(available.map((p) => [p.name, p]));
  return [...new Set(names)].map((name) => {
    const plugin = byName.get(name);
    if (!plugin) throw new UnknownPluginError(name, [...byName.keys()]);
    return plugin;
  });
}

export function assembleGrammar(plugins: readonly PluginDescriptor[], deps: PluginDeps): CommandGrammar {
  const registries = plugins.map((plugin) => plugin.contribute(deps));
  const grammar = CommandRegistry.combine(...registries).compile();
  deps.logger.info(
    { plugins: plugins.map((p) => p.name), commands: grammar.patterns().length },
    "Command grammar assembled",
  );
  return grammar;
}
