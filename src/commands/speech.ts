// speech.ts: Text to speech

import { z } from "zod";
import { CommandRegistry } from "../registry.js";
import { defineCoreRules } from "./rules.js";
import type { PluginDescriptor } from "../plugins.js";

export const speechPlugin: PluginDescriptor = {
  name: "speech",
  description: "speak <text>",
  contribute({ automation, logger }) {
    const registry = defineCoreRules(new CommandRegistry("speech"));

    registry.command('"speak" any_text', z.tuple([z.string()]), async ([text], ctx) => {
      logger.debug({ connection: ctx.connectionId, chars: text.length }, "Speaking");
      await automation.speak(text, ctx.signal);
    });

    return registry;
  },
};
