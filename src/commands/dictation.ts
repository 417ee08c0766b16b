// dictation.ts: Typing text and repeated key presses

import { z } from "zod";
import { CommandRegistry } from "../registry.js";
import { chordSchema, defineCoreRules } from "./rules.js";
import type { PluginDescriptor } from "../plugins.js";

export const dictationPlugin: PluginDescriptor = {
  name: "dictation",
  description: "write <text>, repeat <number> <chord>",
  contribute({ automation }) {
    const registry = defineCoreRules(new CommandRegistry("dictation"));

    registry.command('"write" any_text', z.tuple([z.string()]), async ([text], ctx) => {
      await automation.typeText(text, ctx.signal);
    });

    registry.command(
      '"repeat" number chord',
      z.tuple([z.number().int().min(0), chordSchema]),
      async ([times, chord], ctx) => {
        for (let i = 0; i < times; i++) {
          ctx.signal.throwIfAborted();
          await automation.pressChord(chord, ctx.signal);
        }
      },
    );

    return registry;
  },
};
