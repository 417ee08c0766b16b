// basic.ts: Key presses and notifications

import { z } from "zod";
import { CommandRegistry } from "../registry.js";
import { chordSchema, defineCoreRules } from "./rules.js";
import type { PluginDescriptor } from "../plugins.js";

export const basicPlugin: PluginDescriptor = {
  name: "basic",
  description: "say <chord>, switch <chord>, alert <text>, monitor, mouse",
  contribute({ automation }) {
    const registry = defineCoreRules(new CommandRegistry("basic"));

    registry.command('"say" chord', z.tuple([chordSchema]), async ([chord], ctx) => {
      await automation.pressChord(chord, ctx.signal);
    });

    // window manager shortcuts live on super
    registry.command('"switch" chord', z.tuple([chordSchema]), async ([chord], ctx) => {
      const modifiers = chord.modifiers.includes("super") ? chord.modifiers : ["super", ...chord.modifiers];
      await automation.pressChord({ key: chord.key, modifiers }, ctx.signal);
    });

    registry.command('"alert" any_text', z.tuple([z.string()]), async ([text], ctx) => {
      await automation.alert(text, ctx.signal);
    });

    registry.command('"monitor"', z.tuple([]), async (_args, ctx) => {
      await automation.pressChord({ key: "M", modifiers: [] }, ctx.signal);
    });

    registry.command('"mouse"', z.tuple([]), async (_args, ctx) => {
      await automation.pressChord({ key: "O", modifiers: [] }, ctx.signal);
    });

    return registry;
  },
};
