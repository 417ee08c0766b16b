// rules.ts: Rules shared by the builtin plugins: key, chord, number, any_text
// Plugins that both define these merge cleanly: the bodies and transformer
// functions are identical, which is what CommandRegistry.combine() accepts.

import { z } from "zod";
import { alternation } from "../grammar.js";
import { pronunciations } from "../keys.js";
import type { CommandRegistry, Transformer } from "../registry.js";
import type { Chord } from "../automation.js";

export const chordSchema: z.ZodType<Chord> = z.object({
  key: z.string(),
  modifiers: z.array(z.string()),
});

export const NUMBER_WORDS: Readonly<Record<string, number>> = {
  zero: 0, one: 1, two: 2, three: 3, four: 4, five: 5,
  six: 6, seven: 7, eight: 8, nine: 9, ten: 10,
};

const keyTransformer: Transformer = ([word]) => {
  const key = typeof word === "string" ? pronunciations().get(word) : undefined;
  if (key === undefined) throw new Error(`Unknown key name ${JSON.stringify(word)}`);
  return key;
};

// "control plus shift plus alpha" → { key: "a", modifiers: ["ctrl", "shift"] }
const chordTransformer: Transformer = ([head, tail]) => {
  if (typeof head !== "string") throw new Error("Chord must start with a key");
  if (tail === undefined) return { key: head, modifiers: [] };
  const rest = chordSchema.parse(tail);
  return { key: rest.key, modifiers: [head, ...rest.modifiers] };
};

const numberTransformer: Transformer = ([word]) => {
  const n = typeof word === "string" ? NUMBER_WORDS[word] : undefined;
  if (n === undefined) throw new Error(`Unknown number ${JSON.stringify(word)}`);
  return n;
};

export function defineCoreRules(registry: CommandRegistry): CommandRegistry {
  return registry.define(
    {
      "?any_text": "/\\S.*/",
      key: alternation(pronunciations().keys()),
      chord: 'key [("plus" | "+") chord]',
      number: alternation(Object.keys(NUMBER_WORDS)),
    },
    {
      key: keyTransformer,
      chord: chordTransformer,
      number: numberTransformer,
    },
  );
}
