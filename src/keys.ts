// keys.ts: Spoken key names → keysym-style key names, loaded from data/keys.json

import { readFileSync } from "node:fs";
import { z } from "zod";

const keyTableSchema = z.object({
  keys: z.record(z.string()),
  modifiers: z.record(z.string()),
});

export type KeyTable = z.infer<typeof keyTableSchema>;

export const KEY_TABLE_URL = new URL("../data/keys.json", import.meta.url);

let _table: KeyTable | null = null;

export function loadKeyTable(): KeyTable {
  if (!_table) {
    _table = keyTableSchema.parse(JSON.parse(readFileSync(KEY_TABLE_URL, "utf-8")));
  }
  return _table;
}

/** Every pronounceable key, modifiers included. */
export function pronunciations(): ReadonlyMap<string, string> {
  const { keys, modifiers } = loadKeyTable();
  return new Map([...Object.entries(keys), ...Object.entries(modifiers)]);
}
