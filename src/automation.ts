// automation.ts: Host input automation through external tools
// Every call spawns a child process and awaits it, so the event loop never blocks;
// the handler's AbortSignal kills the child when the connection goes away.

import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface Chord {
  key: string;
  modifiers: string[];
}

export interface Automation {
  pressChord(chord: Chord, signal?: AbortSignal): Promise<void>;
  typeText(text: string, signal?: AbortSignal): Promise<void>;
  alert(text: string, signal?: AbortSignal): Promise<void>;
  speak(text: string, signal?: AbortSignal): Promise<void>;
}

export type CommandRunner = (file: string, args: string[], signal?: AbortSignal) => Promise<void>;

export const execRunner: CommandRunner = async (file, args, signal) => {
  await execFileAsync(file, args, { signal, timeout: 30_000 });
};

export function chordToKeysym(chord: Chord): string {
  return [...chord.modifiers, chord.key].join("+");
}

// --- linux: xdotool / notify-send / espeak ---

function linuxAutomation(run: CommandRunner): Automation {
  return {
    pressChord: (chord, signal) => run("xdotool", ["key", "--clearmodifiers", chordToKeysym(chord)], signal),
    typeText: (text, signal) => run("xdotool", ["type", "--delay", "12", "--", text], signal),
    alert: (text, signal) => run("notify-send", ["utterd", text], signal),
    speak: (text, signal) => run("espeak", [text], signal),
  };
}

// --- darwin: osascript / say ---

const MAC_KEY_CODES: Record<string, number> = {
  Return: 36, Tab: 48, space: 49, BackSpace: 51, Escape: 53, Delete: 117,
  Home: 115, End: 119, Prior: 116, Next: 121,
  Left: 123, Right: 124, Down: 125, Up: 126,
  F1: 122, F2: 120, F3: 99, F4: 118, F5: 96, F6: 97,
  F7: 98, F8: 100, F9: 101, F10: 109, F11: 103, F12: 111,
};

const MAC_MODIFIERS: Record<string, string> = {
  ctrl: "control down",
  shift: "shift down",
  alt: "option down",
  super: "command down",
};

const MAC_CHARS: Record<string, string> = {
  period: ".", comma: ",", slash: "/", minus: "-", equal: "=",
  semicolon: ";", apostrophe: "'", backslash: "\\",
};

export function appleScriptString(text: string): string {
  return `"${text.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export function macChordScript(chord: Chord): string {
  const code = MAC_KEY_CODES[chord.key];
  const press = code !== undefined
    ? `key code ${code}`
    : `keystroke ${appleScriptString(MAC_CHARS[chord.key] ?? chord.key.toLowerCase())}`;
  const mods = chord.modifiers.map((m) => MAC_MODIFIERS[m]).filter((m): m is string => m !== undefined);
  const using = mods.length > 0 ? ` using {${mods.join(", ")}}` : "";
  return `tell application "System Events" to ${press}${using}`;
}

function macAutomation(run: CommandRunner): Automation {
  return {
    pressChord: (chord, signal) => run("osascript", ["-e", macChordScript(chord)], signal),
    typeText: (text, signal) =>
      run("osascript", ["-e", `tell application "System Events" to keystroke ${appleScriptString(text)}`], signal),
    alert: (text, signal) => run("osascript", ["-e", `display alert ${appleScriptString(text)}`], signal),
    speak: (text, signal) => run("say", [text], signal),
  };
}

// --- unsupported hosts ---

function unsupportedAutomation(platform: string): Automation {
  const fail = (): Promise<void> =>
    Promise.reject(new Error(`Input automation is not supported on platform "${platform}"`));
  return { pressChord: fail, typeText: fail, alert: fail, speak: fail };
}

export function createAutomation(
  platform: NodeJS.Platform = process.platform,
  run: CommandRunner = execRunner,
): Automation {
  switch (platform) {
    case "linux":
      return linuxAutomation(run);
    case "darwin":
      return macAutomation(run);
    default:
      return unsupportedAutomation(platform);
  }
}
