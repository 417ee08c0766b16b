// Arg parsing helpers for the CLI

export const VALUE_FLAGS = new Set([
  "--socket", "--plugin", "--mode",
]);

export function getPositionals(args: string[]): string[] {
  const result: string[] = [];
  const skip = new Set<number>();
  args.forEach((arg, i) => {
    if (arg.startsWith("--")) {
      if (VALUE_FLAGS.has(arg)) skip.add(i + 1);
    } else if (!skip.has(i)) {
      result.push(arg);
    }
  });
  return result;
}

export function extractOption(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx < 0) return undefined;
  const value = args[idx + 1];
  if (value === undefined) throw new Error(`${flag} requires a value`);
  return value;
}

export function getAllFlagValues(args: string[], flag: string): string[] {
  const values: string[] = [];
  args.forEach((arg, i) => {
    if (arg === flag) {
      const val = args[i + 1];
      if (val !== undefined) values.push(val);
    }
  });
  return values;
}
