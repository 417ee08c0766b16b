// Shared CLI output helpers

export function jsonOutput(data: unknown): void {
  process.stdout.write(JSON.stringify(data, null, 2) + "\n");
}

export function textOutput(text: string): void {
  process.stdout.write(text + "\n");
}

/** Render a table of [left, right] rows with the left column padded. */
export function columns(rows: ReadonlyArray<readonly [string, string]>): string {
  const width = Math.max(0, ...rows.map(([left]) => left.length));
  return rows.map(([left, right]) => `  ${left.padEnd(width)}  ${right}`).join("\n");
}
