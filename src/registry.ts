// registry.ts: Command registry and grammar assembly
// Plugins each build a CommandRegistry; the host combines them once at startup and
// compiles the result into an immutable CommandGrammar shared by every connection.

import type { z } from "zod";
import type { Logger } from "pino";
import { Grammar, parseRuleName, type Value } from "./grammar.js";
import { RegistryConflictError, RegistrySealedError } from "./errors.js";

export interface CommandContext {
  connectionId: string;
  /** Aborted when the owning connection is torn down. */
  signal: AbortSignal;
  logger: Logger;
}

export type CommandHandler<A extends readonly unknown[] = readonly unknown[]> = (
  args: A,
  ctx: CommandContext,
) => Promise<void>;

/** Turns the (already transformed) children of a rule into one argument value. */
export type Transformer = (children: unknown[]) => unknown;

/** A rule without a transformer is passed to handlers in this shape. */
export interface RuleNode {
  rule: string;
  children: unknown[];
}

export interface ParsedCommand {
  pattern: string;
  args: unknown[];
}

export interface ParseError {
  message: string;
  position: number;
  expected: string[];
}

export type ParseResult =
  | { ok: true; command: ParsedCommand }
  | { ok: false; error: ParseError };

interface CommandEntry {
  handler: CommandHandler;
  source: string;
}

interface RuleEntry {
  body: string;
  source: string;
}

export class CommandRegistry {
  private readonly commands = new Map<string, CommandEntry>();
  private readonly rules = new Map<string, RuleEntry>();
  private readonly transformers = new Map<string, Transformer>();
  private sealed = false;

  constructor(readonly name = "anonymous") {}

  /** Define helper rules, e.g. `{ "?any_text": "/\\S.*\/" }`, and optional transformers. */
  define(rules: Record<string, string>, transformers: Record<string, Transformer> = {}): this {
    this.assertOpen();
    for (const [key, body] of Object.entries(rules)) {
      this.addRule(key, { body, source: this.name });
    }
    for (const [rule, fn] of Object.entries(transformers)) {
      this.addTransformer(rule, fn);
    }
    return this;
  }

  register(pattern: string, handler: CommandHandler): this {
    this.assertOpen();
    this.addCommand(pattern, { handler, source: this.name });
    return this;
  }

  /** Register a handler whose arguments are validated and typed by a zod schema. */
  command<A extends readonly unknown[]>(
    pattern: string,
    args: z.ZodType<A, z.ZodTypeDef, unknown>,
    handler: CommandHandler<A>,
  ): this {
    return this.register(pattern, async (raw, ctx) => handler(args.parse(raw), ctx));
  }

  patterns(): string[] {
    return [...this.commands.keys()];
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Merge registries into a new one.
   * Duplicate command patterns are rejected; shared helper rules must be identical
   * and shared transformers must be the same function.
   */
  static combine(...registries: CommandRegistry[]): CommandRegistry {
    const combined = new CommandRegistry(registries.map((r) => r.name).join("+") || "empty");
    for (const registry of registries) {
      for (const [key, entry] of registry.rules) combined.addRule(key, entry);
      for (const [rule, fn] of registry.transformers) combined.addTransformer(rule, fn);
      for (const [pattern, entry] of registry.commands) combined.addCommand(pattern, entry);
    }
    return combined;
  }

  /** Seal the registry and compile its grammar. */
  compile(): CommandGrammar {
    this.sealed = true;
    const commandRules = new Map<string, string>();
    const definitions: Array<[string, string]> = [...this.rules].map(([key, entry]) => [key, entry.body]);
    let i = 0;
    for (const pattern of this.commands.keys()) {
      const ruleName = `__command_${i++}`;
      commandRules.set(ruleName, pattern);
      definitions.push([ruleName, pattern]);
    }
    const grammar = Grammar.compile(definitions, [...commandRules.keys()]);
    const handlers = new Map<string, CommandHandler>();
    for (const [pattern, entry] of this.commands) handlers.set(pattern, entry.handler);
    return new CommandGrammar(grammar, commandRules, handlers, new Map(this.transformers));
  }

  private assertOpen(): void {
    if (this.sealed) throw new RegistrySealedError(this.name);
  }

  private addRule(key: string, entry: RuleEntry): void {
    const { name } = parseRuleName(key);
    const existingKey = [...this.rules.keys()].find((k) => parseRuleName(k).name === name);
    if (existingKey !== undefined) {
      const existing = this.rules.get(existingKey);
      if (existingKey === key && existing?.body === entry.body) return;
      throw new RegistryConflictError(
        "rule",
        name,
        `defined by "${existing?.source}" as ${JSON.stringify(existing?.body)} and by "${entry.source}" as ${JSON.stringify(entry.body)}`,
      );
    }
    this.rules.set(key, entry);
  }

  private addTransformer(rule: string, fn: Transformer): void {
    const existing = this.transformers.get(rule);
    if (existing !== undefined && existing !== fn) {
      throw new RegistryConflictError("transformer", rule, "two different transformers registered");
    }
    this.transformers.set(rule, fn);
  }

  private addCommand(pattern: string, entry: CommandEntry): void {
    const existing = this.commands.get(pattern);
    if (existing) {
      throw new RegistryConflictError(
        "command",
        pattern,
        `registered by both "${existing.source}" and "${entry.source}"`,
      );
    }
    this.commands.set(pattern, entry);
  }
}

/** Immutable compiled grammar plus the handler table it was built from. */
export class CommandGrammar {
  constructor(
    private readonly grammar: Grammar,
    private readonly ruleToPattern: ReadonlyMap<string, string>,
    private readonly handlers: ReadonlyMap<string, CommandHandler>,
    private readonly transformers: ReadonlyMap<string, Transformer>,
  ) {
    Object.freeze(this);
  }

  parse(text: string): ParseResult {
    const result = this.grammar.match(text);
    if (!result.ok) {
      const expected = result.expected.length > 0 ? result.expected.join(", ") : "a command";
      return {
        ok: false,
        error: {
          message: `No command matches at position ${result.position}: expected ${expected}`,
          position: result.position,
          expected: result.expected,
        },
      };
    }
    const pattern = this.ruleToPattern.get(result.tree.rule);
    if (pattern === undefined) {
      throw new Error(`Parse produced unknown command rule "${result.tree.rule}"`);
    }
    let args: unknown[];
    try {
      args = result.tree.children.map((child) => this.transform(child));
    } catch (err) {
      return {
        ok: false,
        error: {
          message: `Invalid arguments for "${pattern}": ${err instanceof Error ? err.message : String(err)}`,
          position: 0,
          expected: [],
        },
      };
    }
    return { ok: true, command: { pattern, args } };
  }

  handlerFor(pattern: string): CommandHandler | undefined {
    return this.handlers.get(pattern);
  }

  patterns(): string[] {
    return [...this.handlers.keys()];
  }

  private transform(value: Value): unknown {
    if (typeof value === "string") return value;
    const children = value.children.map((child) => this.transform(child));
    const fn = this.transformers.get(value.rule);
    if (fn) return fn(children);
    const node: RuleNode = { rule: value.rule, children };
    return node;
  }
}
