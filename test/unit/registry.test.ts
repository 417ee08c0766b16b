import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { CommandRegistry, type CommandContext, type Transformer } from "../../src/registry.js";
import { RegistryConflictError, RegistrySealedError } from "../../src/errors.js";
import { logger } from "../../src/logger.js";

const noop = async (): Promise<void> => undefined;

function ctx(): CommandContext {
  return { connectionId: "conn-test", signal: new AbortController().signal, logger };
}

describe("CommandRegistry.combine", () => {
  it("merges disjoint registries in order", () => {
    const a = new CommandRegistry("a").register('"one"', noop);
    const b = new CommandRegistry("b").register('"two"', noop);
    const combined = CommandRegistry.combine(a, b);
    expect(combined.name).toBe("a+b");
    expect(combined.patterns()).toEqual(['"one"', '"two"']);
  });

  it("rejects the same command from two registries", () => {
    const a = new CommandRegistry("a").register('"one"', noop);
    const b = new CommandRegistry("b").register('"one"', noop);
    expect(() => CommandRegistry.combine(a, b)).toThrow(RegistryConflictError);
    expect(() => CommandRegistry.combine(a, b)).toThrow('registered by both "a" and "b"');
  });

  it("accepts an identical helper rule and rejects a differing one", () => {
    const a = new CommandRegistry("a").define({ word: "/[a-z]+/" });
    const same = new CommandRegistry("b").define({ word: "/[a-z]+/" });
    const other = new CommandRegistry("c").define({ word: "/[0-9]+/" });
    expect(() => CommandRegistry.combine(a, same)).not.toThrow();
    expect(() => CommandRegistry.combine(a, other)).toThrow('Conflicting rule "word"');
  });

  it("treats ?name and name as the same rule", () => {
    const a = new CommandRegistry("a").define({ "?word": "/[a-z]+/" });
    const b = new CommandRegistry("b").define({ word: "/[a-z]+/" });
    expect(() => CommandRegistry.combine(a, b)).toThrow(RegistryConflictError);
  });

  it("accepts a shared transformer only when it is the same function", () => {
    const upper: Transformer = ([w]) => String(w).toUpperCase();
    const a = new CommandRegistry("a").define({ word: "/[a-z]+/" }, { word: upper });
    const same = new CommandRegistry("b").define({ word: "/[a-z]+/" }, { word: upper });
    const other = new CommandRegistry("c").define({ word: "/[a-z]+/" }, { word: ([w]) => w });
    expect(() => CommandRegistry.combine(a, same)).not.toThrow();
    expect(() => CommandRegistry.combine(a, other)).toThrow('Conflicting transformer "word"');
  });
});

describe("CommandRegistry.compile", () => {
  it("seals the registry", () => {
    const registry = new CommandRegistry("basic").register('"one"', noop);
    registry.compile();
    expect(registry.isSealed).toBe(true);
    expect(() => registry.register('"two"', noop)).toThrow(RegistrySealedError);
    expect(() => registry.define({ x: '"x"' })).toThrow('Registry "basic" is sealed');
  });

  it("returns an immutable grammar", () => {
    const grammar = new CommandRegistry().register('"one"', noop).compile();
    expect(Object.isFrozen(grammar)).toBe(true);
    expect(grammar.patterns()).toEqual(['"one"']);
  });
});

describe("CommandGrammar.parse", () => {
  const upper: Transformer = ([w]) => String(w).toUpperCase();
  const grammar = new CommandRegistry("test")
    .define({ "?word": "/[a-z]+/", shout: "/[a-z]+/", dir: "/up|down/" }, { shout: upper })
    .register('"say" word', noop)
    .register('"yell" shout', noop)
    .register('"go" dir', noop)
    .compile();

  it("returns the pattern and transformed arguments", () => {
    expect(grammar.parse("say hello")).toEqual({ ok: true, command: { pattern: '"say" word', args: ["hello"] } });
    expect(grammar.parse("yell hey")).toEqual({ ok: true, command: { pattern: '"yell" shout', args: ["HEY"] } });
  });

  it("passes a rule without a transformer as a node", () => {
    expect(grammar.parse("go up")).toEqual({
      ok: true,
      command: { pattern: '"go" dir', args: [{ rule: "dir", children: ["up"] }] },
    });
  });

  it("describes where parsing failed", () => {
    expect(grammar.parse("say")).toEqual({
      ok: false,
      error: {
        message: "No command matches at position 3: expected /[a-z]+/",
        position: 3,
        expected: ["/[a-z]+/"],
      },
    });
  });

  it("reports an empty grammar as expecting a command", () => {
    const empty = new CommandRegistry().compile();
    const result = empty.parse("anything");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("No command matches at position 0: expected a command");
  });

  it("turns a throwing transformer into a parse error", () => {
    const g = new CommandRegistry()
      .define({ num: "/[0-9]+/" }, { num: () => { throw new Error("too big"); } })
      .register('"count" num', noop)
      .compile();
    expect(g.parse("count 99")).toEqual({
      ok: false,
      error: { message: 'Invalid arguments for ""count" num": too big', position: 0, expected: [] },
    });
  });
});

describe("CommandRegistry.command", () => {
  it("validates and types the handler arguments", async () => {
    const seen = vi.fn();
    const grammar = new CommandRegistry()
      .define({ num: "/[0-9]+/" }, { num: ([d]) => Number(d) })
      .command('"add" num num', z.tuple([z.number(), z.number()]), async ([a, b]) => {
        seen(a + b);
      })
      .compile();

    const parsed = grammar.parse("add 2 3");
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    await grammar.handlerFor(parsed.command.pattern)?.(parsed.command.args, ctx());
    expect(seen).toHaveBeenCalledWith(5);
  });

  it("rejects arguments that do not fit the schema", async () => {
    const grammar = new CommandRegistry()
      .define({ "?word": "/[a-z]+/" })
      .command('"num" word', z.tuple([z.number()]), noop)
      .compile();
    const handler = grammar.handlerFor('"num" word');
    await expect(handler?.(["abc"], ctx())).rejects.toThrow(z.ZodError);
  });
});
