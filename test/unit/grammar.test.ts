import { describe, it, expect } from "vitest";
import { DEFAULT_MAX_STEPS, Grammar, alternation, compilePattern, parseRuleName } from "../../src/grammar.js";
import { GrammarError } from "../../src/errors.js";

function grammar(defs: Record<string, string>, start: string[], maxSteps?: number, maxDepth?: number): Grammar {
  return Grammar.compile(Object.entries(defs), start, maxSteps, maxDepth);
}

describe("parseRuleName", () => {
  it("splits the inline marker from the name", () => {
    expect(parseRuleName("?any_text")).toEqual({ name: "any_text", inline: true });
    expect(parseRuleName("chord")).toEqual({ name: "chord", inline: false });
  });

  it("rejects names that are not identifiers", () => {
    expect(() => parseRuleName("bad-name")).toThrow(GrammarError);
  });
});

describe("alternation", () => {
  it("orders words longest first and escapes regex syntax", () => {
    expect(alternation(["a", "ab", "x.yz"])).toBe("/(?:x\\.yz|ab|a)\\b/");
  });
});

describe("compilePattern", () => {
  it("builds a sequence of literal and reference", () => {
    expect(compilePattern('"say" chord')).toEqual({
      type: "seq",
      items: [
        { type: "literal", value: "say" },
        { type: "ref", name: "chord" },
      ],
    });
  });

  it("treats brackets as optional", () => {
    expect(compilePattern('["please"]')).toEqual({
      type: "repeat",
      expr: { type: "literal", value: "please" },
      min: 0,
      max: 1,
    });
  });

  it("rejects malformed patterns", () => {
    expect(() => compilePattern('"say')).toThrow(GrammarError);
    expect(() => compilePattern("(a")).toThrow('Expected ")"');
    expect(() => compilePattern('""')).toThrow("Empty literal");
    expect(() => compilePattern("/(/")).toThrow("Invalid regex");
    expect(() => compilePattern("")).toThrow("Empty sequence");
  });
});

describe("Grammar.compile", () => {
  it("rejects references to undefined rules", () => {
    expect(() => grammar({ greet: '"hello" name' }, ["greet"])).toThrow(
      'Rule "greet" references undefined rule "name"',
    );
  });

  it("rejects an undefined start rule", () => {
    expect(() => grammar({ a: '"x"' }, ["b"])).toThrow('Start rule "b" is not defined');
  });

  it("rejects a rule defined twice", () => {
    expect(() => Grammar.compile([["a", '"x"'], ["?a", '"y"']], ["a"])).toThrow('Rule "a" defined twice');
  });
});

describe("Grammar.match", () => {
  const greet = grammar({ greet: '"hello" name', name: "/[a-z]+/" }, ["greet"]);

  it("drops literals and keeps regex matches and rule trees", () => {
    expect(greet.match("hello world")).toEqual({
      ok: true,
      tree: { rule: "greet", children: [{ rule: "name", children: ["world"] }] },
    });
  });

  it("inlines a ? rule with a single child", () => {
    const g = grammar({ greet: '"hello" name', "?name": "/[a-z]+/" }, ["greet"]);
    expect(g.match("hello world")).toEqual({ ok: true, tree: { rule: "greet", children: ["world"] } });
  });

  it("skips surrounding whitespace", () => {
    expect(greet.match("   hello    world  ").ok).toBe(true);
  });

  it("requires a word boundary after a literal", () => {
    expect(greet.match("helloworld")).toEqual({ ok: false, position: 0, expected: ['"hello"'] });
  });

  it("reports the furthest failure position and what was expected there", () => {
    expect(greet.match("hello 123")).toEqual({ ok: false, position: 6, expected: ["/[a-z]+/"] });
    expect(greet.match("hello world extra")).toEqual({ ok: false, position: 12, expected: ["end of input"] });
  });

  it("collects every repetition", () => {
    const g = grammar({ list: '"keys" word+', "?word": "/[a-z]+/" }, ["list"]);
    expect(g.match("keys a b c")).toEqual({ ok: true, tree: { rule: "list", children: ["a", "b", "c"] } });
    expect(g.match("keys").ok).toBe(false);
  });

  it("backtracks out of a greedy repetition", () => {
    const g = grammar({ cmd: 'word* "now"', "?word": "/[a-z]+/" }, ["cmd"]);
    expect(g.match("go there now")).toEqual({ ok: true, tree: { rule: "cmd", children: ["go", "there"] } });
  });

  it("tries start rules in order", () => {
    const g = grammar({ first: "/[a-z]+/", second: '"stop"' }, ["first", "second"]);
    const result = g.match("stop");
    expect(result.ok && result.tree.rule).toBe("first");
  });

  it("terminates on left recursion", () => {
    const g = grammar({ expr: 'expr "+" num | num', "?num": "/[0-9]+/" }, ["expr"]);
    expect(g.match("1")).toEqual({ ok: true, tree: { rule: "expr", children: ["1"] } });
    expect(g.match("1 + 2")).toEqual({ ok: false, position: 2, expected: ["end of input"] });
  });

  it("gives up once the step budget is spent", () => {
    const g = grammar({ s: '(/a/ | /a/)* "b"' }, ["s"], 50);
    expect(g.match("a".repeat(20))).toMatchObject({ ok: false, expected: ["(step limit exceeded)"] });
  });

  it("gives up once matching nests past the depth limit", () => {
    const g = grammar({ chain: 'item ("+" item)*', "?item": "/[a-z]+/" }, ["chain"], DEFAULT_MAX_STEPS, 20);
    expect(g.match("a+b").ok).toBe(true);
    expect(g.match(Array(50).fill("a").join("+"))).toMatchObject({
      ok: false,
      expected: ["(nesting limit exceeded)"],
    });
  });

  it("does not overflow the stack on a long input under the default limits", () => {
    const g = grammar({ chain: 'item ("plus" item)*', "?item": "/[a-z]+/" }, ["chain"]);
    const line = Array(1400).fill("alpha").join(" plus ");
    expect(g.match(line)).toMatchObject({ ok: false, expected: ["(nesting limit exceeded)"] });
  });
});
