// grammar.ts: Command pattern language: compile rule fragments, match utterances
//
// Pattern syntax:
//   alternatives := sequence ("|" sequence)*
//   sequence     := item*
//   item         := atom ("*" | "+" | "?")?
//   atom         := "literal" | /regex/flags | rule_name | "(" alternatives ")" | "[" alternatives "]"
//
// Whitespace in the input is skipped before every terminal. Literals are dropped from
// the parse tree; regex matches are kept as strings; rule references become Trees.

import { GrammarError } from "./errors.js";

export interface Tree {
  readonly rule: string;
  readonly children: readonly Value[];
}

export type Value = string | Tree;

export type Expr =
  | { readonly type: "literal"; readonly value: string }
  | { readonly type: "regex"; readonly source: string; readonly re: RegExp }
  | { readonly type: "ref"; readonly name: string }
  | { readonly type: "seq"; readonly items: readonly Expr[] }
  | { readonly type: "alt"; readonly options: readonly Expr[] }
  | { readonly type: "repeat"; readonly expr: Expr; readonly min: number; readonly max: number };

export interface Rule {
  readonly name: string;
  /** Replace the rule's Tree by its only child when it produced exactly one value. */
  readonly inline: boolean;
  readonly expr: Expr;
}

export type MatchResult =
  | { ok: true; tree: Tree }
  | { ok: false; position: number; expected: string[] };

export const DEFAULT_MAX_STEPS = 100_000;
/** Nested matcher calls allowed before giving up; stays well inside the default V8 stack. */
export const DEFAULT_MAX_DEPTH = 1_000;

const NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const WORD_CHAR = /\w/;

/** Split a rule key such as "?any_text" into its name and inline flag. */
export function parseRuleName(key: string): { name: string; inline: boolean } {
  const inline = key.startsWith("?");
  const name = inline ? key.slice(1) : key;
  if (!NAME_RE.test(name)) throw new GrammarError(`Invalid rule name "${key}"`);
  return { name, inline };
}

/** Build a regex pattern fragment matching any of the given words, longest first. */
export function alternation(words: Iterable<string>): string {
  const escaped = [...words]
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .map((w) => w.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&"));
  return `/(?:${escaped.join("|")})\\b/`;
}

// --- Pattern compiler ---

type Token =
  | { kind: "string"; text: string; value: string }
  | { kind: "regex"; text: string; body: string; flags: string }
  | { kind: "name"; text: string }
  | { kind: "punct"; text: string };

const TOKEN_RE = /\s*(?:("(?:[^"\\]|\\.)*")|\/((?:[^/\\\n]|\\.)+)\/([imsu]*)|([A-Za-z_][A-Za-z0-9_]*)|([|()[\]*+?]))/y;

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  for (;;) {
    while (pos < source.length && /\s/.test(source.charAt(pos))) pos++;
    if (pos >= source.length) return tokens;
    TOKEN_RE.lastIndex = pos;
    const m = TOKEN_RE.exec(source);
    if (!m) throw new GrammarError(`Unexpected character ${JSON.stringify(source.charAt(pos))} at ${pos}`, source);
    pos = TOKEN_RE.lastIndex;
    const [text, str, reBody, reFlags, name, punct] = m;
    if (str !== undefined) {
      const value: unknown = JSON.parse(str);
      if (typeof value !== "string" || value.length === 0) {
        throw new GrammarError(`Empty literal at ${m.index}`, source);
      }
      tokens.push({ kind: "string", text, value });
    } else if (reBody !== undefined) {
      tokens.push({ kind: "regex", text, body: reBody, flags: reFlags ?? "" });
    } else if (name !== undefined) {
      tokens.push({ kind: "name", text: name });
    } else if (punct !== undefined) {
      tokens.push({ kind: "punct", text: punct });
    }
  }
}

class PatternParser {
  private pos = 0;

  constructor(private readonly tokens: Token[], private readonly source: string) {}

  parse(): Expr {
    const expr = this.alternatives();
    const rest = this.tokens[this.pos];
    if (rest) throw new GrammarError(`Unexpected "${rest.text.trim()}"`, this.source);
    return expr;
  }

  private peekPunct(text: string): boolean {
    const tok = this.tokens[this.pos];
    return tok !== undefined && tok.kind === "punct" && tok.text === text;
  }

  private expect(text: string): void {
    if (!this.peekPunct(text)) throw new GrammarError(`Expected "${text}"`, this.source);
    this.pos++;
  }

  private alternatives(): Expr {
    const options = [this.sequence()];
    while (this.peekPunct("|")) {
      this.pos++;
      options.push(this.sequence());
    }
    return options.length === 1 ? options[0] : { type: "alt", options };
  }

  private sequence(): Expr {
    const items: Expr[] = [];
    for (;;) {
      const tok = this.tokens[this.pos];
      if (!tok || (tok.kind === "punct" && (tok.text === "|" || tok.text === ")" || tok.text === "]"))) break;
      items.push(this.item());
    }
    if (items.length === 0) throw new GrammarError("Empty sequence", this.source);
    return items.length === 1 ? items[0] : { type: "seq", items };
  }

  private item(): Expr {
    const atom = this.atom();
    if (this.peekPunct("*")) { this.pos++; return { type: "repeat", expr: atom, min: 0, max: Infinity }; }
    if (this.peekPunct("+")) { this.pos++; return { type: "repeat", expr: atom, min: 1, max: Infinity }; }
    if (this.peekPunct("?")) { this.pos++; return { type: "repeat", expr: atom, min: 0, max: 1 }; }
    return atom;
  }

  private atom(): Expr {
    const tok = this.tokens[this.pos++];
    if (!tok) throw new GrammarError("Unexpected end of pattern", this.source);
    switch (tok.kind) {
      case "string":
        return { type: "literal", value: tok.value };
      case "regex": {
        let re: RegExp;
        try {
          re = new RegExp(tok.body, tok.flags + "y");
        } catch (err) {
          throw new GrammarError(`Invalid regex /${tok.body}/: ${err instanceof Error ? err.message : String(err)}`, this.source);
        }
        return { type: "regex", source: `/${tok.body}/${tok.flags}`, re };
      }
      case "name":
        return { type: "ref", name: tok.text };
      case "punct":
        if (tok.text === "(") {
          const inner = this.alternatives();
          this.expect(")");
          return inner;
        }
        if (tok.text === "[") {
          const inner = this.alternatives();
          this.expect("]");
          return { type: "repeat", expr: inner, min: 0, max: 1 };
        }
        throw new GrammarError(`Unexpected "${tok.text}"`, this.source);
    }
  }
}

export function compilePattern(source: string): Expr {
  return new PatternParser(tokenize(source), source).parse();
}

function collectRefs(expr: Expr, out: Set<string>): Set<string> {
  switch (expr.type) {
    case "ref": out.add(expr.name); break;
    case "seq": expr.items.forEach((e) => collectRefs(e, out)); break;
    case "alt": expr.options.forEach((e) => collectRefs(e, out)); break;
    case "repeat": collectRefs(expr.expr, out); break;
    default: break;
  }
  return out;
}

// --- Matcher ---

class StepLimitExceeded extends Error {}
class NestingLimitExceeded extends Error {}

type Continuation = (pos: number, values: readonly Value[]) => boolean;

class Match {
  private steps = 0;
  private depth = 0;
  private furthest = 0;
  private expected = new Set<string>();
  private readonly active = new Set<string>();

  constructor(
    private readonly rules: ReadonlyMap<string, Rule>,
    private readonly text: string,
    private readonly maxSteps: number,
    private readonly maxDepth: number,
  ) {}

  run(start: readonly string[]): MatchResult {
    const found: { tree?: Tree } = {};
    const options: Expr[] = start.map((name) => ({ type: "ref", name }));
    try {
      this.expr({ type: "alt", options }, 0, [], (pos, values) => {
        const end = this.skipSpace(pos);
        if (end !== this.text.length) return this.fail(end, "end of input");
        const first = values[0];
        if (first === undefined || typeof first === "string") return false;
        found.tree = first;
        return true;
      });
    } catch (err) {
      if (err instanceof StepLimitExceeded) {
        return { ok: false, position: this.furthest, expected: ["(step limit exceeded)"] };
      }
      // RangeError: the engine's own stack ran out before maxDepth did
      if (err instanceof NestingLimitExceeded || err instanceof RangeError) {
        return { ok: false, position: this.furthest, expected: ["(nesting limit exceeded)"] };
      }
      throw err;
    }
    if (found.tree) return { ok: true, tree: found.tree };
    return { ok: false, position: this.furthest, expected: [...this.expected] };
  }

  private skipSpace(pos: number): number {
    let p = pos;
    while (p < this.text.length && /\s/.test(this.text.charAt(p))) p++;
    return p;
  }

  private fail(pos: number, what: string): false {
    if (pos > this.furthest) {
      this.furthest = pos;
      this.expected = new Set([what]);
    } else if (pos === this.furthest) {
      this.expected.add(what);
    }
    return false;
  }

  // Continuations run inside the call that matched, so depth grows with the input
  // consumed so far, not only with grammar nesting.
  private expr(e: Expr, pos: number, values: readonly Value[], k: Continuation): boolean {
    if (++this.steps > this.maxSteps) throw new StepLimitExceeded();
    if (this.depth >= this.maxDepth) throw new NestingLimitExceeded();
    this.depth++;
    try {
      return this.step(e, pos, values, k);
    } finally {
      this.depth--;
    }
  }

  private step(e: Expr, pos: number, values: readonly Value[], k: Continuation): boolean {
    switch (e.type) {
      case "literal": {
        const start = this.skipSpace(pos);
        const end = start + e.value.length;
        if (!this.text.startsWith(e.value, start)) return this.fail(start, JSON.stringify(e.value));
        // "say" must not match the start of "sayonara"
        if (WORD_CHAR.test(e.value.charAt(e.value.length - 1)) && WORD_CHAR.test(this.text.charAt(end))) {
          return this.fail(start, JSON.stringify(e.value));
        }
        return k(end, values);
      }

      case "regex": {
        const start = this.skipSpace(pos);
        e.re.lastIndex = start;
        const m = e.re.exec(this.text);
        if (!m || m[0].length === 0) return this.fail(start, e.source);
        return k(start + m[0].length, [...values, m[0]]);
      }

      case "ref": {
        const rule = this.rules.get(e.name);
        if (!rule) throw new GrammarError(`Undefined rule "${e.name}"`);
        const key = `${e.name}@${pos}`;
        // left recursion guard
        if (this.active.has(key)) return false;
        this.active.add(key);
        try {
          return this.expr(rule.expr, pos, [], (p, children) =>
            k(p, [...values, buildValue(rule, children)]),
          );
        } finally {
          this.active.delete(key);
        }
      }

      case "seq":
        return this.seq(e.items, 0, pos, values, k);

      case "alt":
        return e.options.some((option) => this.expr(option, pos, values, k));

      case "repeat": {
        const loop = (count: number, p: number, vals: readonly Value[]): boolean => {
          if (
            count < e.max &&
            this.expr(e.expr, p, vals, (np, nv) => np > p && loop(count + 1, np, nv))
          ) {
            return true;
          }
          return count >= e.min && k(p, vals);
        };
        return loop(0, pos, values);
      }
    }
  }

  private seq(items: readonly Expr[], i: number, pos: number, values: readonly Value[], k: Continuation): boolean {
    const item = items[i];
    if (item === undefined) return k(pos, values);
    return this.expr(item, pos, values, (p, v) => this.seq(items, i + 1, p, v, k));
  }
}

function buildValue(rule: Rule, children: readonly Value[]): Value {
  const only = children[0];
  if (rule.inline && children.length === 1 && only !== undefined) return only;
  return { rule: rule.name, children };
}

/** A set of compiled rules plus the start alternatives tried in order. */
export class Grammar {
  private constructor(
    private readonly rules: ReadonlyMap<string, Rule>,
    readonly start: readonly string[],
    private readonly maxSteps: number,
    private readonly maxDepth: number,
  ) {}

  /**
   * Compile rule bodies keyed by name ("?name" for inline rules).
   * Every referenced rule must be defined.
   */
  static compile(
    definitions: Iterable<[string, string]>,
    start: readonly string[],
    maxSteps = DEFAULT_MAX_STEPS,
    maxDepth = DEFAULT_MAX_DEPTH,
  ): Grammar {
    const rules = new Map<string, Rule>();
    for (const [key, body] of definitions) {
      const { name, inline } = parseRuleName(key);
      if (rules.has(name)) throw new GrammarError(`Rule "${name}" defined twice`);
      rules.set(name, { name, inline, expr: compilePattern(body) });
    }
    for (const rule of rules.values()) {
      for (const ref of collectRefs(rule.expr, new Set())) {
        if (!rules.has(ref)) throw new GrammarError(`Rule "${rule.name}" references undefined rule "${ref}"`);
      }
    }
    for (const name of start) {
      if (!rules.has(name)) throw new GrammarError(`Start rule "${name}" is not defined`);
    }
    return new Grammar(rules, [...start], maxSteps, maxDepth);
  }

  match(text: string): MatchResult {
    return new Match(this.rules, text, this.maxSteps, this.maxDepth).run(this.start);
  }
}
