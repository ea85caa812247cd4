/**
 * A deliberately small JSONPath subset for catalog discovery.
 *
 *   query     = "$" segment*
 *   segment   = "." name | ".*" | "[" selector "]"
 *   selector  = "*" | integer | string | "?" filter | "?(" filter ")"
 *   filter    = "@" relpath [ compare literal | "=~" regex ]
 *   relpath   = ( "." name | "[" string "]" )*
 *   compare   = "==" | "!=" | "<" | "<=" | ">" | ">="
 *   literal   = string | number | "true" | "false" | "null"
 *   name      = [A-Za-z_$][A-Za-z0-9_$-]*
 *   string    = '…' | "…"     (\\ \' \" escapes)
 *   regex     = "/" … "/" [imsu]*
 *
 * Anything else (recursive descent, slices, unions, boolean operators,
 * functions) is rejected with QuerySyntaxError. Evaluation yields the list of
 * matched values in document order; a missing field matches nothing and never
 * raises.
 */

import { QuerySyntaxError } from "./errors";

export type Scalar = string | number | boolean | null;

export type CompareOp = "==" | "!=" | "<" | "<=" | ">" | ">=";

export type Predicate =
  | { kind: "exists"; path: string[]; }
  | { kind: "compare"; path: string[]; op: CompareOp; value: Scalar; }
  | { kind: "match"; path: string[]; pattern: RegExp; };

export type Segment =
  | { kind: "field"; name: string; }
  | { kind: "wildcard"; }
  | { kind: "index"; index: number; }
  | { kind: "filter"; predicate: Predicate; };

export interface CompiledQuery {
  source: string;
  segments: Segment[];
  evaluate(root: unknown): unknown[];
}

const NAME_START = /[A-Za-z_$]/;
const NAME_PART = /[A-Za-z0-9_$-]/;
const REGEX_FLAGS = /^[imsu]*$/;

class Parser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parse(): Segment[] {
    this.skipSpace();
    this.expect("$");
    const segments: Segment[] = [];
    while (true) {
      this.skipSpace();
      if (this.done()) break;
      segments.push(this.segment());
    }
    return segments;
  }

  private segment(): Segment {
    const ch = this.peek();
    if (ch === ".") {
      this.pos++;
      if (this.peek() === ".") {
        this.fail("Recursive descent '..' is not supported");
      }
      if (this.peek() === "*") {
        this.pos++;
        return { kind: "wildcard" };
      }
      return { kind: "field", name: this.name() };
    }
    if (ch === "[") {
      this.pos++;
      this.skipSpace();
      const segment = this.selector();
      this.skipSpace();
      this.expect("]");
      return segment;
    }
    return this.fail(`Unexpected '${ch}'`);
  }

  private selector(): Segment {
    const ch = this.peek();
    if (ch === "*") {
      this.pos++;
      return { kind: "wildcard" };
    }
    if (ch === "'" || ch === "\"") {
      return { kind: "field", name: this.string() };
    }
    if (ch === "?") {
      this.pos++;
      this.skipSpace();
      if (this.peek() === "(") {
        this.pos++;
        this.skipSpace();
        const predicate = this.filter();
        this.skipSpace();
        this.expect(")");
        return { kind: "filter", predicate };
      }
      return { kind: "filter", predicate: this.filter() };
    }
    if (ch === "-" || isDigit(ch)) {
      const start = this.pos;
      const value = this.number();
      if (!Number.isInteger(value)) {
        this.pos = start;
        this.fail("Array index must be an integer");
      }
      if (this.peek() === ":") {
        this.fail("Array slices are not supported");
      }
      return { kind: "index", index: value };
    }
    return this.fail(`Unexpected '${ch}' in selector`);
  }

  private filter(): Predicate {
    this.expect("@");
    const path: string[] = [];
    while (true) {
      if (this.peek() === ".") {
        this.pos++;
        path.push(this.name());
      } else if (this.peek() === "[") {
        this.pos++;
        this.skipSpace();
        const quote = this.peek();
        if (quote !== "'" && quote !== "\"") {
          this.fail("Only quoted member names are allowed inside filters");
        }
        path.push(this.string());
        this.skipSpace();
        this.expect("]");
      } else {
        break;
      }
    }

    this.skipSpace();
    if (this.lookingAt("=~")) {
      this.pos += 2;
      this.skipSpace();
      return { kind: "match", path, pattern: this.regex() };
    }
    const op = this.compareOp();
    if (!op) {
      return { kind: "exists", path };
    }
    this.skipSpace();
    return { kind: "compare", path, op, value: this.literal() };
  }

  private compareOp(): CompareOp | null {
    for (const op of ["==", "!=", "<=", ">=", "<", ">"] as const) {
      if (this.lookingAt(op)) {
        this.pos += op.length;
        return op;
      }
    }
    if (this.lookingAt("&&") || this.lookingAt("||")) {
      this.fail("Boolean operators are not supported");
    }
    return null;
  }

  private literal(): Scalar {
    const ch = this.peek();
    if (ch === "'" || ch === "\"") return this.string();
    if (ch === "-" || isDigit(ch)) return this.number();
    for (const [word, value] of [["true", true], ["false", false], ["null", null]] as const) {
      if (this.lookingAt(word) && !NAME_PART.test(this.text.charAt(this.pos + word.length))) {
        this.pos += word.length;
        return value;
      }
    }
    return this.fail("Expected a string, number, true, false or null");
  }

  private regex(): RegExp {
    this.expect("/");
    let source = "";
    while (true) {
      if (this.done()) this.fail("Unterminated regular expression");
      const ch = this.text.charAt(this.pos++);
      if (ch === "\\") {
        const next = this.text.charAt(this.pos++);
        source += next === "/" ? "/" : `\\${next}`;
        continue;
      }
      if (ch === "/") break;
      source += ch;
    }
    let flags = "";
    while (/[a-z]/.test(this.peek())) {
      flags += this.text.charAt(this.pos++);
    }
    if (!REGEX_FLAGS.test(flags)) {
      this.fail(`Unsupported regular expression flags '${flags}'`);
    }
    try {
      return new RegExp(source, flags);
    } catch (err) {
      return this.fail(
        `Invalid regular expression: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  private name(): string {
    const start = this.pos;
    if (!NAME_START.test(this.peek())) {
      this.fail("Expected a member name");
    }
    while (NAME_PART.test(this.peek())) this.pos++;
    return this.text.slice(start, this.pos);
  }

  private string(): string {
    const quote = this.text.charAt(this.pos++);
    let value = "";
    while (true) {
      if (this.done()) this.fail("Unterminated string");
      const ch = this.text.charAt(this.pos++);
      if (ch === quote) return value;
      if (ch === "\\") {
        const next = this.text.charAt(this.pos++);
        if (next !== "\\" && next !== "'" && next !== "\"") {
          this.pos -= 2;
          this.fail(`Unsupported escape '\\${next}'`);
        }
        value += next;
        continue;
      }
      value += ch;
    }
  }

  private number(): number {
    const match = /^-?\d+(\.\d+)?([eE][+-]?\d+)?/.exec(this.text.slice(this.pos));
    if (!match) {
      return this.fail("Expected a number");
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private expect(token: string): void {
    if (!this.lookingAt(token)) {
      this.fail(
        this.done() ? `Expected '${token}' but the query ended` : `Expected '${token}'`,
      );
    }
    this.pos += token.length;
  }

  private lookingAt(token: string): boolean {
    return this.text.startsWith(token, this.pos);
  }

  private peek(): string {
    return this.text.charAt(this.pos);
  }

  private done(): boolean {
    return this.pos >= this.text.length;
  }

  private skipSpace(): void {
    while (/\s/.test(this.peek())) this.pos++;
  }

  private fail(message: string): never {
    throw new QuerySyntaxError(message, this.pos);
  }
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function children(node: unknown): unknown[] {
  if (Array.isArray(node)) return node;
  if (isRecord(node)) return Object.values(node);
  return [];
}

function resolve(node: unknown, path: string[]): unknown {
  let current = node;
  for (const key of path) {
    if (!isRecord(current) || !Object.hasOwn(current, key)) return undefined;
    current = current[key];
  }
  return current;
}

function compare(left: unknown, op: CompareOp, right: Scalar): boolean {
  switch (op) {
    case "==":
      return left === right;
    case "!=":
      return left !== right;
  }
  if (typeof left === "number" && typeof right === "number") {
    return order(left, right, op);
  }
  if (typeof left === "string" && typeof right === "string") {
    return order(left, right, op);
  }
  return false;
}

function order<T extends number | string>(
  a: T,
  b: T,
  op: "<" | "<=" | ">" | ">=",
): boolean {
  switch (op) {
    case "<":
      return a < b;
    case "<=":
      return a <= b;
    case ">":
      return a > b;
    case ">=":
      return a >= b;
  }
}

function test(node: unknown, predicate: Predicate): boolean {
  const value = resolve(node, predicate.path);
  if (value === undefined) return false;
  switch (predicate.kind) {
    case "exists":
      return true;
    case "compare":
      return compare(value, predicate.op, predicate.value);
    case "match":
      return typeof value === "string" && predicate.pattern.test(value);
  }
}

function step(nodes: unknown[], segment: Segment): unknown[] {
  const out: unknown[] = [];
  for (const node of nodes) {
    switch (segment.kind) {
      case "field":
        if (isRecord(node) && Object.hasOwn(node, segment.name)) {
          out.push(node[segment.name]);
        }
        break;
      case "wildcard":
        out.push(...children(node));
        break;
      case "index":
        if (Array.isArray(node)) {
          const i = segment.index < 0 ? node.length + segment.index : segment.index;
          if (i >= 0 && i < node.length) out.push(node[i]);
        }
        break;
      case "filter":
        for (const child of children(node)) {
          if (test(child, segment.predicate)) out.push(child);
        }
        break;
    }
  }
  return out;
}

export function compileQuery(source: string): CompiledQuery {
  const segments = new Parser(source).parse();
  return {
    source,
    segments,
    evaluate(root: unknown): unknown[] {
      return segments.reduce<unknown[]>(step, [root]);
    },
  };
}

export function evaluateQuery(source: string, root: unknown): unknown[] {
  return compileQuery(source).evaluate(root);
}
