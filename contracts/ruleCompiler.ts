import { RuleCompileError } from "../shared/errors.js";
import type { CompiledRule, Payload, RuleDefinition } from "./contract.types.js";

type LiteralValue = boolean | null | number | string;
type Comparator = "==" | "!=" | ">" | ">=" | "<" | "<=";
type FunctionName = "len" | "exists" | "every" | "contains";

type Token =
  | { readonly type: "paren"; readonly value: "(" | ")" }
  | { readonly type: "comma" }
  | { readonly type: "operator"; readonly value: "and" | "or" | "not" | Comparator }
  | { readonly type: "literal"; readonly value: LiteralValue }
  | { readonly type: "identifier"; readonly value: string };

type Expr =
  | { readonly type: "literal"; readonly value: LiteralValue }
  | { readonly type: "path"; readonly segments: readonly string[] }
  | { readonly type: "call"; readonly fn: FunctionName; readonly args: readonly Expr[] }
  | { readonly type: "not"; readonly expr: Expr }
  | { readonly type: "logic"; readonly op: "and" | "or"; readonly left: Expr; readonly right: Expr }
  | { readonly type: "compare"; readonly op: Comparator; readonly left: Expr; readonly right: Expr };

/** Static result kind of an expression. `value` is anything read from the payload. */
type Kind = "boolean" | "number" | "string" | "value";

const COMPARATORS: readonly Comparator[] = ["==", "!=", ">=", "<=", ">", "<"];
const FUNCTIONS: readonly FunctionName[] = ["len", "exists", "every", "contains"];

class ParseFailure extends Error {}

export function compileRule(definition: RuleDefinition): CompiledRule {
  const predicate = compileCondition(definition.condition, definition.id);
  return {
    id: definition.id,
    severity: definition.severity,
    condition: definition.condition,
    message: definition.message,
    location: definition.location,
    fix: definition.fix,
    predicate,
  };
}

/**
 * Compiles a rule condition into a predicate over a payload. The predicate
 * returns true when the payload satisfies the rule.
 */
export function compileCondition(condition: string, ruleId: string): (payload: Payload) => boolean {
  let expr: Expr;
  try {
    expr = parse(tokenize(condition));
    const kind = checkKind(expr);
    if (kind !== "boolean" && kind !== "value") {
      throw new ParseFailure(`condition must evaluate to a boolean, got ${kind}`);
    }
  } catch (error) {
    if (error instanceof ParseFailure) {
      throw new RuleCompileError(ruleId, condition, error.message);
    }
    throw error;
  }

  return (payload) => isTruthy(evaluate(expr, payload));
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const ch = source[index] ?? "";
    const next = source[index + 1] ?? "";

    if (/\s/.test(ch)) {
      index += 1;
      continue;
    }
    if (ch === "(" || ch === ")") {
      tokens.push({ type: "paren", value: ch });
      index += 1;
      continue;
    }
    if (ch === ",") {
      tokens.push({ type: "comma" });
      index += 1;
      continue;
    }
    if (ch === "&" && next === "&") {
      tokens.push({ type: "operator", value: "and" });
      index += 2;
      continue;
    }
    if (ch === "|" && next === "|") {
      tokens.push({ type: "operator", value: "or" });
      index += 2;
      continue;
    }

    const comparator = COMPARATORS.find((op) => source.startsWith(op, index));
    if (comparator) {
      tokens.push({ type: "operator", value: comparator });
      index += comparator.length;
      continue;
    }
    if (ch === "!") {
      tokens.push({ type: "operator", value: "not" });
      index += 1;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const { value, end } = readString(source, index, ch);
      tokens.push({ type: "literal", value });
      index = end;
      continue;
    }

    const numberMatch = /^-?\d+(?:\.\d+)?/.exec(source.slice(index));
    if (numberMatch) {
      tokens.push({ type: "literal", value: Number(numberMatch[0]) });
      index += numberMatch[0].length;
      continue;
    }

    const identMatch = /^[A-Za-z_][A-Za-z0-9_.]*/.exec(source.slice(index));
    if (identMatch) {
      const raw = identMatch[0];
      const lower = raw.toLowerCase();
      if (lower === "and" || lower === "or" || lower === "not") {
        tokens.push({ type: "operator", value: lower });
      } else if (raw === "true" || raw === "false") {
        tokens.push({ type: "literal", value: raw === "true" });
      } else if (raw === "null") {
        tokens.push({ type: "literal", value: null });
      } else {
        tokens.push({ type: "identifier", value: raw });
      }
      index += raw.length;
      continue;
    }

    throw new ParseFailure(`unexpected character "${ch}" at ${String(index)}`);
  }

  if (tokens.length === 0) {
    throw new ParseFailure("empty condition");
  }
  return tokens;
}

function readString(source: string, start: number, quote: string): { value: string; end: number } {
  let cursor = start + 1;
  let value = "";
  while (cursor < source.length) {
    const ch = source[cursor] ?? "";
    if (ch === "\\") {
      const escaped = source[cursor + 1];
      if (escaped === undefined) break;
      value += escaped === "n" ? "\n" : escaped === "t" ? "\t" : escaped;
      cursor += 2;
      continue;
    }
    if (ch === quote) {
      return { value, end: cursor + 1 };
    }
    value += ch;
    cursor += 1;
  }
  throw new ParseFailure("unterminated string literal");
}

function parse(tokens: readonly Token[]): Expr {
  let cursor = 0;

  const peek = (): Token | undefined => tokens[cursor];
  const describe = (token: Token | undefined): string => {
    if (!token) return "end of condition";
    if (token.type === "comma") return '","';
    return `"${String(token.value)}"`;
  };
  const isOperator = (value: string): boolean => {
    const token = peek();
    return token?.type === "operator" && token.value === value;
  };
  const expectParen = (value: "(" | ")"): void => {
    const token = peek();
    if (token?.type !== "paren" || token.value !== value) {
      throw new ParseFailure(`expected "${value}" but found ${describe(token)}`);
    }
    cursor += 1;
  };

  const parseOr = (): Expr => {
    let left = parseAnd();
    while (isOperator("or")) {
      cursor += 1;
      left = { type: "logic", op: "or", left, right: parseAnd() };
    }
    return left;
  };

  const parseAnd = (): Expr => {
    let left = parseNot();
    while (isOperator("and")) {
      cursor += 1;
      left = { type: "logic", op: "and", left, right: parseNot() };
    }
    return left;
  };

  const parseNot = (): Expr => {
    if (isOperator("not")) {
      cursor += 1;
      return { type: "not", expr: parseNot() };
    }
    return parseComparison();
  };

  const parseComparison = (): Expr => {
    const left = parsePrimary();
    const token = peek();
    if (token?.type === "operator" && isComparator(token.value)) {
      cursor += 1;
      return { type: "compare", op: token.value, left, right: parsePrimary() };
    }
    return left;
  };

  const parsePrimary = (): Expr => {
    const token = peek();
    if (!token) {
      throw new ParseFailure("unexpected end of condition");
    }
    if (token.type === "paren" && token.value === "(") {
      cursor += 1;
      const inner = parseOr();
      expectParen(")");
      return inner;
    }
    if (token.type === "literal") {
      cursor += 1;
      return { type: "literal", value: token.value };
    }
    if (token.type === "identifier") {
      cursor += 1;
      const following = peek();
      if (following?.type === "paren" && following.value === "(") {
        return parseCall(token.value);
      }
      return { type: "path", segments: toSegments(token.value) };
    }
    throw new ParseFailure(`unexpected ${describe(token)}`);
  };

  const parseCall = (name: string): Expr => {
    if (!isFunctionName(name)) {
      throw new ParseFailure(`unknown function "${name}"`);
    }
    expectParen("(");
    const args: Expr[] = [];
    if (!isClosing(peek())) {
      args.push(parseOr());
      while (peek()?.type === "comma") {
        cursor += 1;
        args.push(parseOr());
      }
    }
    expectParen(")");
    return { type: "call", fn: name, args };
  };

  const expr = parseOr();
  if (cursor !== tokens.length) {
    throw new ParseFailure(`unexpected ${describe(peek())}`);
  }
  return expr;
}

function isClosing(token: Token | undefined): boolean {
  return token?.type === "paren" && token.value === ")";
}

function isComparator(value: string): value is Comparator {
  return (COMPARATORS as readonly string[]).includes(value);
}

function isFunctionName(value: string): value is FunctionName {
  return (FUNCTIONS as readonly string[]).includes(value);
}

function toSegments(path: string): string[] {
  const segments = path.split(".");
  if (segments.some((segment) => segment.length === 0)) {
    throw new ParseFailure(`malformed path "${path}"`);
  }
  return segments;
}

function checkKind(expr: Expr): Kind {
  switch (expr.type) {
    case "literal":
      if (typeof expr.value === "boolean") return "boolean";
      if (typeof expr.value === "number") return "number";
      if (typeof expr.value === "string") return "string";
      return "value";
    case "path":
      return "value";
    case "not":
      requireTruthable(expr.expr, "not");
      return "boolean";
    case "logic":
      requireTruthable(expr.left, expr.op);
      requireTruthable(expr.right, expr.op);
      return "boolean";
    case "compare": {
      const left = checkKind(expr.left);
      const right = checkKind(expr.right);
      if (expr.op !== "==" && expr.op !== "!=" && (left === "boolean" || right === "boolean")) {
        throw new ParseFailure(`operator ${expr.op} cannot order boolean operands`);
      }
      return "boolean";
    }
    case "call":
      return checkCall(expr.fn, expr.args);
  }
}

function requireTruthable(expr: Expr, op: string): void {
  const kind = checkKind(expr);
  if (kind === "number" || kind === "string") {
    throw new ParseFailure(`operand of ${op} must be boolean, got ${kind}`);
  }
}

function checkCall(fn: FunctionName, args: readonly Expr[]): Kind {
  const arity = fn === "every" || fn === "contains" ? 2 : 1;
  if (args.length !== arity) {
    throw new ParseFailure(`${fn}() takes ${String(arity)} argument(s), got ${String(args.length)}`);
  }
  const [target, extra] = args;
  if (target?.type !== "path") {
    throw new ParseFailure(`first argument of ${fn}() must be a field path`);
  }
  if (fn === "every" && !(extra?.type === "literal" && typeof extra.value === "string")) {
    throw new ParseFailure("second argument of every() must be a string key");
  }
  if (fn === "contains" && extra?.type !== "literal") {
    throw new ParseFailure("second argument of contains() must be a literal");
  }
  return fn === "len" ? "number" : "boolean";
}

function evaluate(expr: Expr, payload: Payload): unknown {
  switch (expr.type) {
    case "literal":
      return expr.value;
    case "path":
      return resolvePath(payload, expr.segments);
    case "not":
      return !isTruthy(evaluate(expr.expr, payload));
    case "logic":
      if (expr.op === "and") {
        return isTruthy(evaluate(expr.left, payload)) && isTruthy(evaluate(expr.right, payload));
      }
      return isTruthy(evaluate(expr.left, payload)) || isTruthy(evaluate(expr.right, payload));
    case "compare":
      return compare(expr.op, evaluate(expr.left, payload), evaluate(expr.right, payload));
    case "call":
      return callFunction(expr.fn, expr.args, payload);
  }
}

function callFunction(fn: FunctionName, args: readonly Expr[], payload: Payload): unknown {
  const [target, extra] = args;
  const value = target ? evaluate(target, payload) : undefined;
  const operand = extra ? evaluate(extra, payload) : undefined;

  switch (fn) {
    case "len":
      return lengthOf(value);
    case "exists":
      return value !== undefined && value !== null;
    case "every":
      if (value === undefined || value === null) return true;
      if (!Array.isArray(value) || typeof operand !== "string") return false;
      return value.every((item: unknown) => {
        if (!isRecord(item)) return false;
        const field = item[operand];
        return field !== undefined && field !== null;
      });
    case "contains":
      if (Array.isArray(value)) return value.includes(operand);
      if (typeof value === "string" && typeof operand === "string") return value.includes(operand);
      return false;
  }
}

function compare(op: Comparator, left: unknown, right: unknown): boolean {
  const a = left ?? null;
  const b = right ?? null;

  if (op === "==") return a === b;
  if (op === "!=") return a !== b;

  if (typeof a === "number" && typeof b === "number") return ordered(op, a, b);
  if (typeof a === "string" && typeof b === "string") return ordered(op, a, b);
  return false;
}

function ordered<T extends number | string>(op: ">" | ">=" | "<" | "<=", a: T, b: T): boolean {
  switch (op) {
    case ">":
      return a > b;
    case ">=":
      return a >= b;
    case "<":
      return a < b;
    case "<=":
      return a <= b;
  }
}

function lengthOf(value: unknown): number {
  if (typeof value === "string" || Array.isArray(value)) return value.length;
  if (isRecord(value)) return Object.keys(value).length;
  return 0;
}

function resolvePath(payload: Payload, segments: readonly string[]): unknown {
  let current: unknown = payload;
  for (const segment of segments) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
      continue;
    }
    if (!isRecord(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  return Boolean(value);
}
