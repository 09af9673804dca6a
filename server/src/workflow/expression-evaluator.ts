/**
 * Expression Evaluator
 *
 * Boolean expressions for conditional transitions, evaluated against a
 * runtime snapshot. Precedence, low to high: `||`, `&&`, unary `!`,
 * comparisons, atoms. Parentheses group.
 *
 * Evaluation never throws. Unknown identifiers resolve to null, which is
 * falsy, and characters the tokenizer does not recognise are skipped.
 */

import type { WorkflowRuntimeState } from "@flowgate/types";

type Value = string | number | boolean | null;

type ComparisonOperator = "==" | "!=" | ">=" | "<=" | ">" | "<";

type Token =
  | { kind: "or" }
  | { kind: "and" }
  | { kind: "not" }
  | { kind: "lparen" }
  | { kind: "rparen" }
  | { kind: "op"; op: ComparisonOperator }
  | { kind: "number"; value: number }
  | { kind: "string"; value: string }
  | { kind: "ident"; name: string };

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_.]/;
const DIGIT = /[0-9]/;

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expression.length) {
    const ch = expression[i];
    const pair = expression.slice(i, i + 2);

    if (/\s/.test(ch)) {
      i++;
    } else if (pair === "||") {
      tokens.push({ kind: "or" });
      i += 2;
    } else if (pair === "&&") {
      tokens.push({ kind: "and" });
      i += 2;
    } else if (pair === "==" || pair === "!=" || pair === ">=" || pair === "<=") {
      tokens.push({ kind: "op", op: pair });
      i += 2;
    } else if (ch === ">" || ch === "<") {
      tokens.push({ kind: "op", op: ch });
      i++;
    } else if (ch === "!") {
      tokens.push({ kind: "not" });
      i++;
    } else if (ch === "(") {
      tokens.push({ kind: "lparen" });
      i++;
    } else if (ch === ")") {
      tokens.push({ kind: "rparen" });
      i++;
    } else if (ch === "'" || ch === '"') {
      const end = expression.indexOf(ch, i + 1);
      const close = end === -1 ? expression.length : end;
      tokens.push({ kind: "string", value: expression.slice(i + 1, close) });
      i = close + 1;
    } else if (
      DIGIT.test(ch) ||
      (ch === "-" && DIGIT.test(expression[i + 1] ?? ""))
    ) {
      let j = i + 1;
      while (j < expression.length && /[0-9.]/.test(expression[j])) j++;
      tokens.push({ kind: "number", value: Number(expression.slice(i, j)) });
      i = j;
    } else if (IDENT_START.test(ch)) {
      let j = i + 1;
      while (j < expression.length && IDENT_PART.test(expression[j])) j++;
      tokens.push({ kind: "ident", name: expression.slice(i, j) });
      i = j;
    } else {
      // Unrecognised character
      i++;
    }
  }

  return tokens;
}

function isTruthy(value: Value): boolean {
  if (value === null) return false;
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0 && !Number.isNaN(value);
  const text = value.trim().toLowerCase();
  return text !== "" && text !== "false" && text !== "0";
}

function asNumber(value: Value): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "string" && /^\s*-?\d+(\.\d+)?\s*$/.test(value)) {
    return Number(value);
  }
  return undefined;
}

function asBoolean(value: Value): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const text = value.trim().toLowerCase();
    if (text === "true") return true;
    if (text === "false") return false;
  }
  return undefined;
}

function compare(left: Value, op: ComparisonOperator, right: Value): boolean {
  const l = asNumber(left);
  const r = asNumber(right);
  if (l !== undefined && r !== undefined) {
    switch (op) {
      case "==":
        return l === r;
      case "!=":
        return l !== r;
      case ">=":
        return l >= r;
      case "<=":
        return l <= r;
      case ">":
        return l > r;
      case "<":
        return l < r;
    }
  }

  // Ordering only makes sense for numbers
  if (op !== "==" && op !== "!=") {
    return false;
  }

  let equal: boolean;
  const lb = asBoolean(left);
  const rb = asBoolean(right);
  if (lb !== undefined && rb !== undefined) {
    equal = lb === rb;
  } else if (left === null || right === null) {
    equal = left === right;
  } else {
    equal = String(left).toLowerCase() === String(right).toLowerCase();
  }
  return op === "==" ? equal : !equal;
}

/**
 * Coerce an arbitrary OutputData value to something the evaluator compares.
 */
function toValue(value: unknown): Value {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (value === undefined) {
    return null;
  }
  return JSON.stringify(value);
}

class Parser {
  private position = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly state: WorkflowRuntimeState
  ) {}

  parse(): boolean {
    if (this.tokens.length === 0) {
      return true;
    }
    return this.parseOr();
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private parseOr(): boolean {
    let result = this.parseAnd();
    while (this.peek()?.kind === "or") {
      this.position++;
      const right = this.parseAnd();
      result = result || right;
    }
    return result;
  }

  private parseAnd(): boolean {
    let result = this.parseUnary();
    while (this.peek()?.kind === "and") {
      this.position++;
      const right = this.parseUnary();
      result = result && right;
    }
    return result;
  }

  private parseUnary(): boolean {
    if (this.peek()?.kind === "not") {
      this.position++;
      return !this.parseUnary();
    }
    return this.parseComparison();
  }

  private parseComparison(): boolean {
    const left = this.parsePrimary();
    const next = this.peek();
    if (next?.kind === "op") {
      this.position++;
      const right = this.parsePrimary();
      return compare(left, next.op, right);
    }
    return isTruthy(left);
  }

  private parsePrimary(): Value {
    const token = this.peek();
    if (!token) {
      return null;
    }
    this.position++;

    switch (token.kind) {
      case "lparen": {
        const inner = this.parseOr();
        if (this.peek()?.kind === "rparen") {
          this.position++;
        }
        return inner;
      }
      case "number":
      case "string":
        return token.value;
      case "ident":
        return this.resolveIdentifier(token.name);
      default:
        // Stray operator in value position
        return null;
    }
  }

  private resolveIdentifier(name: string): Value {
    const lower = name.toLowerCase();
    const output = this.state.outputData;

    switch (lower) {
      case "true":
        return true;
      case "false":
        return false;
      case "success":
        return this.state.status === "running";
      case "failure":
        return this.state.status === "failed";
      case "status":
        return this.state.status;
      case "iteration_count":
        return this.state.iterationCount;
    }

    if (lower.startsWith("output.")) {
      return toValue(output[name.slice("output.".length)]);
    }

    if (name.includes(".")) {
      // build.success reads build_success
      return toValue(output[name.replace(/\./g, "_")]);
    }

    return toValue(output[name]);
  }
}

/**
 * Evaluate a condition against a runtime snapshot.
 *
 * @example
 * evaluateExpression("output.result == 'ok' && iteration_count < 3", state)
 */
export function evaluateExpression(
  expression: string | undefined,
  state: WorkflowRuntimeState
): boolean {
  if (expression === undefined || expression.trim() === "") {
    return true;
  }
  return new Parser(tokenize(expression), state).parse();
}
