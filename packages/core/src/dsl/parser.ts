/**
 * packages/core/src/dsl/parser.ts — Expression source parser.
 *
 * Why: Lets callers write `"width == aspectRatio * height"` instead of composing
 * builder calls. The parser produces an unbound tree of names; the binder decides
 * which names are constants and which are decision variables.
 */

import type { BinaryOp } from "../constants/types.js";
import type { Relation } from "../linear/types.js";

export type SourceNode =
  | Readonly<{ kind: "number"; value: number }>
  | Readonly<{ kind: "name"; name: string; position: number }>
  | Readonly<{ kind: "negate"; operand: SourceNode }>
  | Readonly<{ kind: "binary"; op: BinaryOp; left: SourceNode; right: SourceNode }>;

export type SourceRelation = Readonly<{
  lhs: SourceNode;
  relation: Relation;
  rhs: SourceNode;
}>;

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isIdentifierStart(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_" || ch === "$";
}

function isIdentifierPart(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch) || ch === ".";
}

export function formatSourceError(source: string, detail: string, position: number): string {
  const clamped = Number.isFinite(position)
    ? Math.min(Math.max(0, Math.trunc(position)), source.length)
    : 0;
  const caret = `${" ".repeat(2 + clamped)}^`;
  return `${detail} at position ${String(clamped)}\n  ${source}\n${caret}`;
}

export class ExpressionSyntaxError extends Error {
  readonly source: string;
  readonly position: number;

  constructor(source: string, detail: string, position: number) {
    super(formatSourceError(source, detail, position));
    this.name = "ExpressionSyntaxError";
    this.source = source;
    this.position = position;
  }
}

class Parser {
  readonly source: string;
  private pos = 0;

  constructor(source: string) {
    this.source = source;
  }

  parseExpression(): SourceNode {
    this.skipWhitespace();
    if (this.isEof()) this.fail("Unexpected end of input");
    const node = this.parseAdditive();
    this.skipWhitespace();
    if (!this.isEof()) {
      if (this.peekRelation() !== null) {
        this.fail("Relation operators are not allowed in a constant expression");
      }
      this.failUnexpected();
    }
    return node;
  }

  parseRelation(): SourceRelation {
    this.skipWhitespace();
    if (this.isEof()) this.fail("Unexpected end of input");
    const lhs = this.parseAdditive();
    this.skipWhitespace();
    const relation = this.consumeRelation();
    if (relation === null) {
      if (this.isEof()) this.fail('Expected a relation ("==", "<=" or ">=")');
      this.failUnexpected();
    }
    const rhs = this.parseAdditive();
    this.skipWhitespace();
    if (!this.isEof()) {
      if (this.peekRelation() !== null) {
        this.fail("Only one relation operator is allowed in a constraint");
      }
      this.failUnexpected();
    }
    return Object.freeze({ lhs, relation, rhs });
  }

  private parseAdditive(): SourceNode {
    let left = this.parseMultiplicative();
    while (true) {
      this.skipWhitespace();
      const ch = this.peek();
      if (ch !== "+" && ch !== "-") break;
      this.pos++;
      const right = this.parseMultiplicative();
      left = Object.freeze({ kind: "binary", op: ch, left, right });
    }
    return left;
  }

  private parseMultiplicative(): SourceNode {
    let left = this.parseUnary();
    while (true) {
      this.skipWhitespace();
      const ch = this.peek();
      if (ch !== "*" && ch !== "/") break;
      this.pos++;
      const right = this.parseUnary();
      left = Object.freeze({ kind: "binary", op: ch, left, right });
    }
    return left;
  }

  private parseUnary(): SourceNode {
    this.skipWhitespace();
    if (this.consumeIf("-")) {
      return Object.freeze({ kind: "negate", operand: this.parseUnary() });
    }
    if (this.consumeIf("+")) return this.parseUnary();
    return this.parseAtom();
  }

  private parseAtom(): SourceNode {
    this.skipWhitespace();
    const ch = this.peek();
    if (ch === null) this.fail("Unexpected end of input");

    if (ch === "(") {
      this.pos++;
      const inner = this.parseAdditive();
      this.skipWhitespace();
      if (!this.consumeIf(")")) this.fail('Expected ")"');
      return inner;
    }

    if (isDigit(ch) || (ch === "." && this.isDigitAt(1))) return this.parseNumber();
    if (isIdentifierStart(ch)) {
      const position = this.pos;
      const name = this.readIdentifier();
      return Object.freeze({ kind: "name", name, position });
    }
    this.fail(`Unexpected token "${ch}"`);
  }

  private parseNumber(): SourceNode {
    const start = this.pos;
    this.readDigits();
    if (this.peek() === ".") {
      this.pos++;
      if (!this.isDigitAt(0)) this.fail("Expected digits after decimal point");
      this.readDigits();
    }
    const exponent = this.peek();
    if (exponent === "e" || exponent === "E") {
      const sign = this.peek(1);
      const digitOffset = sign === "+" || sign === "-" ? 2 : 1;
      if (this.isDigitAt(digitOffset)) {
        this.pos += digitOffset;
        this.readDigits();
      }
    }

    const raw = this.source.slice(start, this.pos);
    const value = Number.parseFloat(raw);
    if (!Number.isFinite(value)) this.fail(`Invalid number "${raw}"`, start);
    return Object.freeze({ kind: "number", value });
  }

  private readDigits(): void {
    while (this.isDigitAt(0)) this.pos++;
  }

  private readIdentifier(): string {
    const start = this.pos;
    this.pos++;
    while (true) {
      const ch = this.peek();
      if (ch === null || !isIdentifierPart(ch)) break;
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  private peekRelation(): string | null {
    for (const op of ["==", "<=", ">=", "!=", "<", ">", "="]) {
      if (this.source.startsWith(op, this.pos)) return op;
    }
    return null;
  }

  private consumeRelation(): Relation | null {
    const start = this.pos;
    if (this.consumeIf("==")) return "==";
    if (this.consumeIf("<=")) return "<=";
    if (this.consumeIf(">=")) return ">=";
    if (this.consumeIf("!=")) this.fail('"!=" is not a linear relation', start);
    if (this.consumeIf("<") || this.consumeIf(">")) {
      this.fail('Strict inequalities are not supported; use "<=" or ">="', start);
    }
    if (this.consumeIf("=")) this.fail('Expected "==" for equality', start);
    return null;
  }

  private consumeIf(token: string): boolean {
    if (this.source.startsWith(token, this.pos)) {
      this.pos += token.length;
      return true;
    }
    return false;
  }

  private skipWhitespace(): void {
    while (true) {
      const ch = this.peek();
      if (ch === null || !isWhitespace(ch)) break;
      this.pos++;
    }
  }

  private isEof(): boolean {
    return this.pos >= this.source.length;
  }

  private isDigitAt(offset: number): boolean {
    const ch = this.peek(offset);
    return ch !== null && isDigit(ch);
  }

  private peek(offset = 0): string | null {
    const ch = this.source[this.pos + offset];
    return ch === undefined ? null : ch;
  }

  private failUnexpected(): never {
    const tok = this.peek();
    this.fail(tok === null ? "Unexpected end of input" : `Unexpected token "${tok}"`);
  }

  private fail(detail: string, position = this.pos): never {
    throw new ExpressionSyntaxError(this.source, detail, position);
  }
}

export function parseExpression(source: string): SourceNode {
  return new Parser(source).parseExpression();
}

export function parseRelation(source: string): SourceRelation {
  return new Parser(source).parseRelation();
}
