import type { Token } from "../lexer/token.js";
import type { LoxValue } from "../interpreter/values.js";

/**
 * Expression trees are built bottom-up by the parser and never mutated.
 * Every node owns its children outright; nothing is shared.
 */
export type Expression = LiteralExpr | UnaryExpr | BinaryExpr | GroupingExpr;

export interface Node {
  /** The token most representative of the node, used for diagnostics. */
  readonly token: Token;
}

/**
 * Example: `123`, `"abc"`, `true`, `nil`
 */
export interface LiteralExpr extends Node {
  readonly kind: "Literal";
  readonly value: LoxValue;
}

/**
 * Example: `-x`, `!ready`
 */
export interface UnaryExpr extends Node {
  readonly kind: "Unary";
  readonly operator: Token;
  readonly right: Expression;
}

/**
 * Example: `a + b`
 */
export interface BinaryExpr extends Node {
  readonly kind: "Binary";
  readonly left: Expression;
  readonly operator: Token;
  readonly right: Expression;
}

/**
 * Example: `(a + b)`; the token is the opening parenthesis.
 */
export interface GroupingExpr extends Node {
  readonly kind: "Grouping";
  readonly expression: Expression;
}

export const literal = (token: Token, value: LoxValue): LiteralExpr => ({
  kind: "Literal",
  value,
  token,
});

export const unary = (operator: Token, right: Expression): UnaryExpr => ({
  kind: "Unary",
  operator,
  right,
  token: operator,
});

export const binary = (
  left: Expression,
  operator: Token,
  right: Expression
): BinaryExpr => ({
  kind: "Binary",
  left,
  operator,
  right,
  token: operator,
});

export const grouping = (
  openParen: Token,
  expression: Expression
): GroupingExpr => ({
  kind: "Grouping",
  expression,
  token: openParen,
});
