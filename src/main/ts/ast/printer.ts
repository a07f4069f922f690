import type { Expression } from "./ast.js";
import { stringify } from "../interpreter/values.js";

/**
 * Canonical parenthesized form of a tree, e.g. `-123 * (45.67)` prints as
 * `( * (-123) (gr 45.67) )`.
 */
export function printAst(expr: Expression): string {
  switch (expr.kind) {
    case "Literal":
      return typeof expr.value === "string"
        ? `"${expr.value}"`
        : stringify(expr.value);
    case "Unary":
      return `(${expr.operator.lexeme}${printAst(expr.right)})`;
    case "Binary":
      return `( ${expr.operator.lexeme} ${printAst(expr.left)} ${printAst(
        expr.right
      )} )`;
    case "Grouping":
      return `(gr ${printAst(expr.expression)})`;
  }
}
