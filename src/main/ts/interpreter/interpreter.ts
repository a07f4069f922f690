import type { BinaryExpr, Expression, UnaryExpr } from "../ast/ast.js";
import { LoxError, attempt } from "../common/diagnostics.js";
import type { Result } from "../common/result.js";
import { TokenType } from "../lexer/token.js";
import type { LoxValue } from "./values.js";

/**
 * Tree-walking evaluator. It keeps no state between calls, so the same tree
 * can be evaluated any number of times with the same outcome.
 */
export class Interpreter {
  evaluate(expr: Expression): Result<LoxValue, LoxError> {
    return attempt(() => this.evaluateNode(expr));
  }

  private evaluateNode(expr: Expression): LoxValue {
    switch (expr.kind) {
      case "Literal":
        return expr.value;
      case "Grouping":
        return this.evaluateNode(expr.expression);
      case "Unary":
        return this.unary(expr);
      case "Binary":
        return this.binary(expr);
    }
  }

  private unary(expr: UnaryExpr): LoxValue {
    const right = this.evaluateNode(expr.right);

    switch (expr.operator.type) {
      case TokenType.Minus:
        if (typeof right !== "number") {
          throw LoxError.runtime(expr.operator, "Operand must be a number.");
        }
        return -right;
      case TokenType.Bang:
        if (typeof right !== "boolean") {
          throw LoxError.runtime(expr.operator, "Operand must be a boolean.");
        }
        return !right;
      default:
        throw LoxError.runtime(expr.operator, "Unknown unary operator.");
    }
  }

  private binary(expr: BinaryExpr): LoxValue {
    // Both sides always run, left first; there is no short-circuit here.
    const left = this.evaluateNode(expr.left);
    const right = this.evaluateNode(expr.right);
    const op = expr.operator.type;

    if (typeof left === "number" && typeof right === "number") {
      const result = numberOperation(op, left, right);
      if (result !== undefined) return result;
    } else if (typeof left === "string" && typeof right === "string") {
      if (op === TokenType.Plus) return left + right;
    } else if (left === null && right === null) {
      if (op === TokenType.EqualEqual) return true;
      if (op === TokenType.BangEqual) return false;
    }

    throw LoxError.runtime(expr.operator, "Incompatible types.");
  }
}

function numberOperation(
  op: TokenType,
  left: number,
  right: number
): LoxValue | undefined {
  switch (op) {
    case TokenType.Plus:
      return left + right;
    case TokenType.Minus:
      return left - right;
    case TokenType.Star:
      return left * right;
    case TokenType.Slash:
      return left / right;
    case TokenType.EqualEqual:
      return left === right;
    case TokenType.BangEqual:
      return left !== right;
    case TokenType.Greater:
      return left > right;
    case TokenType.GreaterEqual:
      return left >= right;
    case TokenType.Less:
      return left < right;
    case TokenType.LessEqual:
      return left <= right;
    default:
      return undefined;
  }
}

export function evaluate(expr: Expression): Result<LoxValue, LoxError> {
  return new Interpreter().evaluate(expr);
}
