import {
  type Expression,
  binary,
  grouping,
  literal,
  unary,
} from "../ast/ast.js";
import { LoxError, attempt } from "../common/diagnostics.js";
import { type Result, err } from "../common/result.js";
import { type Token, TokenType } from "../lexer/token.js";
import { ParserState } from "./state.js";

/*
 * expression → equality
 * equality   → comparison ( ( "!=" | "==" ) comparison )*
 * comparison → term ( ( ">" | ">=" | "<" | "<=" ) term )*
 * term       → factor ( ( "-" | "+" ) factor )*
 * factor     → unary ( ( "/" | "*" ) unary )*
 * unary      → ( "!" | "-" ) unary | primary
 * primary    → NUMBER | STRING | "true" | "false" | "nil" | "(" expression ")"
 */
export class Parser {
  private readonly tokens: readonly Token[];

  constructor(tokens: readonly Token[]) {
    this.tokens = tokens;
  }

  /**
   * Parses exactly one expression spanning every token before EOF. There is
   * no recovery: the first error ends the parse. Synchronizing on statement
   * boundaries belongs with a statement grammar.
   */
  parse(): Result<Expression, LoxError> {
    const last = this.tokens[this.tokens.length - 1];
    if (last === undefined || last.type !== TokenType.EOF) {
      return err(
        LoxError.parse(
          { line: last?.line ?? 1, lexeme: last?.lexeme ?? "" },
          "Token stream must end with EOF."
        )
      );
    }

    const state = new ParserState(this.tokens);
    return attempt(() => {
      const expr = new ExpressionParser(state).expression();
      if (!state.isAtEnd()) {
        throw state.error(state.peek(), "Expected end of expression.");
      }
      return expr;
    });
  }
}

// Bounds the height of any tree, so parsing and evaluating it stay well
// within the call stack.
export const MAX_NESTING_DEPTH = 256;

class ExpressionParser {
  private depth = 0;

  constructor(private readonly state: ParserState) {}

  expression(): Expression {
    return this.equality();
  }

  private equality(): Expression {
    return this.leftAssociative(
      () => this.comparison(),
      TokenType.BangEqual,
      TokenType.EqualEqual
    );
  }

  private comparison(): Expression {
    return this.leftAssociative(
      () => this.term(),
      TokenType.Greater,
      TokenType.GreaterEqual,
      TokenType.Less,
      TokenType.LessEqual
    );
  }

  private term(): Expression {
    return this.leftAssociative(
      () => this.factor(),
      TokenType.Minus,
      TokenType.Plus
    );
  }

  private factor(): Expression {
    return this.leftAssociative(
      () => this.unary(),
      TokenType.Slash,
      TokenType.Star
    );
  }

  // Folds `operand (op operand)*` into a left-leaning chain of Binary nodes.
  private leftAssociative(
    operand: () => Expression,
    ...operators: TokenType[]
  ): Expression {
    const outer = this.depth;
    let expr = operand();

    // Each fold puts the chain so far one level deeper.
    while (this.state.match(...operators)) {
      const operator = this.state.previous();
      this.descend(operator);
      const right = operand();
      expr = binary(expr, operator, right);
    }

    this.depth = outer;
    return expr;
  }

  private unary(): Expression {
    if (this.state.match(TokenType.Bang, TokenType.Minus)) {
      const operator = this.state.previous();
      this.descend(operator);
      const right = this.unary();
      this.depth--;
      return unary(operator, right);
    }

    return this.primary();
  }

  private primary(): Expression {
    const token = this.state.peek();

    switch (token.type) {
      case TokenType.False:
        this.state.advance();
        return literal(token, false);
      case TokenType.True:
        this.state.advance();
        return literal(token, true);
      case TokenType.Nil:
        this.state.advance();
        return literal(token, null);
      case TokenType.Number:
      case TokenType.String:
        this.state.advance();
        return literal(token, this.literalValue(token));
      case TokenType.OpenParen: {
        this.state.advance();
        this.descend(token);
        const expr = this.expression();
        this.state.consume(TokenType.CloseParen, "Expected closing ')'.");
        this.depth--;
        return grouping(token, expr);
      }
      default:
        throw this.state.error(token, "Expected expression.");
    }
  }

  private descend(token: Token) {
    if (++this.depth > MAX_NESTING_DEPTH) {
      throw this.state.error(token, "Expression nests too deeply.");
    }
  }

  private literalValue(token: Token): string | number {
    if (token.literal === undefined) {
      throw this.state.error(token, "Literal token carries no value.");
    }
    return token.literal;
  }
}

export function parse(tokens: readonly Token[]): Result<Expression, LoxError> {
  return new Parser(tokens).parse();
}
