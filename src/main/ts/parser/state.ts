import { LoxError } from "../common/diagnostics.js";
import { type Token, TokenType } from "../lexer/token.js";

/** A forward-only cursor with one token of lookahead. */
export class ParserState {
  readonly tokens: readonly Token[];
  current = 0;

  constructor(tokens: readonly Token[]) {
    this.tokens = tokens;
  }

  match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(this.peek(), message);
  }

  check(type: TokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  peek(): Token {
    return this.tokens[this.current];
  }

  previous(): Token {
    return this.tokens[this.current - 1];
  }

  error(token: Token, message: string): LoxError {
    return LoxError.parse(
      { line: token.line, lexeme: token.lexeme, column: token.column },
      message
    );
  }
}
