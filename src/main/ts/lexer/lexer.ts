import { type Token, TokenType } from "./token.js";
import { LoxError, attempt } from "../common/diagnostics.js";
import type { Result } from "../common/result.js";

export class Lexer {
  private readonly source: string;
  private tokens: Token[] = [];
  private start = 0;
  private current = 0;
  private line = 1;
  private column = 1;
  private startColumn = 1;

  private static keywords = new Map<string, TokenType>([
    ["and", TokenType.And],
    ["class", TokenType.Class],
    ["else", TokenType.Else],
    ["false", TokenType.False],
    ["fun", TokenType.Fun],
    ["for", TokenType.For],
    ["if", TokenType.If],
    ["nil", TokenType.Nil],
    ["or", TokenType.Or],
    ["print", TokenType.Print],
    ["return", TokenType.Return],
    ["super", TokenType.Super],
    ["this", TokenType.This],
    ["true", TokenType.True],
    ["var", TokenType.Var],
    ["while", TokenType.While],
  ]);

  constructor(source: string) {
    this.source = source;
  }

  /** Scans the whole source; the first unscannable input aborts the scan. */
  scanTokens(): Result<Token[], LoxError> {
    return attempt(() => this.scanAll());
  }

  private scanAll(): Token[] {
    this.tokens = [];
    this.start = 0;
    this.current = 0;
    this.line = 1;
    this.column = 1;

    while (!this.isAtEnd()) {
      this.start = this.current;
      this.startColumn = this.column;
      this.scanToken();
    }

    this.tokens.push({
      type: TokenType.EOF,
      lexeme: "",
      line: this.line,
      column: this.column,
      offset: this.current,
      length: 0,
    });
    return this.tokens;
  }

  private scanToken() {
    const c = this.advance();
    switch (c) {
      case "(":
        this.addToken(TokenType.OpenParen);
        break;
      case ")":
        this.addToken(TokenType.CloseParen);
        break;
      case "{":
        this.addToken(TokenType.OpenBrace);
        break;
      case "}":
        this.addToken(TokenType.CloseBrace);
        break;
      case ",":
        this.addToken(TokenType.Comma);
        break;
      case ".":
        this.addToken(TokenType.Dot);
        break;
      case "-":
        this.addToken(TokenType.Minus);
        break;
      case "+":
        this.addToken(TokenType.Plus);
        break;
      case ";":
        this.addToken(TokenType.Semicolon);
        break;
      case "*":
        this.addToken(TokenType.Star);
        break;
      case "/":
        if (this.match("/")) {
          while (this.peek() !== "\n" && !this.isAtEnd()) this.advance();
        } else {
          this.addToken(TokenType.Slash);
        }
        break;
      case "!":
        this.addToken(this.match("=") ? TokenType.BangEqual : TokenType.Bang);
        break;
      case "=":
        this.addToken(this.match("=") ? TokenType.EqualEqual : TokenType.Equal);
        break;
      case "<":
        this.addToken(this.match("=") ? TokenType.LessEqual : TokenType.Less);
        break;
      case ">":
        this.addToken(
          this.match("=") ? TokenType.GreaterEqual : TokenType.Greater
        );
        break;
      case " ":
      case "\r":
      case "\t":
        break;
      case "\n":
        this.newline();
        break;
      case '"':
        this.string();
        break;
      default:
        if (this.isDigit(c)) {
          this.number();
        } else if (this.isAlpha(c)) {
          this.identifier();
        } else {
          throw this.error("Unexpected character.");
        }
        break;
    }
  }

  private identifier() {
    while (this.isAlphaNumeric(this.peek())) this.advance();

    const text = this.source.substring(this.start, this.current);
    const type = Lexer.keywords.get(text) ?? TokenType.Identifier;
    this.addToken(type);
  }

  private number() {
    while (this.isDigit(this.peek())) this.advance();

    // A '.' commits to a fractional part.
    if (this.peek() === ".") {
      this.advance();
      if (!this.isDigit(this.peek())) throw this.error("Invalid number.");

      while (this.isDigit(this.peek())) this.advance();
    }

    const text = this.source.substring(this.start, this.current);
    const value = Number.parseFloat(text);
    if (!Number.isFinite(value)) throw this.error("Invalid number.");

    this.addToken(TokenType.Number, value);
  }

  private string() {
    const startLine = this.line;
    while (this.peek() !== '"' && !this.isAtEnd()) {
      if (this.advance() === "\n") this.newline();
    }

    if (this.isAtEnd()) throw this.error("Unterminated string.", startLine);

    // The closing ".
    this.advance();

    // Trim the surrounding quotes.
    const value = this.source.substring(this.start + 1, this.current - 1);
    this.addToken(TokenType.String, value, startLine);
  }

  private match(expected: string): boolean {
    if (this.isAtEnd()) return false;
    if (this.source.charAt(this.current) !== expected) return false;

    this.current++;
    this.column++;
    return true;
  }

  private peek(): string {
    if (this.isAtEnd()) return "\0";
    return this.source.charAt(this.current);
  }

  private isAlpha(c: string): boolean {
    return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
  }

  private isAlphaNumeric(c: string): boolean {
    return this.isAlpha(c) || this.isDigit(c);
  }

  private isDigit(c: string): boolean {
    return c >= "0" && c <= "9";
  }

  private isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  // One code point per column, so astral characters are never split.
  private advance(): string {
    const c = String.fromCodePoint(this.source.codePointAt(this.current) ?? 0);
    this.current += c.length;
    this.column++;
    return c;
  }

  private newline() {
    this.line++;
    this.column = 1;
  }

  private addToken(
    type: TokenType,
    literal?: string | number,
    line = this.line
  ) {
    const text = this.source.substring(this.start, this.current);
    this.tokens.push({
      type,
      lexeme: text,
      literal,
      line,
      column: this.startColumn,
      offset: this.start,
      length: this.current - this.start,
    });
  }

  private error(message: string, line = this.line): LoxError {
    return LoxError.parse(
      {
        line,
        lexeme: this.source.substring(this.start, this.current),
        column: this.startColumn,
      },
      message
    );
  }
}

export function scan(source: string): Result<Token[], LoxError> {
  return new Lexer(source).scanTokens();
}
