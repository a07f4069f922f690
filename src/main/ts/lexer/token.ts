export enum TokenType {
  // Single-character tokens
  OpenParen, // (
  CloseParen, // )
  OpenBrace, // {
  CloseBrace, // }
  Comma, // ,
  Dot, // .
  Minus, // -
  Plus, // +
  Semicolon, // ;
  Slash, // /
  Star, // *

  // One or two character tokens
  Bang, // !
  BangEqual, // !=
  Equal, // =
  EqualEqual, // ==
  Greater, // >
  GreaterEqual, // >=
  Less, // <
  LessEqual, // <=

  // Literals
  Identifier,
  String,
  Number,

  // Keywords
  And,
  Class,
  Else,
  False,
  Fun,
  For,
  If,
  Nil,
  Or,
  Print,
  Return,
  Super,
  This,
  True,
  Var,
  While,

  EOF,
}

export interface Token {
  readonly type: TokenType;
  readonly lexeme: string;
  readonly literal?: string | number;
  readonly line: number;
  readonly column: number;
  readonly offset: number;
  readonly length: number;
}
