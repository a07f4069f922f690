export { TokenType } from "./lexer/token.js";
export type { Token } from "./lexer/token.js";
export { Lexer, scan } from "./lexer/lexer.js";
export type {
  Expression,
  LiteralExpr,
  UnaryExpr,
  BinaryExpr,
  GroupingExpr,
} from "./ast/ast.js";
export { printAst } from "./ast/printer.js";
export { Parser, parse } from "./parser/parser.js";
export { Interpreter, evaluate } from "./interpreter/interpreter.js";
export type { LoxValue, LoxType } from "./interpreter/values.js";
export { typeOf, stringify } from "./interpreter/values.js";
export { LoxError, DiagnosticReporter } from "./common/diagnostics.js";
export type { LoxErrorKind, ErrorSite } from "./common/diagnostics.js";
export { formatDiagnostic } from "./common/pretty_diagnostics.js";
export * from "./common/result.js";
export { Lox, run, runFile } from "./lox.js";
export type { LoxOptions } from "./lox.js";
export { runPrompt } from "./repl.js";
