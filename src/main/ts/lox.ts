import * as fs from "fs";
import * as path from "path";
import { printAst } from "./ast/printer.js";
import { DiagnosticReporter, type LoxError } from "./common/diagnostics.js";
import { type Result, andThen } from "./common/result.js";
import { Interpreter } from "./interpreter/interpreter.js";
import { type LoxValue, stringify } from "./interpreter/values.js";
import { Lexer } from "./lexer/lexer.js";
import { Parser } from "./parser/parser.js";

export const EXIT_OK = 0;
export const EXIT_USAGE = 64;
export const EXIT_DATA_ERROR = 65;
export const EXIT_NO_INPUT = 66;
export const EXIT_SOFTWARE = 70;

export interface LoxOptions {
  /** Name shown in diagnostics; file mode sets it to the script path. */
  sourceFile?: string;
  /** Print the canonical tree before each value. */
  printAst?: boolean;
  /** Receives each value and tree; defaults to `console.log`. */
  print?: (text: string) => void;
}

/** scan → parse → evaluate, stopping at the first diagnostic. */
export function run(source: string): Result<LoxValue, LoxError> {
  const tokens = new Lexer(source).scanTokens();
  const tree = andThen(tokens, (t) => new Parser(t).parse());
  return andThen(tree, (expr) => new Interpreter().evaluate(expr));
}

export class Lox {
  readonly reporter: DiagnosticReporter;
  private readonly interpreter = new Interpreter();
  private readonly print: (text: string) => void;
  printAst: boolean;

  constructor(options: LoxOptions = {}) {
    this.reporter = new DiagnosticReporter(options.sourceFile);
    this.printAst = options.printAst ?? false;
    this.print = options.print ?? ((text) => console.log(text));
  }

  /** Runs one source text, echoing the value or reporting the diagnostic. */
  runSource(source: string): Result<LoxValue, LoxError> {
    const tree = andThen(new Lexer(source).scanTokens(), (tokens) =>
      new Parser(tokens).parse()
    );
    const result = andThen(tree, (expr) => {
      if (this.printAst) this.print(printAst(expr));
      return this.interpreter.evaluate(expr);
    });

    if (result.ok) {
      this.print(stringify(result.value));
    } else {
      this.reporter.report(result.error, source);
    }
    return result;
  }

  exitCode(): number {
    if (this.reporter.hadError()) return EXIT_DATA_ERROR;
    if (this.reporter.hadRuntimeError()) return EXIT_SOFTWARE;
    return EXIT_OK;
  }
}

export function runFile(filePath: string, options: LoxOptions = {}): number {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    console.error(`Error: File not found: ${absolutePath}`);
    return EXIT_NO_INPUT;
  }

  if (!fs.statSync(absolutePath).isFile()) {
    console.error(`Error: Not a file: ${absolutePath}`);
    return EXIT_NO_INPUT;
  }

  const source = fs.readFileSync(absolutePath, "utf8");
  const lox = new Lox({ ...options, sourceFile: options.sourceFile ?? filePath });
  lox.runSource(source);
  return lox.exitCode();
}
