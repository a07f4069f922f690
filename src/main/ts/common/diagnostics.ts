import { formatDiagnostic } from "./pretty_diagnostics.js";
import { type Result, err, ok } from "./result.js";

export type LoxErrorKind = "ParseError" | "RuntimeError";

/** Where a diagnostic points: the offending token, or the text the lexer was on. */
export interface ErrorSite {
  line: number;
  lexeme: string;
  column?: number;
}

const KIND_LABELS: Record<LoxErrorKind, string> = {
  ParseError: "Parse error",
  RuntimeError: "Runtime error",
};

export class LoxError extends Error {
  readonly kind: LoxErrorKind;
  readonly line: number;
  readonly lexeme: string;
  readonly column?: number;
  readonly detail: string;

  constructor(kind: LoxErrorKind, site: ErrorSite, detail: string) {
    super(`${KIND_LABELS[kind]}: line ${site.line}, "${site.lexeme}": ${detail}`);
    this.name = kind;
    this.kind = kind;
    this.line = site.line;
    this.lexeme = site.lexeme;
    this.column = site.column;
    this.detail = detail;
  }

  static parse(site: ErrorSite, detail: string): LoxError {
    return new LoxError("ParseError", site, detail);
  }

  static runtime(site: ErrorSite, detail: string): LoxError {
    return new LoxError("RuntimeError", site, detail);
  }
}

/**
 * Runs one pipeline stage. A thrown `LoxError` becomes an `Err`; anything
 * else is a bug and keeps propagating.
 */
export function attempt<T>(stage: () => T): Result<T, LoxError> {
  try {
    return ok(stage());
  } catch (e) {
    if (e instanceof LoxError) return err(e);
    throw e;
  }
}

export class DiagnosticReporter {
  private diagnostics: LoxError[] = [];

  constructor(private readonly sourceFile?: string) {}

  /** Records the error and prints it, with a code frame when `source` is given. */
  report(error: LoxError, source?: string) {
    this.diagnostics.push(error);
    console.error(
      formatDiagnostic(error, source, { filePath: this.sourceFile })
    );
  }

  hadError(): boolean {
    return this.diagnostics.some((d) => d.kind === "ParseError");
  }

  hadRuntimeError(): boolean {
    return this.diagnostics.some((d) => d.kind === "RuntimeError");
  }

  getDiagnostics(): readonly LoxError[] {
    return this.diagnostics;
  }

  /** Prompt mode forgets earlier lines' errors before evaluating the next. */
  reset() {
    this.diagnostics = [];
  }
}
