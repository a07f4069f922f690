import { describe, it, expect, vi, afterEach } from "vitest";
import {
  DiagnosticReporter,
  LoxError,
  attempt,
} from "../../main/ts/common/diagnostics.js";
import { formatDiagnostic } from "../../main/ts/common/pretty_diagnostics.js";
import { run } from "../../main/ts/lox.js";

function errorOf(source: string): LoxError {
  const result = run(source);
  if (result.ok) throw new Error(`expected an error for ${source}`);
  return result.error;
}

describe("LoxError", () => {
  it("should carry line, lexeme and message", () => {
    const error = LoxError.parse({ line: 3, lexeme: "+" }, "Boom.");

    expect(error).toBeInstanceOf(Error);
    expect(error.kind).toBe("ParseError");
    expect(error.name).toBe("ParseError");
    expect(error.message).toBe('Parse error: line 3, "+": Boom.');
    expect(error.column).toBeUndefined();
  });

  it("should label runtime errors", () => {
    const error = LoxError.runtime({ line: 1, lexeme: "-", column: 2 }, "Bad.");

    expect(error.message).toBe('Runtime error: line 1, "-": Bad.');
    expect(error.column).toBe(2);
  });
});

describe("attempt", () => {
  it("should turn a thrown LoxError into an Err", () => {
    const error = LoxError.runtime({ line: 1, lexeme: "x" }, "Nope.");
    const result = attempt(() => {
      throw error;
    });

    expect(result).toEqual({ ok: false, error });
  });

  it("should let other exceptions through", () => {
    expect(() =>
      attempt(() => {
        throw new TypeError("bug");
      })
    ).toThrow(TypeError);
  });
});

describe("DiagnosticReporter", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should record and print reported errors", () => {
    const printed = vi.spyOn(console, "error").mockImplementation(() => {});
    const reporter = new DiagnosticReporter("calc.lox");

    reporter.report(errorOf("(1"));

    expect(printed).toHaveBeenCalledWith(
      "calc.lox:1:3 parse error: Expected closing ')'."
    );
    expect(reporter.hadError()).toBe(true);
    expect(reporter.hadRuntimeError()).toBe(false);
    expect(reporter.getDiagnostics()).toHaveLength(1);

    reporter.reset();
    expect(reporter.hadError()).toBe(false);
    expect(reporter.getDiagnostics()).toHaveLength(0);
  });

  it("should distinguish runtime errors", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const reporter = new DiagnosticReporter();

    reporter.report(errorOf("-true"));

    expect(reporter.hadError()).toBe(false);
    expect(reporter.hadRuntimeError()).toBe(true);
  });
});

describe("formatDiagnostic", () => {
  it("should print a code frame with a caret under the operator", () => {
    const source = '1 + "a"';
    const out = formatDiagnostic(errorOf(source), source, {
      filePath: "/virtual/a.lox",
    });

    expect(out).toBe(
      [
        "/virtual/a.lox:1:3 runtime error: Incompatible types.",
        '1 | 1 + "a"',
        "  |   ^",
      ].join("\n")
    );
  });

  it("should print only the header without source", () => {
    expect(formatDiagnostic(errorOf('1 + "a"'))).toBe(
      "line 1:3 runtime error: Incompatible types."
    );
  });

  it("should include surrounding lines on request", () => {
    const source = "1 +\n@";
    const out = formatDiagnostic(errorOf(source), source, { contextLines: 1 });

    expect(out).toBe(
      [
        "line 2:1 parse error: Unexpected character.",
        "1 | 1 +",
        "2 | @",
        "  | ^",
      ].join("\n")
    );
  });
});
