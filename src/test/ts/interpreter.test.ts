import { describe, it, expect } from "vitest";
import { andThen } from "../../main/ts/common/result.js";
import { Interpreter, evaluate } from "../../main/ts/interpreter/interpreter.js";
import type { LoxValue } from "../../main/ts/interpreter/values.js";
import { scan } from "../../main/ts/lexer/lexer.js";
import { parse } from "../../main/ts/parser/parser.js";
import { run } from "../../main/ts/lox.js";

function valueOf(source: string): LoxValue {
  const result = run(source);
  if (!result.ok) throw new Error(`unexpected error: ${result.error.message}`);
  return result.value;
}

function runtimeError(source: string) {
  const result = run(source);
  if (result.ok) throw new Error(`expected a runtime error for ${source}`);
  expect(result.error.kind).toBe("RuntimeError");
  return result.error;
}

describe("Interpreter", () => {
  it("should evaluate literals and groupings unchanged", () => {
    expect(valueOf("42")).toBe(42);
    expect(valueOf('"text"')).toBe("text");
    expect(valueOf("true")).toBe(true);
    expect(valueOf("nil")).toBeNull();
    expect(valueOf("((7))")).toBe(7);
  });

  it("should do arithmetic on numbers", () => {
    expect(valueOf("1 - 2 - 3")).toBe(-4);
    expect(valueOf("2 * (3 + 4)")).toBe(14);
    expect(valueOf("10 / 4")).toBe(2.5);
    expect(valueOf("-(1 + 1)")).toBe(-2);
  });

  it("should follow floating point division by zero", () => {
    expect(valueOf("1 / 0")).toBe(Infinity);
    expect(valueOf("-1 / 0")).toBe(-Infinity);
    expect(Number.isNaN(valueOf("0 / 0"))).toBe(true);
  });

  it("should compare numbers", () => {
    expect(valueOf("1 < 2")).toBe(true);
    expect(valueOf("2 <= 2")).toBe(true);
    expect(valueOf("3 > 4")).toBe(false);
    expect(valueOf("4 >= 5")).toBe(false);
    expect(valueOf("1 == 1")).toBe(true);
    expect(valueOf("1 != 1")).toBe(false);
  });

  it("should concatenate strings", () => {
    expect(valueOf('"a" + "b"')).toBe("ab");
  });

  it("should treat nil as equal to nil", () => {
    expect(valueOf("nil == nil")).toBe(true);
    expect(valueOf("nil != nil")).toBe(false);
  });

  it("should negate booleans", () => {
    expect(valueOf("!true")).toBe(false);
    expect(valueOf("!!false")).toBe(false);
    expect(valueOf("!(1 < 2)")).toBe(false);
  });

  it("should reject mixed operand types at the operator", () => {
    const error = runtimeError('1\n+ "a"');

    expect(error.detail).toBe("Incompatible types.");
    expect(error.lexeme).toBe("+");
    expect(error.line).toBe(2);
  });

  it("should reject operators undefined for a pairing", () => {
    expect(runtimeError('"a" - "b"').lexeme).toBe("-");
    expect(runtimeError('"a" == "a"').detail).toBe("Incompatible types.");
    expect(runtimeError("nil + nil").lexeme).toBe("+");
    expect(runtimeError("nil < nil").lexeme).toBe("<");
    expect(runtimeError("true == true").lexeme).toBe("==");
    expect(runtimeError("1 == nil").lexeme).toBe("==");
  });

  it("should reject unary operators on the wrong type", () => {
    const negate = runtimeError('-"x"');
    expect(negate.detail).toBe("Operand must be a number.");
    expect(negate.lexeme).toBe("-");

    expect(runtimeError("!1").detail).toBe("Operand must be a boolean.");
    expect(runtimeError("-nil").detail).toBe("Operand must be a number.");
  });

  it("should stop at the first failing operand", () => {
    const error = runtimeError('(1 + "a") * -"x"');

    expect(error.detail).toBe("Incompatible types.");
    expect(error.lexeme).toBe("+");
  });

  it("should give identical results for the same tree", () => {
    const tree = andThen(scan("(4 - 1) * 2 >= 6"), parse);
    if (!tree.ok) throw new Error("parse failed");
    const interpreter = new Interpreter();

    const first = interpreter.evaluate(tree.value);
    const second = interpreter.evaluate(tree.value);
    expect(first).toEqual({ ok: true, value: true });
    expect(second).toEqual(first);
    expect(evaluate(tree.value)).toEqual(first);
  });

  it("should surface scan and parse errors from the pipeline", () => {
    const scanned = run("1 @ 2");
    expect(scanned.ok).toBe(false);
    if (!scanned.ok) expect(scanned.error.detail).toBe("Unexpected character.");

    const parsed = run("(1");
    expect(parsed.ok).toBe(false);
    if (!parsed.ok) expect(parsed.error.kind).toBe("ParseError");
  });
});
