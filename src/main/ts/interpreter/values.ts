/** Runtime values: Number, String, Boolean and Nil (`null`). */
export type LoxValue = number | string | boolean | null;

export type LoxType = "Number" | "String" | "Boolean" | "Nil";

export function typeOf(value: LoxValue): LoxType {
  if (value === null) return "Nil";
  if (typeof value === "number") return "Number";
  if (typeof value === "string") return "String";
  return "Boolean";
}

/** User-facing rendering, as the prompt echoes a value. */
export function stringify(value: LoxValue): string {
  if (value === null) return "nil";
  // String(-0) would drop the sign.
  if (typeof value === "number" && Object.is(value, -0)) return "-0";
  return String(value);
}
