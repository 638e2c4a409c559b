import { type FunctionStmt } from "../lang/ast";
import { type Env } from "./env";

export type Value = null | boolean | number | string | Callable | Instance;

export type Callable = NativeFn | Closure | ClassValue;

export interface NativeFn {
  tag: "Native";
  name: string;
  arity: number;
  fn: (args: Value[]) => Value;
}

/** A user function or method together with the environment it was declared in. */
export interface Closure {
  tag: "Closure";
  declaration: FunctionStmt;
  readonly env: Env;
  isInitializer: boolean;
}

export interface ClassValue {
  tag: "Class";
  name: string;
  readonly superclass: ClassValue | null;
  readonly methods: ReadonlyMap<string, Closure>;
}

export interface Instance {
  tag: "Instance";
  readonly klass: ClassValue;
  fields: Map<string, Value>;
}

export function isCallable(v: Value): v is Callable {
  return (
    typeof v === "object" &&
    v !== null &&
    (v.tag === "Native" || v.tag === "Closure" || v.tag === "Class")
  );
}

export function isInstance(v: Value): v is Instance {
  return typeof v === "object" && v !== null && v.tag === "Instance";
}

export function isClass(v: Value): v is ClassValue {
  return typeof v === "object" && v !== null && v.tag === "Class";
}

export function isTruthy(v: Value): boolean {
  if (v === null) return false;
  if (typeof v === "boolean") return v;
  return true;
}

// Primitives compare by value, objects by identity, mixed types never match.
export function isEqual(a: Value, b: Value): boolean {
  return a === b;
}

// Shortest round-trip digits, always written out in positional notation.
export function formatNumber(n: number): string {
  const text = String(n);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;
  const [, sign, head, tail = "", exp] = match;
  const digits = head + tail;
  const exponent = Number(exp);
  if (exponent >= 0) return sign + digits.padEnd(exponent + 1, "0");
  return sign + "0." + "0".repeat(-exponent - 1) + digits;
}

export function stringify(v: Value): string {
  if (v === null) return "nil";
  if (typeof v === "number") return formatNumber(v);
  if (typeof v === "boolean") return String(v);
  if (typeof v === "string") return v;
  switch (v.tag) {
    case "Native":
      return "<native fn>";
    case "Closure":
      return `<fn ${v.declaration.name.lexeme}>`;
    case "Class":
      return v.name;
    case "Instance":
      return `${v.klass.name} instance`;
  }
}
