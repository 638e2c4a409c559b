import { describe, it, expect } from "vitest";
import { type ClassStmt, type Stmt } from "../src/lang/ast";
import { type Token, TokenType } from "../src/lang/token";
import { Env } from "../src/vm/env";
import { RuntimeError } from "../src/vm/errors";
import {
  type BlockRunner,
  arity,
  bind,
  call,
  findMethod,
  getProperty,
  makeClass,
  makeClosure,
  setProperty,
} from "../src/vm/objects";
import { NORMAL } from "../src/vm/status";
import { type Closure, type Instance, isInstance } from "../src/vm/value";
import { parse } from "./helpers";

function ident(lexeme: string): Token {
  return { type: TokenType.IDENTIFIER, lexeme, literal: null, line: 1 };
}

// Methods with empty bodies; no statement is ever executed.
function methodsOf(source: string): Map<string, Closure> {
  const cls = parse(source).statements[0] as ClassStmt;
  const env = new Env();
  return new Map(
    cls.methods.map((m): [string, Closure] => [
      m.name.lexeme,
      makeClosure(m, env, m.name.lexeme === "init"),
    ]),
  );
}

const idle: BlockRunner = {
  executeBlock: (_statements: Stmt[], _env: Env) => NORMAL,
};

describe("Object model", () => {
  const base = makeClass("Base", null, methodsOf("class Base { a() {} b() {} }"));
  const derived = makeClass(
    "Derived",
    base,
    methodsOf("class Derived { b() {} init(x, y) {} }"),
  );

  it("should find methods along the superclass chain", () => {
    expect(findMethod(derived, "a")).toBe(base.methods.get("a"));
    expect(findMethod(derived, "b")).toBe(derived.methods.get("b"));
    expect(findMethod(base, "init")).toBeUndefined();
  });

  it("should bind this in a fresh child of the method closure", () => {
    const method = findMethod(derived, "b");
    if (!method) throw new Error("missing method");
    const instance: Instance = {
      tag: "Instance",
      klass: derived,
      fields: new Map(),
    };

    const bound = bind(method, instance);
    expect(bound.env.parent).toBe(method.env);
    expect(bound.env.getAt(0, "this")).toBe(instance);
    expect(bound.declaration).toBe(method.declaration);
    // The original closure is untouched.
    expect(() => method.env.getAt(0, "this")).toThrow();
  });

  it("should take a class's arity from its initializer", () => {
    expect(arity(base)).toBe(0);
    expect(arity(derived)).toBe(2);
  });

  it("should create an instance when a class is called", () => {
    const result = call(idle, derived, [1, 2], ident(")"));
    expect(isInstance(result)).toBe(true);
    if (isInstance(result)) expect(result.klass).toBe(derived);
  });

  it("should prefer fields over methods and write only fields", () => {
    const instance: Instance = {
      tag: "Instance",
      klass: base,
      fields: new Map(),
    };

    const method = getProperty(instance, ident("a"));
    expect(method).toMatchObject({ tag: "Closure" });

    setProperty(instance, ident("a"), 5);
    expect(getProperty(instance, ident("a"))).toBe(5);
    expect(base.methods.has("a")).toBe(true);

    expect(() => getProperty(instance, ident("zzz"))).toThrow(RuntimeError);
  });
});
