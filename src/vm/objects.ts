import { type FunctionStmt, type Stmt } from "../lang/ast";
import { type Token } from "../lang/token";
import { Env } from "./env";
import { RuntimeError } from "./errors";
import { ExecStatus, type ExecResult } from "./status";
import {
  type Callable,
  type ClassValue,
  type Closure,
  type Instance,
  type Value,
} from "./value";

/** What a user function needs from the evaluator to run its body. */
export interface BlockRunner {
  executeBlock(statements: Stmt[], env: Env): ExecResult;
}

export function makeClosure(
  declaration: FunctionStmt,
  env: Env,
  isInitializer = false,
): Closure {
  return { tag: "Closure", declaration, env, isInitializer };
}

export function makeClass(
  name: string,
  superclass: ClassValue | null,
  methods: Map<string, Closure>,
): ClassValue {
  return { tag: "Class", name, superclass, methods };
}

export function findMethod(
  klass: ClassValue,
  name: string,
): Closure | undefined {
  for (let k: ClassValue | null = klass; k; k = k.superclass) {
    const method = k.methods.get(name);
    if (method) return method;
  }
  return undefined;
}

// this -> instance, in a fresh child of the method's closure.
export function bind(method: Closure, instance: Instance): Closure {
  const env = new Env(method.env);
  env.define("this", instance);
  return makeClosure(method.declaration, env, method.isInitializer);
}

export function getProperty(instance: Instance, name: Token): Value {
  if (instance.fields.has(name.lexeme)) {
    return instance.fields.get(name.lexeme) ?? null;
  }

  const method = findMethod(instance.klass, name.lexeme);
  if (method) return bind(method, instance);

  throw new RuntimeError(name, `Undefined property '${name.lexeme}'.`);
}

export function setProperty(instance: Instance, name: Token, value: Value) {
  instance.fields.set(name.lexeme, value);
}

export function arity(callee: Callable): number {
  switch (callee.tag) {
    case "Native":
      return callee.arity;
    case "Closure":
      return callee.declaration.params.length;
    case "Class": {
      const init = findMethod(callee, "init");
      return init ? init.declaration.params.length : 0;
    }
  }
}

export function call(
  runner: BlockRunner,
  callee: Callable,
  args: Value[],
  paren: Token,
): Value {
  const expected = arity(callee);
  if (args.length !== expected) {
    throw new RuntimeError(
      paren,
      `Expected ${String(expected)} arguments but got ${String(args.length)}.`,
    );
  }

  switch (callee.tag) {
    case "Native":
      return callee.fn(args);
    case "Closure":
      return callFunction(runner, callee, args);
    case "Class": {
      const instance: Instance = {
        tag: "Instance",
        klass: callee,
        fields: new Map(),
      };
      const init = findMethod(callee, "init");
      if (init) callFunction(runner, bind(init, instance), args);
      return instance;
    }
  }
}

function callFunction(
  runner: BlockRunner,
  fn: Closure,
  args: Value[],
): Value {
  const env = new Env(fn.env);
  fn.declaration.params.forEach((param, i) => {
    env.define(param.lexeme, args[i]);
  });

  const result = runner.executeBlock(fn.declaration.body, env);

  if (fn.isInitializer) return fn.env.getAt(0, "this");
  if (result.status === ExecStatus.RETURNED) return result.value;
  return null;
}
