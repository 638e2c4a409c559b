import { type Token } from "../lang/token";
import { RuntimeError } from "./errors";
import { type Value } from "./value";

export class Env {
  private values = new Map<string, Value>();

  constructor(public readonly parent?: Env) {}

  define(name: string, value: Value): void {
    this.values.set(name, value);
  }

  getAt(distance: number, name: string): Value {
    return this.bindingAt(distance, name).values.get(name) ?? null;
  }

  assignAt(distance: number, name: string, value: Value): void {
    this.bindingAt(distance, name).values.set(name, value);
  }

  getGlobal(name: Token): Value {
    const root = this.root();
    if (!root.values.has(name.lexeme)) {
      throw new RuntimeError(name, `Undefined variable '${name.lexeme}'.`);
    }
    return root.values.get(name.lexeme) ?? null;
  }

  assignGlobal(name: Token, value: Value): void {
    const root = this.root();
    if (!root.values.has(name.lexeme)) {
      throw new RuntimeError(name, `Undefined variable '${name.lexeme}'.`);
    }
    root.values.set(name.lexeme, value);
  }

  private bindingAt(distance: number, name: string): Env {
    const scope = this.ancestor(distance);
    if (!scope.values.has(name)) {
      throw new Error(
        `Unbound '${name}' at resolved distance ${String(distance)}`,
      );
    }
    return scope;
  }

  private ancestor(distance: number): Env {
    let env: Env | undefined = this;
    for (let i = 0; i < distance; i++) {
      env = env?.parent;
    }
    if (!env) throw new Error("Environment depth out of bounds");
    return env;
  }

  private root(): Env {
    let env: Env = this;
    while (env.parent) env = env.parent;
    return env;
  }
}
