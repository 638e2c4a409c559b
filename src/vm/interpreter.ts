import {
  type BinaryExpr,
  type ClassStmt,
  type Expr,
  type ResolvableExpr,
  type Stmt,
  type SuperExpr,
} from "../lang/ast";
import { type Locals } from "../lang/resolver";
import { type Token, TokenType } from "../lang/token";
import { Env } from "./env";
import { RuntimeError } from "./errors";
import { defaultNatives } from "./natives";
import {
  type BlockRunner,
  bind,
  call,
  findMethod,
  getProperty,
  makeClass,
  makeClosure,
  setProperty,
} from "./objects";
import { type OutputSink, consoleOutput } from "./output";
import { ExecStatus, type ExecResult, NORMAL } from "./status";
import {
  type ClassValue,
  type Closure,
  type NativeFn,
  type Value,
  isCallable,
  isClass,
  isEqual,
  isInstance,
  isTruthy,
  stringify,
} from "./value";

export interface InterpreterOptions {
  output?: OutputSink;
  /** Extra natives defined in the global scope next to `clock`. */
  natives?: NativeFn[];
}

export class Interpreter implements BlockRunner {
  public readonly globals = new Env();
  private env: Env = this.globals;
  // Weak, so a unit's nodes go once nothing (such as a closure) holds them.
  private locals = new WeakMap<Expr, number>();
  private output: OutputSink;

  constructor(options: InterpreterOptions = {}) {
    this.output = options.output ?? consoleOutput;
    for (const fn of [...defaultNatives, ...(options.natives ?? [])]) {
      this.globals.define(fn.name, fn);
    }
  }

  /** Adds the distances of a freshly resolved unit. */
  resolve(locals: Locals): void {
    for (const [expr, distance] of locals) {
      this.locals.set(expr, distance);
    }
  }

  interpret(statements: Stmt[]): void {
    for (const stmt of statements) {
      this.execute(stmt);
    }
  }

  executeBlock(statements: Stmt[], env: Env): ExecResult {
    const previous = this.env;
    try {
      this.env = env;
      for (const stmt of statements) {
        const result = this.execute(stmt);
        if (result.status === ExecStatus.RETURNED) return result;
      }
    } finally {
      this.env = previous;
    }
    return NORMAL;
  }

  private execute(stmt: Stmt): ExecResult {
    switch (stmt.kind) {
      case "ExprStmt":
        this.evaluate(stmt.expr);
        return NORMAL;
      case "PrintStmt": {
        const value = this.evaluate(stmt.expr);
        this.output.write(stringify(value) + "\n");
        return NORMAL;
      }
      case "VarStmt": {
        const value = stmt.initializer ? this.evaluate(stmt.initializer) : null;
        this.env.define(stmt.name.lexeme, value);
        return NORMAL;
      }
      case "BlockStmt":
        return this.executeBlock(stmt.statements, new Env(this.env));
      case "IfStmt":
        if (isTruthy(this.evaluate(stmt.condition))) {
          return this.execute(stmt.thenBranch);
        }
        if (stmt.elseBranch) return this.execute(stmt.elseBranch);
        return NORMAL;
      case "WhileStmt":
        while (isTruthy(this.evaluate(stmt.condition))) {
          const result = this.execute(stmt.body);
          if (result.status === ExecStatus.RETURNED) return result;
        }
        return NORMAL;
      case "FunctionStmt":
        this.env.define(stmt.name.lexeme, makeClosure(stmt, this.env));
        return NORMAL;
      case "ReturnStmt": {
        const value = stmt.value ? this.evaluate(stmt.value) : null;
        return { status: ExecStatus.RETURNED, value };
      }
      case "ClassStmt":
        this.declareClass(stmt);
        return NORMAL;
    }
  }

  private declareClass(stmt: ClassStmt): void {
    let superclass: ClassValue | null = null;
    if (stmt.superclass) {
      const value = this.evaluate(stmt.superclass);
      if (!isClass(value)) {
        throw new RuntimeError(
          stmt.superclass.name,
          "Superclass must be a class.",
        );
      }
      superclass = value;
    }

    this.env.define(stmt.name.lexeme, null);

    // Methods of a subclass close over a scope holding `super`.
    let methodEnv = this.env;
    if (superclass) {
      methodEnv = new Env(this.env);
      methodEnv.define("super", superclass);
    }

    const methods = new Map<string, Closure>();
    for (const method of stmt.methods) {
      methods.set(
        method.name.lexeme,
        makeClosure(method, methodEnv, method.name.lexeme === "init"),
      );
    }

    this.env.define(
      stmt.name.lexeme,
      makeClass(stmt.name.lexeme, superclass, methods),
    );
  }

  private evaluate(expr: Expr): Value {
    switch (expr.kind) {
      case "LiteralExpr":
        return expr.value;
      case "GroupingExpr":
        return this.evaluate(expr.expr);
      case "UnaryExpr": {
        const right = this.evaluate(expr.right);
        if (expr.operator.type === TokenType.BANG) return !isTruthy(right);
        if (typeof right !== "number") {
          throw new RuntimeError(expr.operator, "Operand must be a number.");
        }
        return -right;
      }
      case "BinaryExpr":
        return this.binary(expr);
      case "LogicalExpr": {
        const left = this.evaluate(expr.left);
        if (expr.operator.type === TokenType.OR) {
          if (isTruthy(left)) return left;
        } else if (!isTruthy(left)) {
          return left;
        }
        return this.evaluate(expr.right);
      }
      case "VariableExpr":
        return this.lookUpVariable(expr.name, expr);
      case "AssignExpr": {
        const value = this.evaluate(expr.value);
        const distance = this.locals.get(expr);
        if (distance === undefined) {
          this.globals.assignGlobal(expr.name, value);
        } else {
          this.env.assignAt(distance, expr.name.lexeme, value);
        }
        return value;
      }
      case "CallExpr": {
        const callee = this.evaluate(expr.callee);
        const args = expr.args.map((arg) => this.evaluate(arg));
        if (!isCallable(callee)) {
          throw new RuntimeError(
            expr.paren,
            "Can only call functions and classes.",
          );
        }
        try {
          return call(this, callee, args, expr.paren);
        } catch (e) {
          if (e instanceof RangeError && e.message.includes("call stack")) {
            throw new RuntimeError(expr.paren, "Stack overflow.");
          }
          throw e;
        }
      }
      case "GetExpr": {
        const object = this.evaluate(expr.object);
        if (!isInstance(object)) {
          throw new RuntimeError(expr.name, "Only instances have properties.");
        }
        return getProperty(object, expr.name);
      }
      case "SetExpr": {
        const object = this.evaluate(expr.object);
        if (!isInstance(object)) {
          throw new RuntimeError(expr.name, "Only instances have fields.");
        }
        const value = this.evaluate(expr.value);
        setProperty(object, expr.name, value);
        return value;
      }
      case "ThisExpr":
        return this.lookUpVariable(expr.keyword, expr);
      case "SuperExpr":
        return this.superMethod(expr);
    }
  }

  private binary(expr: BinaryExpr): Value {
    const left = this.evaluate(expr.left);
    const right = this.evaluate(expr.right);
    const op = expr.operator;

    switch (op.type) {
      case TokenType.PLUS:
        if (typeof left === "number" && typeof right === "number") {
          return left + right;
        }
        if (typeof left === "string" && typeof right === "string") {
          return left + right;
        }
        throw new RuntimeError(
          op,
          "Operands must be two numbers or two strings.",
        );
      case TokenType.MINUS: {
        const [a, b] = this.numberOperands(op, left, right);
        return a - b;
      }
      case TokenType.STAR: {
        const [a, b] = this.numberOperands(op, left, right);
        return a * b;
      }
      case TokenType.SLASH: {
        const [a, b] = this.numberOperands(op, left, right);
        return a / b;
      }
      case TokenType.GREATER: {
        const [a, b] = this.numberOperands(op, left, right);
        return a > b;
      }
      case TokenType.GREATER_EQUAL: {
        const [a, b] = this.numberOperands(op, left, right);
        return a >= b;
      }
      case TokenType.LESS: {
        const [a, b] = this.numberOperands(op, left, right);
        return a < b;
      }
      case TokenType.LESS_EQUAL: {
        const [a, b] = this.numberOperands(op, left, right);
        return a <= b;
      }
      case TokenType.EQUAL_EQUAL:
        return isEqual(left, right);
      case TokenType.BANG_EQUAL:
        return !isEqual(left, right);
      default:
        throw new Error(`Unknown binary operator '${op.lexeme}'`);
    }
  }

  private numberOperands(
    op: Token,
    left: Value,
    right: Value,
  ): [number, number] {
    if (typeof left !== "number" || typeof right !== "number") {
      throw new RuntimeError(op, "Operands must be numbers.");
    }
    return [left, right];
  }

  // The `super` scope sits one hop outside the scope binding `this`.
  private superMethod(expr: SuperExpr): Value {
    const distance = this.locals.get(expr);
    if (distance === undefined) {
      throw new Error("Unresolved 'super' expression");
    }
    const superclass = this.env.getAt(distance, "super");
    const instance = this.env.getAt(distance - 1, "this");
    if (!isClass(superclass) || !isInstance(instance)) {
      throw new Error("Corrupt 'super' or 'this' binding");
    }

    const method = findMethod(superclass, expr.method.lexeme);
    if (!method) {
      throw new RuntimeError(
        expr.method,
        `Undefined property '${expr.method.lexeme}'.`,
      );
    }
    return bind(method, instance);
  }

  private lookUpVariable(name: Token, expr: ResolvableExpr): Value {
    const distance = this.locals.get(expr);
    if (distance === undefined) return this.globals.getGlobal(name);
    return this.env.getAt(distance, name.lexeme);
  }
}
