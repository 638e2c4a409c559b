import {
  type ClassStmt,
  type Expr,
  type FunctionStmt,
  type Program,
  type ResolvableExpr,
  type Stmt,
} from "./ast";
import { type Diagnostic, atToken } from "./diagnostics";
import { type Token } from "./token";

/**
 * Scope distances for every local reference, keyed by node identity.
 * References with no entry are globals and are looked up by name.
 */
export type Locals = Map<Expr, number>;

export interface ResolveResult {
  locals: Locals;
  diagnostics: Diagnostic[];
}

enum FunctionType {
  NONE,
  FUNCTION,
  INITIALIZER,
  METHOD,
}

enum ClassType {
  NONE,
  CLASS,
  SUBCLASS,
}

// name -> true once the declaration has finished (its initializer resolved)
type Scope = Map<string, boolean>;

export class Resolver {
  private scopes: Scope[] = [];
  private locals: Locals = new Map();
  private diagnostics: Diagnostic[] = [];

  private currentFunction = FunctionType.NONE;
  private currentClass = ClassType.NONE;

  resolve(program: Program): ResolveResult {
    this.resolveStmts(program.statements);
    return { locals: this.locals, diagnostics: this.diagnostics };
  }

  private resolveStmts(statements: Stmt[]): void {
    for (const stmt of statements) this.resolveStmt(stmt);
  }

  private resolveStmt(stmt: Stmt): void {
    switch (stmt.kind) {
      case "BlockStmt":
        this.beginScope();
        this.resolveStmts(stmt.statements);
        this.endScope();
        break;
      case "VarStmt":
        this.declare(stmt.name);
        if (stmt.initializer) this.resolveExpr(stmt.initializer);
        this.define(stmt.name);
        break;
      case "FunctionStmt":
        // Defined before the body so the function can refer to itself.
        this.declare(stmt.name);
        this.define(stmt.name);
        this.resolveFunction(stmt, FunctionType.FUNCTION);
        break;
      case "ClassStmt":
        this.resolveClass(stmt);
        break;
      case "ExprStmt":
      case "PrintStmt":
        this.resolveExpr(stmt.expr);
        break;
      case "IfStmt":
        this.resolveExpr(stmt.condition);
        this.resolveStmt(stmt.thenBranch);
        if (stmt.elseBranch) this.resolveStmt(stmt.elseBranch);
        break;
      case "WhileStmt":
        this.resolveExpr(stmt.condition);
        this.resolveStmt(stmt.body);
        break;
      case "ReturnStmt":
        if (this.currentFunction === FunctionType.NONE) {
          this.error(stmt.keyword, "Cannot return from top-level code.");
        }
        if (stmt.value) {
          if (this.currentFunction === FunctionType.INITIALIZER) {
            this.error(
              stmt.keyword,
              "Cannot return a value from an initializer.",
            );
          }
          this.resolveExpr(stmt.value);
        }
        break;
    }
  }

  private resolveClass(stmt: ClassStmt): void {
    const enclosingClass = this.currentClass;
    this.currentClass = ClassType.CLASS;

    this.declare(stmt.name);
    this.define(stmt.name);

    if (stmt.superclass) {
      if (stmt.superclass.name.lexeme === stmt.name.lexeme) {
        this.error(stmt.superclass.name, "A class cannot inherit from itself.");
      }
      this.currentClass = ClassType.SUBCLASS;
      this.resolveExpr(stmt.superclass);

      this.beginScope();
      this.currentScope().set("super", true);
    }

    this.beginScope();
    this.currentScope().set("this", true);

    for (const method of stmt.methods) {
      const type =
        method.name.lexeme === "init"
          ? FunctionType.INITIALIZER
          : FunctionType.METHOD;
      this.resolveFunction(method, type);
    }

    this.endScope();
    if (stmt.superclass) this.endScope();

    this.currentClass = enclosingClass;
  }

  private resolveExpr(expr: Expr): void {
    switch (expr.kind) {
      case "LiteralExpr":
        break;
      case "VariableExpr": {
        const scope = this.scopes.at(-1);
        if (scope?.get(expr.name.lexeme) === false) {
          this.error(
            expr.name,
            "Cannot read local variable in its own initializer.",
          );
        }
        this.resolveLocal(expr, expr.name);
        break;
      }
      case "AssignExpr":
        this.resolveExpr(expr.value);
        this.resolveLocal(expr, expr.name);
        break;
      case "GroupingExpr":
        this.resolveExpr(expr.expr);
        break;
      case "UnaryExpr":
        this.resolveExpr(expr.right);
        break;
      case "BinaryExpr":
      case "LogicalExpr":
        this.resolveExpr(expr.left);
        this.resolveExpr(expr.right);
        break;
      case "CallExpr":
        this.resolveExpr(expr.callee);
        for (const arg of expr.args) {
          this.resolveExpr(arg);
        }
        break;
      // Property names are looked up dynamically; only the object resolves.
      case "GetExpr":
        this.resolveExpr(expr.object);
        break;
      case "SetExpr":
        this.resolveExpr(expr.value);
        this.resolveExpr(expr.object);
        break;
      case "ThisExpr":
        if (this.currentClass === ClassType.NONE) {
          this.error(expr.keyword, "Cannot use 'this' outside of a class.");
          break;
        }
        this.resolveLocal(expr, expr.keyword);
        break;
      case "SuperExpr":
        if (this.currentClass === ClassType.NONE) {
          this.error(expr.keyword, "Cannot use 'super' outside of a class.");
          break;
        }
        if (this.currentClass !== ClassType.SUBCLASS) {
          this.error(
            expr.keyword,
            "Cannot use 'super' in a class with no superclass",
          );
          break;
        }
        this.resolveLocal(expr, expr.keyword);
        break;
    }
  }

  private resolveLocal(expr: ResolvableExpr, name: Token): void {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      if (this.scopes[i].has(name.lexeme)) {
        this.locals.set(expr, this.scopes.length - 1 - i);
        return;
      }
    }
    // Not found: global.
  }

  private resolveFunction(fn: FunctionStmt, type: FunctionType): void {
    const enclosingFunction = this.currentFunction;
    this.currentFunction = type;

    this.beginScope();
    for (const param of fn.params) {
      this.declare(param);
      this.define(param);
    }
    this.resolveStmts(fn.body);
    this.endScope();

    this.currentFunction = enclosingFunction;
  }

  private beginScope(): void {
    this.scopes.push(new Map());
  }

  private endScope(): void {
    this.scopes.pop();
  }

  private currentScope(): Scope {
    const scope = this.scopes.at(-1);
    if (!scope) throw new Error("Resolver scope stack is empty");
    return scope;
  }

  private declare(name: Token): void {
    const scope = this.scopes.at(-1);
    if (!scope) return;
    if (scope.has(name.lexeme)) {
      this.error(name, "Variable with this name already declared in this scope.");
    }
    scope.set(name.lexeme, false);
  }

  private define(name: Token): void {
    this.scopes.at(-1)?.set(name.lexeme, true);
  }

  private error(token: Token, message: string): void {
    this.diagnostics.push(atToken(token, message));
  }
}
