import { type Token } from "./token";

export type Stmt =
  | ExprStmt
  | PrintStmt
  | VarStmt
  | BlockStmt
  | IfStmt
  | WhileStmt
  | FunctionStmt
  | ReturnStmt
  | ClassStmt;

export interface ExprStmt {
  kind: "ExprStmt";
  expr: Expr;
}

export interface PrintStmt {
  kind: "PrintStmt";
  expr: Expr;
}

export interface VarStmt {
  kind: "VarStmt";
  name: Token;
  initializer?: Expr;
}

export interface BlockStmt {
  kind: "BlockStmt";
  statements: Stmt[];
}

export interface IfStmt {
  kind: "IfStmt";
  condition: Expr;
  thenBranch: Stmt;
  elseBranch?: Stmt;
}

export interface WhileStmt {
  kind: "WhileStmt";
  condition: Expr;
  body: Stmt;
}

export interface FunctionStmt {
  kind: "FunctionStmt";
  name: Token;
  params: Token[];
  body: Stmt[];
}

export interface ReturnStmt {
  kind: "ReturnStmt";
  keyword: Token;
  value?: Expr;
}

export interface ClassStmt {
  kind: "ClassStmt";
  name: Token;
  superclass?: VariableExpr;
  methods: FunctionStmt[];
}

export type Expr =
  | LiteralExpr
  | GroupingExpr
  | UnaryExpr
  | BinaryExpr
  | LogicalExpr
  | VariableExpr
  | AssignExpr
  | CallExpr
  | GetExpr
  | SetExpr
  | ThisExpr
  | SuperExpr;

export interface LiteralExpr {
  kind: "LiteralExpr";
  value: number | boolean | string | null;
}

export interface GroupingExpr {
  kind: "GroupingExpr";
  expr: Expr;
}

export interface UnaryExpr {
  kind: "UnaryExpr";
  operator: Token;
  right: Expr;
}

export interface BinaryExpr {
  kind: "BinaryExpr";
  left: Expr;
  operator: Token;
  right: Expr;
}

export interface LogicalExpr {
  kind: "LogicalExpr";
  left: Expr;
  operator: Token;
  right: Expr;
}

export interface VariableExpr {
  kind: "VariableExpr";
  name: Token;
}

export interface AssignExpr {
  kind: "AssignExpr";
  name: Token;
  value: Expr;
}

export interface CallExpr {
  kind: "CallExpr";
  callee: Expr;
  paren: Token;
  args: Expr[];
}

export interface GetExpr {
  kind: "GetExpr";
  object: Expr;
  name: Token;
}

export interface SetExpr {
  kind: "SetExpr";
  object: Expr;
  name: Token;
  value: Expr;
}

export interface ThisExpr {
  kind: "ThisExpr";
  keyword: Token;
}

export interface SuperExpr {
  kind: "SuperExpr";
  keyword: Token;
  method: Token;
}

/** Expressions that name a binding and so get a resolver distance. */
export type ResolvableExpr = VariableExpr | AssignExpr | ThisExpr | SuperExpr;

export interface Program {
  statements: Stmt[];
}
