import {
  type BlockStmt,
  type ClassStmt,
  type Expr,
  type FunctionStmt,
  type IfStmt,
  type PrintStmt,
  type Program,
  type ReturnStmt,
  type Stmt,
  type VarStmt,
  type VariableExpr,
  type WhileStmt,
} from "./ast";
import { type Diagnostic, atToken } from "./diagnostics";
import { type Token, TokenType } from "./token";

const MAX_ARGS = 255;

// Thrown to enter panic mode; caught at the next declaration boundary.
class ParseError extends Error {}

export class Parser {
  private current = 0;

  public readonly errors: Diagnostic[] = [];

  constructor(private tokens: Token[]) {}

  parse(): Program {
    const statements: Stmt[] = [];
    while (!this.isAtEnd()) {
      const stmt = this.declaration();
      if (stmt) statements.push(stmt);
    }
    return { statements };
  }

  private declaration(): Stmt | undefined {
    try {
      if (this.match(TokenType.CLASS)) return this.classDeclaration();
      if (this.match(TokenType.FUN)) return this.function("function");
      if (this.match(TokenType.VAR)) return this.varDeclaration();
      return this.statement();
    } catch (e) {
      if (!(e instanceof ParseError)) throw e;
      this.synchronize();
      return undefined;
    }
  }

  private classDeclaration(): ClassStmt {
    const name = this.consume(TokenType.IDENTIFIER, "Expect class name.");

    let superclass: VariableExpr | undefined = undefined;
    if (this.match(TokenType.LESS)) {
      this.consume(TokenType.IDENTIFIER, "Expect superclass name.");
      superclass = { kind: "VariableExpr", name: this.previous() };
    }

    this.consume(TokenType.LEFT_BRACE, "Expect '{' before class body.");

    const methods: FunctionStmt[] = [];
    while (!this.check(TokenType.RIGHT_BRACE) && !this.isAtEnd()) {
      methods.push(this.function("method"));
    }

    this.consume(TokenType.RIGHT_BRACE, "Expect '}' after class body.");
    return { kind: "ClassStmt", name, superclass, methods };
  }

  private function(kind: "function" | "method"): FunctionStmt {
    const name = this.consume(TokenType.IDENTIFIER, `Expect ${kind} name.`);
    this.consume(TokenType.LEFT_PAREN, `Expect '(' after ${kind} name.`);
    const params: Token[] = [];
    if (!this.check(TokenType.RIGHT_PAREN)) {
      do {
        if (params.length >= MAX_ARGS) {
          this.error(
            this.peek(),
            `Cannot have more than ${String(MAX_ARGS)} parameters.`,
          );
        }
        params.push(
          this.consume(TokenType.IDENTIFIER, "Expect parameter name."),
        );
      } while (this.match(TokenType.COMMA));
    }
    this.consume(TokenType.RIGHT_PAREN, "Expect ')' after parameters.");

    this.consume(TokenType.LEFT_BRACE, `Expect '{' before ${kind} body.`);
    const body = this.block();
    return { kind: "FunctionStmt", name, params, body };
  }

  private varDeclaration(): VarStmt {
    const name = this.consume(TokenType.IDENTIFIER, "Expect variable name.");
    let initializer: Expr | undefined = undefined;
    if (this.match(TokenType.EQUAL)) {
      initializer = this.expression();
    }
    this.consume(TokenType.SEMICOLON, "Expect ';' after variable declaration.");
    return { kind: "VarStmt", name, initializer };
  }

  private statement(): Stmt {
    if (this.match(TokenType.FOR)) return this.forStatement();
    if (this.match(TokenType.IF)) return this.ifStatement();
    if (this.match(TokenType.PRINT)) return this.printStatement();
    if (this.match(TokenType.RETURN)) return this.returnStatement();
    if (this.match(TokenType.WHILE)) return this.whileStatement();
    if (this.match(TokenType.LEFT_BRACE)) {
      return { kind: "BlockStmt", statements: this.block() };
    }
    return this.expressionStatement();
  }

  // for (init; cond; incr) body  =>  { init; while (cond) { body; incr; } }
  private forStatement(): Stmt {
    this.consume(TokenType.LEFT_PAREN, "Expect '(' after 'for'.");

    let initializer: Stmt | undefined;
    if (this.match(TokenType.SEMICOLON)) {
      initializer = undefined;
    } else if (this.match(TokenType.VAR)) {
      initializer = this.varDeclaration();
    } else {
      initializer = this.expressionStatement();
    }

    let condition: Expr | undefined = undefined;
    if (!this.check(TokenType.SEMICOLON)) {
      condition = this.expression();
    }
    this.consume(TokenType.SEMICOLON, "Expect ';' after loop condition.");

    let increment: Expr | undefined = undefined;
    if (!this.check(TokenType.RIGHT_PAREN)) {
      increment = this.expression();
    }
    this.consume(TokenType.RIGHT_PAREN, "Expect ')' after for clauses.");

    let body = this.statement();

    if (increment) {
      body = {
        kind: "BlockStmt",
        statements: [body, { kind: "ExprStmt", expr: increment }],
      };
    }

    const loop: WhileStmt = {
      kind: "WhileStmt",
      condition: condition ?? { kind: "LiteralExpr", value: true },
      body,
    };

    if (!initializer) return loop;
    const block: BlockStmt = {
      kind: "BlockStmt",
      statements: [initializer, loop],
    };
    return block;
  }

  private ifStatement(): IfStmt {
    this.consume(TokenType.LEFT_PAREN, "Expect '(' after 'if'.");
    const condition = this.expression();
    this.consume(TokenType.RIGHT_PAREN, "Expect ')' after if condition.");

    const thenBranch = this.statement();
    let elseBranch: Stmt | undefined = undefined;
    if (this.match(TokenType.ELSE)) {
      elseBranch = this.statement();
    }

    return { kind: "IfStmt", condition, thenBranch, elseBranch };
  }

  private printStatement(): PrintStmt {
    const expr = this.expression();
    this.consume(TokenType.SEMICOLON, "Expect ';' after value.");
    return { kind: "PrintStmt", expr };
  }

  private returnStatement(): ReturnStmt {
    const keyword = this.previous();
    let value: Expr | undefined = undefined;
    if (!this.check(TokenType.SEMICOLON)) {
      value = this.expression();
    }
    this.consume(TokenType.SEMICOLON, "Expect ';' after return value.");
    return { kind: "ReturnStmt", keyword, value };
  }

  private whileStatement(): WhileStmt {
    this.consume(TokenType.LEFT_PAREN, "Expect '(' after 'while'.");
    const condition = this.expression();
    this.consume(TokenType.RIGHT_PAREN, "Expect ')' after condition.");
    const body = this.statement();
    return { kind: "WhileStmt", condition, body };
  }

  private block(): Stmt[] {
    const statements: Stmt[] = [];

    while (!this.check(TokenType.RIGHT_BRACE) && !this.isAtEnd()) {
      const stmt = this.declaration();
      if (stmt) statements.push(stmt);
    }

    this.consume(TokenType.RIGHT_BRACE, "Expect '}' after block.");
    return statements;
  }

  private expressionStatement(): Stmt {
    const expr = this.expression();
    this.consume(TokenType.SEMICOLON, "Expect ';' after expression.");
    return { kind: "ExprStmt", expr };
  }

  private expression(): Expr {
    return this.assignment();
  }

  private assignment(): Expr {
    const expr = this.or();

    if (this.match(TokenType.EQUAL)) {
      const equals = this.previous();
      const value = this.assignment();

      if (expr.kind === "VariableExpr") {
        return { kind: "AssignExpr", name: expr.name, value };
      }
      if (expr.kind === "GetExpr") {
        return { kind: "SetExpr", object: expr.object, name: expr.name, value };
      }

      // Reported, but the parser is not confused, so no panic.
      this.error(equals, "Invalid assignment target.");
    }

    return expr;
  }

  private or(): Expr {
    let expr = this.and();

    while (this.match(TokenType.OR)) {
      const operator = this.previous();
      const right = this.and();
      expr = { kind: "LogicalExpr", left: expr, operator, right };
    }

    return expr;
  }

  private and(): Expr {
    let expr = this.equality();

    while (this.match(TokenType.AND)) {
      const operator = this.previous();
      const right = this.equality();
      expr = { kind: "LogicalExpr", left: expr, operator, right };
    }

    return expr;
  }

  private equality(): Expr {
    let expr = this.comparison();

    while (this.match(TokenType.BANG_EQUAL, TokenType.EQUAL_EQUAL)) {
      const operator = this.previous();
      const right = this.comparison();
      expr = { kind: "BinaryExpr", left: expr, operator, right };
    }

    return expr;
  }

  private comparison(): Expr {
    let expr = this.term();

    while (
      this.match(
        TokenType.GREATER,
        TokenType.GREATER_EQUAL,
        TokenType.LESS,
        TokenType.LESS_EQUAL,
      )
    ) {
      const operator = this.previous();
      const right = this.term();
      expr = { kind: "BinaryExpr", left: expr, operator, right };
    }

    return expr;
  }

  private term(): Expr {
    let expr = this.factor();

    while (this.match(TokenType.PLUS, TokenType.MINUS)) {
      const operator = this.previous();
      const right = this.factor();
      expr = { kind: "BinaryExpr", left: expr, operator, right };
    }

    return expr;
  }

  private factor(): Expr {
    let expr = this.unary();

    while (this.match(TokenType.STAR, TokenType.SLASH)) {
      const operator = this.previous();
      const right = this.unary();
      expr = { kind: "BinaryExpr", left: expr, operator, right };
    }

    return expr;
  }

  private unary(): Expr {
    if (this.match(TokenType.BANG, TokenType.MINUS)) {
      const operator = this.previous();
      const right = this.unary();
      return { kind: "UnaryExpr", operator, right };
    }
    return this.call();
  }

  private call(): Expr {
    let expr = this.primary();

    for (;;) {
      if (this.match(TokenType.LEFT_PAREN)) {
        expr = this.finishCall(expr);
      } else if (this.match(TokenType.DOT)) {
        const name = this.consume(
          TokenType.IDENTIFIER,
          "Expect property name after '.'.",
        );
        expr = { kind: "GetExpr", object: expr, name };
      } else {
        break;
      }
    }

    return expr;
  }

  private finishCall(callee: Expr): Expr {
    const args: Expr[] = [];
    if (!this.check(TokenType.RIGHT_PAREN)) {
      do {
        if (args.length >= MAX_ARGS) {
          this.error(
            this.peek(),
            `Cannot have more than ${String(MAX_ARGS)} arguments.`,
          );
        }
        args.push(this.expression());
      } while (this.match(TokenType.COMMA));
    }
    const paren = this.consume(
      TokenType.RIGHT_PAREN,
      "Expect ')' after arguments.",
    );
    return { kind: "CallExpr", callee, paren, args };
  }

  private primary(): Expr {
    if (this.match(TokenType.FALSE))
      return { kind: "LiteralExpr", value: false };
    if (this.match(TokenType.TRUE)) return { kind: "LiteralExpr", value: true };
    if (this.match(TokenType.NIL)) return { kind: "LiteralExpr", value: null };

    if (this.match(TokenType.NUMBER, TokenType.STRING)) {
      return { kind: "LiteralExpr", value: this.previous().literal };
    }

    if (this.match(TokenType.SUPER)) {
      const keyword = this.previous();
      this.consume(TokenType.DOT, "Expect '.' after 'super'.");
      const method = this.consume(
        TokenType.IDENTIFIER,
        "Expect superclass method name.",
      );
      return { kind: "SuperExpr", keyword, method };
    }

    if (this.match(TokenType.THIS)) {
      return { kind: "ThisExpr", keyword: this.previous() };
    }

    if (this.match(TokenType.IDENTIFIER)) {
      return { kind: "VariableExpr", name: this.previous() };
    }

    if (this.match(TokenType.LEFT_PAREN)) {
      const expr = this.expression();
      this.consume(TokenType.RIGHT_PAREN, "Expect ')' after expression.");
      return { kind: "GroupingExpr", expr };
    }

    throw this.error(this.peek(), "Expect expression.");
  }

  // Skip tokens until something that looks like the start of a statement.
  private synchronize(): void {
    this.advance();

    while (!this.isAtEnd()) {
      if (this.previous().type === TokenType.SEMICOLON) return;

      switch (this.peek().type) {
        case TokenType.CLASS:
        case TokenType.FUN:
        case TokenType.VAR:
        case TokenType.FOR:
        case TokenType.IF:
        case TokenType.WHILE:
        case TokenType.PRINT:
        case TokenType.RETURN:
          return;
        default:
          this.advance();
      }
    }
  }

  private match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(this.peek(), message);
  }

  private error(token: Token, message: string): ParseError {
    this.errors.push(atToken(token, message));
    return new ParseError(message);
  }

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }
}
