import { describe, it, expect } from "vitest";
import { Lexer } from "../src/lang/lexer";
import { TokenType } from "../src/lang/token";

describe("Lexer", () => {
  it("should tokenize operators and delimiters", () => {
    const source = "( ) { } , . - + ; / * ! != = == > >= < <=";
    const tokens = new Lexer(source).tokenize();

    const expectedTypes = [
      TokenType.LEFT_PAREN,
      TokenType.RIGHT_PAREN,
      TokenType.LEFT_BRACE,
      TokenType.RIGHT_BRACE,
      TokenType.COMMA,
      TokenType.DOT,
      TokenType.MINUS,
      TokenType.PLUS,
      TokenType.SEMICOLON,
      TokenType.SLASH,
      TokenType.STAR,
      TokenType.BANG,
      TokenType.BANG_EQUAL,
      TokenType.EQUAL,
      TokenType.EQUAL_EQUAL,
      TokenType.GREATER,
      TokenType.GREATER_EQUAL,
      TokenType.LESS,
      TokenType.LESS_EQUAL,
      TokenType.EOF,
    ];

    expect(tokens.map((t) => t.type)).toEqual(expectedTypes);
  });

  it("should tokenize literals", () => {
    const source = '123 3.14 "hello" "world\\n" true false nil';
    const tokens = new Lexer(source).tokenize();

    expect(tokens[0].type).toBe(TokenType.NUMBER);
    expect(tokens[0].literal).toBe(123);
    expect(tokens[1].type).toBe(TokenType.NUMBER);
    expect(tokens[1].literal).toBe(3.14);
    expect(tokens[2].type).toBe(TokenType.STRING);
    expect(tokens[2].literal).toBe("hello");
    expect(tokens[3].type).toBe(TokenType.STRING);
    expect(tokens[3].literal).toBe("world\n");
    expect(tokens[4].type).toBe(TokenType.TRUE);
    expect(tokens[5].type).toBe(TokenType.FALSE);
    expect(tokens[6].type).toBe(TokenType.NIL);
  });

  it("should tokenize keywords and identifiers", () => {
    const source =
      "and class else for fun if or print return super this var while myVar _x1";
    const tokens = new Lexer(source).tokenize();

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.AND,
      TokenType.CLASS,
      TokenType.ELSE,
      TokenType.FOR,
      TokenType.FUN,
      TokenType.IF,
      TokenType.OR,
      TokenType.PRINT,
      TokenType.RETURN,
      TokenType.SUPER,
      TokenType.THIS,
      TokenType.VAR,
      TokenType.WHILE,
      TokenType.IDENTIFIER,
      TokenType.IDENTIFIER,
      TokenType.EOF,
    ]);
    expect(tokens[13].lexeme).toBe("myVar");
  });

  it("should not treat Object.prototype names as keywords", () => {
    const tokens = new Lexer("constructor toString").tokenize();
    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.IDENTIFIER,
      TokenType.IDENTIFIER,
      TokenType.EOF,
    ]);
  });

  it("should skip comments and count lines", () => {
    const source = "var a; // ignored ( ) \nprint a;\n\n\"two\nlines\"";
    const tokens = new Lexer(source).tokenize();

    expect(tokens.map((t) => [t.type, t.line])).toEqual([
      [TokenType.VAR, 1],
      [TokenType.IDENTIFIER, 1],
      [TokenType.SEMICOLON, 1],
      [TokenType.PRINT, 2],
      [TokenType.IDENTIFIER, 2],
      [TokenType.SEMICOLON, 2],
      [TokenType.STRING, 5],
      [TokenType.EOF, 5],
    ]);
  });

  it("should report bad characters and keep scanning", () => {
    const lexer = new Lexer("1 @ 2");
    const tokens = lexer.tokenize();

    expect(tokens.map((t) => t.literal)).toEqual([1, 2, null]);
    expect(lexer.errors).toEqual([
      { line: 1, where: "", message: "Unexpected character '@'." },
    ]);
  });

  it("should report an unterminated string", () => {
    const lexer = new Lexer('print "oops\n');
    const tokens = lexer.tokenize();

    expect(tokens.map((t) => t.type)).toEqual([TokenType.PRINT, TokenType.EOF]);
    expect(lexer.errors).toEqual([
      { line: 2, where: "", message: "Unterminated string." },
    ]);
  });
});
