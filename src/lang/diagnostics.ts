import { type Token, TokenType } from "./token";

/** A problem found before execution: by the lexer, the parser or the resolver. */
export interface Diagnostic {
  line: number;
  where: string;
  message: string;
}

export type Reporter = (diagnostic: Diagnostic) => void;

export function atToken(token: Token, message: string): Diagnostic {
  const where =
    token.type === TokenType.EOF ? " at end" : ` at '${token.lexeme}'`;
  return { line: token.line, where, message };
}

export function atLine(line: number, message: string): Diagnostic {
  return { line, where: "", message };
}

export function formatDiagnostic(d: Diagnostic): string {
  return `[line ${String(d.line)}] Error${d.where}: ${d.message}`;
}
