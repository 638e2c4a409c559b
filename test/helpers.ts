import { type Diagnostic, formatDiagnostic } from "../src/lang/diagnostics";
import { Lexer } from "../src/lang/lexer";
import { Parser } from "../src/lang/parser";
import { type Program } from "../src/lang/ast";
import { RunStatus, Session } from "../src/host/session";
import { formatRuntimeError } from "../src/vm/errors";
import { BufferedOutput } from "../src/vm/output";

export interface RunOutcome {
  status: RunStatus;
  output: string[];
  errors: string[];
}

export function parse(source: string): Program {
  const parser = new Parser(new Lexer(source).tokenize());
  const program = parser.parse();
  if (parser.errors.length > 0) {
    throw new Error(parser.errors.map(formatDiagnostic).join("\n"));
  }
  return program;
}

export function createHarness() {
  const out = new BufferedOutput();
  const errors: string[] = [];
  const session = new Session({
    output: out,
    report: (d: Diagnostic) => errors.push(formatDiagnostic(d)),
    reportRuntime: (e) => errors.push(formatRuntimeError(e)),
  });

  return {
    session,
    run(source: string): RunOutcome {
      out.clear();
      errors.length = 0;
      const status = session.run(source);
      return { status, output: out.lines(), errors: [...errors] };
    },
  };
}

export function run(source: string): RunOutcome {
  return createHarness().run(source);
}
