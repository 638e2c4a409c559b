import {
  type Diagnostic,
  type Reporter,
  formatDiagnostic,
} from "../lang/diagnostics";
import { Lexer } from "../lang/lexer";
import { Parser } from "../lang/parser";
import { Resolver } from "../lang/resolver";
import { RuntimeError, formatRuntimeError } from "../vm/errors";
import { Interpreter, type InterpreterOptions } from "../vm/interpreter";

export enum RunStatus {
  OK = "OK",
  STATIC_ERROR = "STATIC_ERROR",
  RUNTIME_ERROR = "RUNTIME_ERROR",
}

export interface SessionOptions extends InterpreterOptions {
  /** Receives lexer, parser and resolver diagnostics. */
  report?: Reporter;
  /** Receives the formatted text of a runtime error. */
  reportRuntime?: (error: RuntimeError) => void;
}

const defaultReporter: Reporter = (d) => {
  console.error(formatDiagnostic(d));
};

const defaultRuntimeReporter = (error: RuntimeError): void => {
  console.error(formatRuntimeError(error));
};

/**
 * Runs source units against one long-lived interpreter, so globals defined by
 * one unit are visible to the next (script file or REPL line alike).
 */
export class Session {
  public readonly interpreter: Interpreter;
  private report: Reporter;
  private reportRuntime: (error: RuntimeError) => void;

  constructor(options: SessionOptions = {}) {
    this.interpreter = new Interpreter(options);
    this.report = options.report ?? defaultReporter;
    this.reportRuntime = options.reportRuntime ?? defaultRuntimeReporter;
  }

  run(source: string): RunStatus {
    const lexer = new Lexer(source);
    const tokens = lexer.tokenize();
    const parser = new Parser(tokens);
    const program = parser.parse();

    // A unit with syntax errors is never resolved.
    if (this.reportAll([...lexer.errors, ...parser.errors])) {
      return RunStatus.STATIC_ERROR;
    }

    const { locals, diagnostics } = new Resolver().resolve(program);
    if (this.reportAll(diagnostics)) return RunStatus.STATIC_ERROR;

    this.interpreter.resolve(locals);
    try {
      this.interpreter.interpret(program.statements);
    } catch (e) {
      if (e instanceof RuntimeError) {
        this.reportRuntime(e);
        return RunStatus.RUNTIME_ERROR;
      }
      throw e;
    }
    return RunStatus.OK;
  }

  private reportAll(diagnostics: Diagnostic[]): boolean {
    for (const d of diagnostics) this.report(d);
    return diagnostics.length > 0;
  }
}
