import { join } from "path";
import { describe, it, expect } from "vitest";
import {
  EX_DATAERR,
  EX_NOINPUT,
  EX_OK,
  EX_SOFTWARE,
  runFile,
} from "../src/cli/run";
import { formatDiagnostic } from "../src/lang/diagnostics";
import { Session } from "../src/host/session";
import { formatRuntimeError } from "../src/vm/errors";
import { BufferedOutput } from "../src/vm/output";

function fixture(name: string): string {
  return join(__dirname, "fixtures", name);
}

function runScript(path: string) {
  const out = new BufferedOutput();
  const errors: string[] = [];
  const session = new Session({
    output: out,
    report: (d) => errors.push(formatDiagnostic(d)),
    reportRuntime: (e) => errors.push(formatRuntimeError(e)),
  });
  const code = runFile(path, session, (message) => errors.push(message));
  return { code, output: out.lines(), errors };
}

describe("runFile", () => {
  it("should run a script and exit cleanly", () => {
    expect(runScript(fixture("hello.lox"))).toEqual({
      code: EX_OK,
      output: ["hello"],
      errors: [],
    });
  });

  it("should exit with a data error when the script does not resolve", () => {
    expect(runScript(fixture("static_error.lox"))).toEqual({
      code: EX_DATAERR,
      output: [],
      errors: ["[line 2] Error at 'return': Cannot return from top-level code."],
    });
  });

  it("should exit with a software error when the script fails at runtime", () => {
    expect(runScript(fixture("runtime_error.lox"))).toEqual({
      code: EX_SOFTWARE,
      output: ["before"],
      errors: ["Operands must be two numbers or two strings.\n[line 2]"],
    });
  });

  it("should report a missing script instead of throwing", () => {
    const path = fixture("missing.lox");
    expect(runScript(path)).toEqual({
      code: EX_NOINPUT,
      output: [],
      errors: [`Cannot open '${path}': no such file.`],
    });
  });
});
