import { describe, it, expect } from "vitest";
import { RunStatus, Session } from "../src/host/session";
import { native } from "../src/vm/natives";
import { BufferedOutput } from "../src/vm/output";
import { createHarness, run } from "./helpers";

describe("Session", () => {
  it("should not run any statement of a unit with a resolution error", () => {
    const result = run(`
      print "before";
      class A { f() { super.f(); } }
    `);

    expect(result.status).toBe(RunStatus.STATIC_ERROR);
    expect(result.output).toEqual([]);
    expect(result.errors).toEqual([
      "[line 3] Error at 'super': Cannot use 'super' in a class with no superclass",
    ]);
  });

  it("should stop before resolving when there are syntax errors", () => {
    const result = run("print 1;\nreturn 2;\nvar = 3;\nprint @;");

    expect(result.status).toBe(RunStatus.STATIC_ERROR);
    expect(result.output).toEqual([]);
    // The misplaced return is a resolver error and is never reached.
    expect(result.errors).toEqual([
      "[line 4] Error: Unexpected character '@'.",
      "[line 3] Error at '=': Expect variable name.",
      "[line 4] Error at ';': Expect expression.",
    ]);
  });

  it("should keep earlier output when a runtime error halts the unit", () => {
    const result = run('print "one";\nprint 1 + nil;\nprint "three";');

    expect(result.status).toBe(RunStatus.RUNTIME_ERROR);
    expect(result.output).toEqual(["one"]);
    expect(result.errors).toEqual([
      "Operands must be two numbers or two strings.\n[line 2]",
    ]);
  });

  it("should restore the global scope after an error inside a call", () => {
    const harness = createHarness();
    harness.run(`
      var x = "global";
      fun boom() { var x = "local"; { nil(); } }
    `);

    expect(harness.run("boom();").status).toBe(RunStatus.RUNTIME_ERROR);
    // Only lands in the globals if the call's scopes were unwound.
    expect(harness.run('var y = "after"; print y; print x;').output).toEqual([
      "after",
      "global",
    ]);
  });

  it("should carry globals from one unit to the next", () => {
    const harness = createHarness();

    expect(harness.run("fun later() { return helper(); }").status).toBe(
      RunStatus.OK,
    );
    expect(harness.run("print later();").errors).toEqual([
      "Undefined variable 'helper'.\n[line 1]",
    ]);
    harness.run('fun helper() { return "defined later"; }');
    expect(harness.run("print later();").output).toEqual(["defined later"]);
  });

  it("should keep closures from earlier units working", () => {
    const harness = createHarness();
    harness.run(`
      fun makeCounter() { var n = 0; fun next() { n = n + 1; return n; } return next; }
      var c = makeCounter();
    `);

    expect(harness.run("print c();").output).toEqual(["1"]);
    expect(harness.run("print c();").output).toEqual(["2"]);
  });

  it("should resolve block locals of each unit alongside earlier closures", () => {
    const harness = createHarness();
    harness.run(`
      var get;
      { var secret = "kept"; fun reveal() { return secret; } get = reveal; }
    `);

    expect(
      harness.run('{ var secret = "other"; print get(); print secret; }').output,
    ).toEqual(["kept", "other"]);
    expect(
      harness.run("{ var a = 1; { var b = a + 1; print b; } } print get();")
        .output,
    ).toEqual(["2", "kept"]);
  });

  it("should expose extra natives passed in the options", () => {
    const out = new BufferedOutput();
    const session = new Session({
      output: out,
      natives: [
        native("double", 1, ([n]) => (typeof n === "number" ? n * 2 : null)),
      ],
    });

    expect(session.run("print double(21); print double;")).toBe(RunStatus.OK);
    expect(out.lines()).toEqual(["42", "<native fn>"]);
  });

  it("should keep blank lines that were printed", () => {
    expect(run('print ""; print "x";').output).toEqual(["", "x"]);
  });
});
