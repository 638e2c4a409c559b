#!/usr/bin/env node
import * as readline from "node:readline";
import chalk from "chalk";
import { formatDiagnostic } from "../lang/diagnostics";
import { formatRuntimeError } from "../vm/errors";
import { Session } from "../host/session";
import { EX_OK, EX_USAGE, runFile } from "./run";

function createSession(): Session {
  return new Session({
    report: (d) => {
      console.error(chalk.red(formatDiagnostic(d)));
    },
    reportRuntime: (error) => {
      console.error(chalk.red(formatRuntimeError(error)));
    },
  });
}

function runPrompt(): void {
  const session = createSession();
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "> ",
  });

  rl.prompt();
  rl.on("line", (line) => {
    // Errors are already reported; the REPL keeps its globals and carries on.
    session.run(line);
    rl.prompt();
  });
  rl.on("close", () => {
    process.stdout.write("\n");
  });
}

function main() {
  const args = process.argv.slice(2);

  switch (args.length) {
    case 0:
      runPrompt();
      break;
    case 1: {
      const code = runFile(args[0], createSession(), (message) => {
        console.error(chalk.red(message));
      });
      if (code !== EX_OK) process.exitCode = code;
      break;
    }
    default:
      console.log("Usage: treelox [script]");
      process.exitCode = EX_USAGE;
  }
}

main();
