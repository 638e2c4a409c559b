import { readFileSync } from "fs";
import { RunStatus, type Session } from "../host/session";

// sysexits.h
export const EX_OK = 0;
export const EX_USAGE = 64;
export const EX_DATAERR = 65;
export const EX_NOINPUT = 66;
export const EX_SOFTWARE = 70;

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/** Runs a script file as one unit and returns the process exit code. */
export function runFile(
  path: string,
  session: Session,
  fail: (message: string) => void,
): number {
  let source: string;
  try {
    source = readFileSync(path, "utf8");
  } catch (e) {
    if (isMissingFile(e)) {
      fail(`Cannot open '${path}': no such file.`);
      return EX_NOINPUT;
    }
    throw e;
  }

  switch (session.run(source)) {
    case RunStatus.STATIC_ERROR:
      return EX_DATAERR;
    case RunStatus.RUNTIME_ERROR:
      return EX_SOFTWARE;
    case RunStatus.OK:
      return EX_OK;
  }
}
