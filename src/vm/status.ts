import { type Value } from "./value";

export enum ExecStatus {
  NORMAL,
  RETURNED,
}

/** Outcome of executing a statement; RETURNED unwinds to the enclosing call. */
export type ExecResult =
  | { status: ExecStatus.NORMAL }
  | { status: ExecStatus.RETURNED; value: Value };

export const NORMAL: ExecResult = { status: ExecStatus.NORMAL };
