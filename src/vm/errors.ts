import { type Token } from "../lang/token";

/** A user-level failure that halts the current unit. */
export class RuntimeError extends Error {
  constructor(
    public readonly token: Token,
    message: string,
  ) {
    super(message);
    this.name = "RuntimeError";
  }
}

export function formatRuntimeError(error: RuntimeError): string {
  return `${error.message}\n[line ${String(error.token.line)}]`;
}
