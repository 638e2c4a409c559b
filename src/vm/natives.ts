import { type NativeFn, type Value } from "./value";

export function native(
  name: string,
  arity: number,
  fn: (args: Value[]) => Value,
): NativeFn {
  return { tag: "Native", name, arity, fn };
}

export const defaultNatives: NativeFn[] = [
  native("clock", 0, () => Date.now() / 1000),
];
