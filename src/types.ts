export type Result<T, E> =
  | {
      kind: "Ok";
      value: T;
    }
  | {
      kind: "Err";
      error: E;
    };

export function ok<T>(value: T): { kind: "Ok"; value: T } {
  return { kind: "Ok", value };
}

export function err<E>(error: E): { kind: "Err"; error: E } {
  return { kind: "Err", error };
}
