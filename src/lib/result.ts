export type ErrorKind = "InvalidArgument" | "InsufficientMemory" | "NotFound" | "EmptyResult";

export type SimError = {
  kind: ErrorKind;
  message: string;
};

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: SimError };

export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: ErrorKind, message: string): Outcome<T> {
  return { ok: false, error: { kind, message } };
}

export function invalid<T = never>(message: string): Outcome<T> {
  return fail<T>("InvalidArgument", message);
}

export function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function isNonNegativeInt(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}
