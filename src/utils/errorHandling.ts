////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// error handling / result stuff
export type Ok<T> = {
  ok: true;
  value: T;
};
export type Err = {
  ok: false;
  error: string;
};
export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<T = never>(error: string): Result<T> {
  return { ok: false, error };
}

// Best description of whatever was thrown; includes the stack and any `cause` chain when present.
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const lines = [error.stack || `${error.name}: ${error.message}`];
  if (error.cause !== undefined) {
    lines.push(`Caused by: ${describeError(error.cause)}`);
  }
  return lines.join("\n");
}
