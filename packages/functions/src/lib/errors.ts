export type ErrorKind =
  | "ConfigurationError"
  | "ValidationError"
  | "MissingFieldError"
  | "StoreClientError"
  | "UnexpectedError";

export interface Failure {
  kind: ErrorKind;
  message: string;
  cause?: unknown;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: Failure };

export const STATUS_BY_KIND: Record<ErrorKind, number> = {
  ConfigurationError: 400,
  ValidationError: 400,
  MissingFieldError: 400,
  StoreClientError: 400,
  UnexpectedError: 500,
};

const TRACE_LINES = 4;

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(kind: ErrorKind, message: string, cause?: unknown): Result<T> {
  return { ok: false, error: { kind, message, cause } };
}

/**
 * Short stack for the error log. Failures raised by validation have no
 * underlying exception and fall back to `kind: message`.
 */
export function traceOf(failure: Failure): string {
  const stack = failure.cause instanceof Error ? failure.cause.stack : undefined;
  if (!stack) {
    return `${failure.kind}: ${failure.message}`;
  }
  return stack.split("\n").slice(0, TRACE_LINES).join("\n");
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
