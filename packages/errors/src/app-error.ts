import type { ErrorKind } from "@docchat/types";

export interface AppErrorOptions {
  message: string;
  statusCode: number;
  code: string;
  kind?: ErrorKind;
  retryable?: boolean;
  isOperational?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly kind: ErrorKind;
  public readonly retryable: boolean;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor({
    message,
    statusCode,
    code,
    kind = "internal",
    retryable = false,
    isOperational = true,
    details,
    cause,
  }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.kind = kind;
    this.retryable = retryable;
    this.isOperational = isOperational;
    this.details = details;

    // Restore prototype chain (necessary when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}

/**
 * Kind and human-readable message for any thrown value, used wherever an error
 * is recorded instead of rethrown.
 */
export function describeError(err: unknown): { kind: ErrorKind; message: string } {
  if (AppError.isAppError(err)) {
    return { kind: err.kind, message: err.message || err.code };
  }
  if (err instanceof Error && err.message.length > 0) {
    return { kind: "internal", message: err.message };
  }
  return { kind: "internal", message: "Unexpected error" };
}
