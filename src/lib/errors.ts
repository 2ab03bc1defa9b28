/**
 * Error types raised by the blog pipeline.
 *
 * Enrichment stages (research, images) catch their failures and degrade to
 * empty results. Everything else propagates to the CLI, which exits non-zero.
 */

export type ErrorCode =
  | "CONFIGURATION"
  | "EXTERNAL_SERVICE"
  | "GENERATION"
  | "OUTPUT";

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { context?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.context = options?.context;
  }
}

/** Missing or invalid settings. */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("CONFIGURATION", message, { context });
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(service: string, message: string, options?: { context?: Record<string, unknown>; cause?: unknown }) {
    super("EXTERNAL_SERVICE", `${service} error: ${message}`, options);
    this.service = service;
  }
}

/** The completion backend failed or returned output that could not be parsed. */
export class GenerationError extends AppError {
  constructor(message: string, options?: { context?: Record<string, unknown>; cause?: unknown }) {
    super("GENERATION", message, options);
  }
}

export class OutputError extends AppError {
  public readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super("OUTPUT", `Cannot write ${path}: ${message}`, { context: { path }, cause });
    this.path = path;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "An unknown error occurred";
}
