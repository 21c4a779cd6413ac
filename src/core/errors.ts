export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500) {
    super(message);
    this.name = "AppError";
    this.statusCode = statusCode;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
    this.name = "ValidationError";
  }
}

export class AuthorizationDeniedError extends AppError {
  constructor(message = "Access denied") {
    super(message, 403);
    this.name = "AuthorizationDeniedError";
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string) {
    super(`${entity} not found`, 404);
    this.name = "NotFoundError";
  }
}

/** A write against the oracle or store failed; the detail stays in the logs */
export class DependencyFailureError extends AppError {
  constructor(message: string) {
    super(message, 500);
    this.name = "DependencyFailureError";
  }
}

export class ConfigurationError extends AppError {
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
  }
}

export class OracleError extends AppError {
  override cause: unknown;
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Relationship store ${operation} failed: ${describeCause(cause)}`);
    this.name = "OracleError";
    this.operation = operation;
    this.cause = cause;
  }
}

export class OracleTimeoutError extends OracleError {
  constructor(operation: string, timeoutMs: number) {
    super(operation, `timed out after ${timeoutMs}ms`);
    this.name = "OracleTimeoutError";
  }
}

export class InvalidObjectRefError extends AppError {
  constructor(ref: string) {
    super(`Invalid object reference '${ref}', expected 'type:id'`);
    this.name = "InvalidObjectRefError";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
