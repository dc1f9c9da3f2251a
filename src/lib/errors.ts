export type ErrorKind =
  | "configuration"
  | "conflict"
  | "permission_denied"
  | "not_found"
  | "transient"
  | "resource_unavailable"
  | "invalid_transition"
  | "validation"
  | "database";

export class AppError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Required settings are absent. Never retried; meant for the operator. */
export class ConfigurationError extends AppError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super("configuration", message);
    this.missing = missing;
  }

  static missingVariables(missing: string[]): ConfigurationError {
    return new ConfigurationError(
      `Missing environment variable(s): ${missing.join(", ")}`,
      missing,
    );
  }
}

export class ConflictError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("conflict", message, options);
  }
}

export class PermissionDeniedError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("permission_denied", message, options);
  }
}

/** The storage target itself (bucket) does not exist. */
export class StorageNotFoundError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("not_found", message, options);
  }
}

export class TransientInfrastructureError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transient", message, options);
  }
}

export class ResourceUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("resource_unavailable", message, options);
  }
}

export class InvalidStatusTransitionError extends AppError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super("invalid_transition", `Invalid video status transition: ${from} -> ${to}`);
    this.from = from;
    this.to = to;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super("validation", message);
  }
}

export class DatabaseError extends AppError {
  readonly code?: string;

  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super("database", message, options);
    this.code = options?.code;
  }
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
