import type { ZodError } from "zod";

/**
 * Base class for failures the service reports to callers.
 * `code` is the machine-readable `error` field of HTTP responses.
 */
export class PocketPilotError extends Error {
  constructor(
    message: string,
    readonly status: 400 | 404 | 500 = 500,
    readonly code: string = "internal_error",
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends PocketPilotError {
  constructor(what: string, key: string) {
    super(`${what} not found: ${key}`, 404, "not_found");
  }
}

export class ValidationError extends PocketPilotError {
  constructor(message: string) {
    super(message, 400, "invalid_request");
  }

  static fromZod(error: ZodError): ValidationError {
    const message = error.issues
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      )
      .join("; ");
    return new ValidationError(message);
  }
}

export class EmptyCsvError extends PocketPilotError {
  constructor() {
    super("CSV file is empty", 400, "empty_file");
  }
}

export class ConfigError extends Error {
  constructor(key: string, value: string) {
    super(`Invalid value for environment variable ${key}: "${value}"`);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
