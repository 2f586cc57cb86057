// Error types for Bug Sleuth.
// ConfigurationError is the only fatal tier; everything else is raised by
// an external call and is caught where the pipeline turns it into an
// empty or missing result.

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = "ConfigurationError";
  }
}

export type CloneFailureReason = "git_missing" | "timeout" | "failed";

export class CloneError extends Error {
  readonly reason: CloneFailureReason;
  readonly slug: string;

  constructor(reason: CloneFailureReason, slug: string, message: string) {
    super(message);
    this.name = "CloneError";
    this.reason = reason;
    this.slug = slug;
  }
}

export class CommandNotFoundError extends Error {
  readonly command: string;

  constructor(command: string) {
    super(`${command} not found`);
    this.name = "CommandNotFoundError";
    this.command = command;
  }
}

export class CommandTimeoutError extends Error {
  readonly command: string;
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`${command} timed out after ${Math.round(timeoutMs / 1000)}s`);
    this.name = "CommandTimeoutError";
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

export class ServiceApiError extends Error {
  readonly service: string;
  readonly status: number;
  readonly detail: string;

  constructor(service: string, status: number, detail: string) {
    super(`${service} API error ${status}: ${detail}`);
    this.name = "ServiceApiError";
    this.service = service;
    this.status = status;
    this.detail = detail;
  }
}

export class CatalogDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogDataError";
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
