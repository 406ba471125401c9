export type AuditErrorCode = "INVALID_URL" | "SEED_UNREACHABLE" | "AUDIT_FAILED";

export class AuditError extends Error {
  readonly code: AuditErrorCode;
  readonly statusCode: number;

  constructor(code: AuditErrorCode, message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class InvalidUrlError extends AuditError {
  constructor(message: string) {
    super("INVALID_URL", message, 400);
  }
}

/** The seed page could not be reached at all, so there is nothing to report on. */
export class SeedUnreachableError extends AuditError {
  readonly url: string;

  constructor(url: string, reason: string) {
    super("SEED_UNREACHABLE", `Could not reach ${url}: ${reason}`, 502);
    this.url = url;
  }
}

export function isAuditError(error: unknown): error is AuditError {
  return error instanceof AuditError;
}
