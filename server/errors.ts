export type ServiceErrorCode =
  | "upstream_overloaded"
  | "rate_limited"
  | "upstream_unavailable"
  | "upstream_timeout"
  | "upstream_unreachable"
  | "upstream_rejected"
  | "empty_completion"
  | "ai_not_configured"
  | "unsupported_file_type"
  | "unreadable_document"
  | "storage_unavailable"
  | "invalid_token"
  | "unauthorized"
  | "invalid_credentials"
  | "email_taken"
  | "not_found";

export class ServiceError extends Error {
  readonly statusCode: number;
  readonly code: ServiceErrorCode;

  constructor(code: ServiceErrorCode, message: string, statusCode: number) {
    super(message);
    this.name = "ServiceError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class UpstreamOverloadedError extends ServiceError {
  constructor(message = "AI service is currently overloaded. Please try again in a few minutes.") {
    super("upstream_overloaded", message, 503);
    this.name = "UpstreamOverloadedError";
  }
}

export class RateLimitedError extends ServiceError {
  constructor(message = "Rate limit exceeded. Please wait a moment before trying again.") {
    super("rate_limited", message, 429);
    this.name = "RateLimitedError";
  }
}

export class UpstreamUnavailableError extends ServiceError {
  constructor(message = "AI service is temporarily unavailable. Please try again later.") {
    super("upstream_unavailable", message, 503);
    this.name = "UpstreamUnavailableError";
  }
}

export class UpstreamTimeoutError extends ServiceError {
  constructor(message = "Request timeout. The AI service is taking longer than expected.") {
    super("upstream_timeout", message, 504);
    this.name = "UpstreamTimeoutError";
  }
}

export class UpstreamUnreachableError extends ServiceError {
  constructor(message = "Unable to connect to AI service.") {
    super("upstream_unreachable", message, 503);
    this.name = "UpstreamUnreachableError";
  }
}

export class UpstreamRejectedError extends ServiceError {
  readonly upstreamStatus: number;

  constructor(upstreamStatus: number, detail: string) {
    super("upstream_rejected", `AI service error (${upstreamStatus}): ${detail}`, 502);
    this.name = "UpstreamRejectedError";
    this.upstreamStatus = upstreamStatus;
  }
}

export class EmptyCompletionError extends ServiceError {
  constructor(message = "AI service returned no content.") {
    super("empty_completion", message, 502);
    this.name = "EmptyCompletionError";
  }
}

export class AiNotConfiguredError extends ServiceError {
  constructor(message = "AI service is not configured on this backend.") {
    super("ai_not_configured", message, 503);
    this.name = "AiNotConfiguredError";
  }
}

export class UnsupportedFileTypeError extends ServiceError {
  constructor(message = "Unsupported file type. Please upload PDF, DOCX, TXT, or MD files.") {
    super("unsupported_file_type", message, 400);
    this.name = "UnsupportedFileTypeError";
  }
}

export class UnreadableDocumentError extends ServiceError {
  constructor(message = "No readable content found in the file.") {
    super("unreadable_document", message, 400);
    this.name = "UnreadableDocumentError";
  }
}

export class StorageUnavailableError extends ServiceError {
  constructor(operation: string) {
    super("storage_unavailable", `Storage is not available on this backend (${operation}).`, 503);
    this.name = "StorageUnavailableError";
  }
}

export class InvalidTokenError extends ServiceError {
  constructor() {
    super("invalid_token", "Invalid or expired token.", 401);
    this.name = "InvalidTokenError";
  }
}

export class UnauthorizedError extends ServiceError {
  constructor(message = "Authentication required.") {
    super("unauthorized", message, 401);
    this.name = "UnauthorizedError";
  }
}

export class InvalidCredentialsError extends ServiceError {
  constructor() {
    super("invalid_credentials", "Incorrect email or password.", 401);
    this.name = "InvalidCredentialsError";
  }
}

export class EmailTakenError extends ServiceError {
  constructor() {
    super("email_taken", "Email already registered.", 409);
    this.name = "EmailTakenError";
  }
}

export class NotFoundError extends ServiceError {
  constructor(resource: string) {
    super("not_found", `${resource} not found.`, 404);
    this.name = "NotFoundError";
  }
}

export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message.trim();
  }
  return String(error);
}
