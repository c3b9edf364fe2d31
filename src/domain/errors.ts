import { HttpError } from "../http/httpError";

export class ValidationError extends HttpError {
  readonly field: string;

  constructor(field: string, message: string, statusCode = 422) {
    super(statusCode, message);
    this.name = "ValidationError";
    this.field = field;
  }
}

export class UnsupportedFileTypeError extends ValidationError {
  constructor(extension: string) {
    super("Resume", `Only PDF/DOC/DOCX allowed. Got: ${extension || "unknown"}`, 415);
    this.name = "UnsupportedFileTypeError";
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
    this.name = "NotFoundError";
  }
}

export class StorageError extends HttpError {
  constructor(message: string, cause?: unknown) {
    super(500, message);
    this.name = "StorageError";
    this.cause = cause;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
