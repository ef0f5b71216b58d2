import type { ContentfulStatusCode } from "hono/utils/http-status";

export class AppError extends Error {
  readonly status: ContentfulStatusCode;
  readonly code: string;
  readonly details?: unknown;

  constructor(
    message: string,
    status: ContentfulStatusCode,
    code: string,
    details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown, code = "VALIDATION_ERROR") {
    super(message, 400, code, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "NOT_FOUND");
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: unknown, code = "CONFLICT") {
    super(message, 409, code, details);
  }
}

export class SelfAssignmentError extends ValidationError {
  constructor() {
    super(
      "The absent teacher cannot cover their own period",
      undefined,
      "SELF_ASSIGNMENT"
    );
  }
}

export class InvalidDateError extends ValidationError {
  constructor(message: string) {
    super(message, undefined, "INVALID_DATE");
  }
}

export class AlreadyAssignedError extends ConflictError {
  constructor(details?: unknown) {
    super("A proxy is already assigned for this period", details, "ALREADY_ASSIGNED");
  }
}

export class TeacherUnavailableError extends ConflictError {
  constructor(reason: string) {
    super(`Teacher is unavailable: ${reason}`, undefined, "TEACHER_UNAVAILABLE");
  }
}

export class InvalidTransitionError extends ConflictError {
  constructor(from: string, to: string) {
    super(
      `Cannot move a proxy from ${from} to ${to}`,
      undefined,
      "INVALID_TRANSITION"
    );
  }
}
