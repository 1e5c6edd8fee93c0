// src/lib/attainmentErrors.ts
import type { ApiError } from "../middleware/errorHandler";

export type AttainmentErrorCode =
  | "INCOMPLETE_MAPPING"
  | "INVALID_MARK"
  | "INVALID_INPUT"
  | "LOCKED_SCOPE"
  | "NOT_FOUND"
  | "CONFLICT";

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for every failure the attainment pipeline reports on purpose.
 * `details` must carry enough identifiers (scope, assessment, student,
 * component) for someone to find the offending record.
 */
export class AttainmentError extends Error implements ApiError {
  readonly code: AttainmentErrorCode;
  readonly statusCode: number;
  readonly details?: ErrorDetails;

  constructor(code: AttainmentErrorCode, statusCode: number, message: string, details?: ErrorDetails) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export interface UnmappedComponent {
  assessmentId: string;
  componentId: string;
  componentNumber: string;
  coId: string | null;
}

export class IncompleteMappingError extends AttainmentError {
  constructor(courseId: string, components: UnmappedComponent[]) {
    super(
      "INCOMPLETE_MAPPING",
      422,
      `${components.length} assessment component(s) in course ${courseId} are not mapped to a course outcome of the course`,
      { courseId, components }
    );
  }
}

export interface InvalidMarkRow {
  assessmentId: string;
  studentId: string;
  componentId: string;
  marks: number;
  reason: string;
  row?: number;
}

export class InvalidMarkError extends AttainmentError {
  constructor(scopeId: string, rows: InvalidMarkRow[]) {
    super(
      "INVALID_MARK",
      422,
      `${rows.length} mark record(s) rejected for ${scopeId}; the whole assessment was refused`,
      { scopeId, rows }
    );
  }
}

export class InvalidInputError extends AttainmentError {
  constructor(message: string, details?: ErrorDetails, statusCode = 400) {
    super("INVALID_INPUT", statusCode, message, details);
  }
}

export class LockedScopeError extends AttainmentError {
  constructor(
    scope: { semesterId: string; courseId?: string; programId?: string },
    refused = "attainment cannot be recomputed"
  ) {
    super("LOCKED_SCOPE", 423, `Semester ${scope.semesterId} is locked; ${refused}`, scope);
  }
}

export class NotFoundError extends AttainmentError {
  constructor(entity: string, id: string) {
    super("NOT_FOUND", 404, `${entity} not found: ${id}`, { entity, id });
  }
}

export class ConflictError extends AttainmentError {
  constructor(message: string, details?: ErrorDetails) {
    super("CONFLICT", 409, message, details);
  }
}
