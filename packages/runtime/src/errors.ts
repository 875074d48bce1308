// Runtime error types

import type { RoleDefinitionIssue } from '@treegate/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { code?: string; field?: string; details?: Record<string, unknown> }
  ) {
    super(options?.code ?? 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when a caller asks about an action kind that does not exist.
 * This is a programming error on the caller's side, not a denial.
 */
export class UnknownActionKindError extends ValidationError {
  readonly action: string;

  constructor(action: string) {
    super(`Unknown action kind "${action}"`, {
      code: 'UNKNOWN_ACTION_KIND',
      field: 'action',
      details: { action },
    });
    this.name = 'UnknownActionKindError';
    this.action = action;
  }
}

/**
 * Error when a subject's shape does not fit the action it is evaluated for,
 * e.g. a property subject passed for `createNode`.
 */
export class SubjectMismatchError extends ValidationError {
  readonly action: string;
  readonly subjectKind: string;
  readonly expectedKind: string;

  constructor(action: string, subjectKind: string, expectedKind: string) {
    super(`Action "${action}" expects a "${expectedKind}" subject, got "${subjectKind}"`, {
      code: 'SUBJECT_MISMATCH',
      field: 'subject',
      details: { action, subjectKind, expectedKind },
    });
    this.name = 'SubjectMismatchError';
    this.action = action;
    this.subjectKind = subjectKind;
    this.expectedKind = expectedKind;
  }
}

/**
 * Error when a role definitions document fails validation.
 */
export class RoleDefinitionError extends ValidationError {
  readonly issues: RoleDefinitionIssue[];

  constructor(issues: RoleDefinitionIssue[]) {
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    super(`Invalid role definitions: ${summary}`, {
      code: 'ROLE_DEFINITION_ERROR',
      details: { issues },
    });
    this.name = 'RoleDefinitionError';
    this.issues = issues;
  }
}
