/**
 * Error types raised by results-table processing
 */

import type { z } from 'zod';

/**
 * Base class for structural failures. `hint` carries the precondition the
 * caller broke.
 */
export class QwalkError extends Error {
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'QwalkError';
    this.hint = hint;
  }
}

/** Table shape violates a structural precondition */
export class SchemaError extends QwalkError {
  constructor(message: string, hint?: string) {
    super(message, hint);
    this.name = 'SchemaError';
  }
}

/** Adjacency matrix is empty, ragged, or holds non-finite entries */
export class AdjacencyError extends QwalkError {
  constructor(message: string, hint?: string) {
    super(message, hint);
    this.name = 'AdjacencyError';
  }
}

/** Summary rows were appended to a table that already carries them */
export class SummaryGuardError extends QwalkError {
  constructor(message: string, hint?: string) {
    super(message, hint);
    this.name = 'SummaryGuardError';
  }
}

/**
 * Render zod issues as `path: message` entries joined by "; "
 */
export function formatValidationIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
