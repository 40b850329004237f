/**
 * Editor error taxonomy.
 *
 * Every error raised by the engine extends EditorError and carries a stable
 * `code`, so callers can branch without `instanceof` across bundles.
 */

import type { ZodError, ZodIssue } from 'zod';

export type EditorErrorCode =
  | 'VALIDATION'
  | 'NO_SELECTION'
  | 'NO_ACTIVE_INFLUENCE'
  | 'BINDING_FAILURE'
  | 'STALE_WEIGHTS'
  | 'WEIGHT_COMMIT';

export class EditorError extends Error {
  readonly code: EditorErrorCode;

  constructor(code: EditorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed setter or configuration input. Raised before any mutation.
 */
export class ValidationError extends EditorError {
  readonly issues: readonly ZodIssue[];

  constructor(message: string, issues: readonly ZodIssue[] = []) {
    super('VALIDATION', message);
    this.issues = issues;
  }

  static fromZod(operation: string, error: ZodError): ValidationError {
    const detail = error.issues
      .map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join('.') : 'value';
        return `${path}: ${issue.message}`;
      })
      .join('; ');
    return new ValidationError(`${operation}() rejected input (${detail})`, error.issues);
  }
}

export class NoSelectionError extends EditorError {
  constructor(message = 'Source influences require a weight list selection') {
    super('NO_SELECTION', message);
  }
}

export class NoActiveInfluenceError extends EditorError {
  constructor(message = 'Unable to get active influence from current selection') {
    super('NO_ACTIVE_INFLUENCE', message);
  }
}

/**
 * Host object could not be bound. Logged by the session, never thrown to the user.
 */
export class BindingFailure extends EditorError {
  readonly node: string | null;

  constructor(message: string, node: string | null = null, cause?: unknown) {
    super('BINDING_FAILURE', message, cause === undefined ? undefined : { cause });
    this.node = node;
  }
}

export class StaleWeightsError extends EditorError {
  readonly vertexId: number;

  constructor(vertexId: number) {
    super('STALE_WEIGHTS', `No cached weights for vertex ${vertexId}`);
    this.vertexId = vertexId;
  }
}

export class WeightCommitError extends EditorError {
  constructor(vertexCount: number, cause: unknown) {
    super('WEIGHT_COMMIT', `Weight source rejected a batch of ${vertexCount} vertices`, { cause });
  }
}

/**
 * Type guard for engine errors.
 */
export function isEditorError(value: unknown): value is EditorError {
  return value instanceof EditorError;
}
