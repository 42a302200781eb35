/**
 * Error Types
 *
 * Only conditions that abort an operation are exceptions. Per-question
 * validation problems are returned as data (see violation.model).
 */

import type { NotationIssue } from '../transformers/notation-transformer';
import type { ExportIssue, PackagingFailure } from './package.model';

/**
 * Input is not a collection at all: bad JSON, missing `questions`, wrong
 * field types.
 */
export class StructuralError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    public readonly source?: string
  ) {
    super(message);
    this.name = 'StructuralError';
  }
}

/**
 * Math delimiters that cannot be converted
 */
export class NotationError extends Error {
  constructor(
    message: string,
    public readonly issues: NotationIssue[],
    /** Question field the text came from, when known */
    public readonly field?: string
  ) {
    super(message);
    this.name = 'NotationError';
  }
}

/**
 * One or more questions could not be serialized into the target format
 */
export class PackagingError extends Error {
  constructor(
    message: string,
    public readonly failures: PackagingFailure[]
  ) {
    super(message);
    this.name = 'PackagingError';
  }

  get questionIds(): string[] {
    return this.failures.map(f => f.questionId);
  }
}

/**
 * A built package failed its post-build well-formedness check
 */
export class ExportIntegrityError extends Error {
  constructor(
    message: string,
    public readonly issues: ExportIssue[]
  ) {
    super(message);
    this.name = 'ExportIntegrityError';
  }
}
