/**
 * Validation Violations
 *
 * Per-question content problems. These are data, not exceptions: the merge
 * engine collects every violation across every source before failing.
 */

import { QuestionField } from './question.model';

export type ViolationKind =
  | 'EMPTY_ID'
  | 'EMPTY_TEXT'
  | 'UNKNOWN_TYPE'
  | 'MISSING_CHOICES'
  | 'EMPTY_CHOICE'
  | 'DUPLICATE_CHOICE'
  | 'CORRECT_ANSWER_NOT_IN_CHOICES'
  | 'NON_NUMERIC_ANSWER'
  | 'INVALID_TRUE_FALSE_ANSWER'
  | 'MISSING_ANSWER'
  | 'DELIMITER_IMBALANCE'
  | 'MALFORMED_MATH'
  | 'EMPTY_MATH_SPAN'
  | 'TARGET_DIALECT_PRESENT'
  | 'NON_POSITIVE_POINTS'
  | 'NEGATIVE_TOLERANCE'
  | 'INVALID_DIFFICULTY';

export interface Violation {
  kind: ViolationKind;

  /** Offending field, e.g. `text` or `choices[2]` */
  field?: QuestionField;

  /** Character offset inside the field, for notation problems */
  position?: number;
}

/**
 * Violation located within a list of input collections
 */
export interface SourcedViolation {
  sourceIndex: number;
  position: number;
  questionId: string;
  violation: Violation;
}
