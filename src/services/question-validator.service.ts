/**
 * Question Validator
 *
 * Checks a single question record for structural completeness and the
 * invariants of its variant. Problems come back as a list; the validator
 * only throws when it is handed something that is not a question at all.
 */

import { Collection } from '../models/collection.model';
import {
  QuestionRecord,
  isDifficulty,
  isQuestionType,
  isTrueFalseAnswer,
} from '../models/question.model';
import { SourcedViolation, Violation, ViolationKind } from '../models/violation.model';
import {
  NotationIssueCode,
  findTargetDialectDelimiters,
  listProseFields,
  scanNotation,
} from '../transformers/notation-transformer';

const NOTATION_VIOLATIONS: Record<NotationIssueCode, ViolationKind> = {
  UNCLOSED_INLINE: 'DELIMITER_IMBALANCE',
  UNCLOSED_BLOCK: 'DELIMITER_IMBALANCE',
  NESTED_DELIMITER: 'MALFORMED_MATH',
  EMPTY_SPAN: 'EMPTY_MATH_SPAN',
};

function assertQuestionRecord(value: unknown): asserts value is QuestionRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new TypeError('validateQuestion expects a question object');
  }
  const fields = new Map<string, unknown>(Object.entries(value));
  for (const key of ['id', 'type', 'text', 'correct_answer']) {
    if (typeof fields.get(key) !== 'string') {
      throw new TypeError(`validateQuestion expects '${key}' to be a string`);
    }
  }
  if (!Array.isArray(fields.get('choices'))) {
    throw new TypeError("validateQuestion expects 'choices' to be an array");
  }
  if (typeof fields.get('points') !== 'number') {
    throw new TypeError("validateQuestion expects 'points' to be a number");
  }
  const metadata = fields.get('metadata');
  if (typeof metadata !== 'object' || metadata === null) {
    throw new TypeError("validateQuestion expects 'metadata' to be an object");
  }
}

function isBlank(value: string): boolean {
  return value.trim() === '';
}

function isNumeric(value: string): boolean {
  return !isBlank(value) && Number.isFinite(Number(value));
}

function validateNotation(question: QuestionRecord): Violation[] {
  const violations: Violation[] = [];
  for (const { field, value } of listProseFields(question)) {
    for (const issue of scanNotation(value).issues) {
      violations.push({ kind: NOTATION_VIOLATIONS[issue.code], field, position: issue.position });
    }
    for (const position of findTargetDialectDelimiters(value)) {
      violations.push({ kind: 'TARGET_DIALECT_PRESENT', field, position });
    }
  }
  return violations;
}

function validateChoices(question: QuestionRecord): Violation[] {
  const violations: Violation[] = [];

  question.choices.forEach((choice, index) => {
    if (isBlank(choice)) {
      violations.push({ kind: 'EMPTY_CHOICE', field: `choices[${index}]` });
    }
  });

  if (question.type !== 'multiple_choice') {
    return violations;
  }

  if (question.choices.length === 0) {
    violations.push({ kind: 'MISSING_CHOICES', field: 'choices' });
    return violations;
  }

  const seen = new Set<string>();
  question.choices.forEach((choice, index) => {
    if (!isBlank(choice) && seen.has(choice)) {
      violations.push({ kind: 'DUPLICATE_CHOICE', field: `choices[${index}]` });
    }
    seen.add(choice);
  });

  if (!question.choices.includes(question.correct_answer)) {
    violations.push({ kind: 'CORRECT_ANSWER_NOT_IN_CHOICES', field: 'correct_answer' });
  }

  return violations;
}

function validateAnswer(question: QuestionRecord): Violation[] {
  switch (question.type) {
    case 'numerical':
      return isNumeric(question.correct_answer)
        ? []
        : [{ kind: 'NON_NUMERIC_ANSWER', field: 'correct_answer' }];
    case 'true_false':
      return isTrueFalseAnswer(question.correct_answer)
        ? []
        : [{ kind: 'INVALID_TRUE_FALSE_ANSWER', field: 'correct_answer' }];
    case 'fill_in_blank':
      return isBlank(question.correct_answer)
        ? [{ kind: 'MISSING_ANSWER', field: 'correct_answer' }]
        : [];
    default:
      return [];
  }
}

function validateRanges(question: QuestionRecord): Violation[] {
  const violations: Violation[] = [];
  if (!(question.points > 0)) {
    violations.push({ kind: 'NON_POSITIVE_POINTS', field: 'points' });
  }
  if (question.tolerance !== undefined && !(question.tolerance >= 0)) {
    violations.push({ kind: 'NEGATIVE_TOLERANCE', field: 'tolerance' });
  }
  const difficulty = question.metadata.difficulty;
  if (difficulty !== undefined && !isDifficulty(difficulty)) {
    violations.push({ kind: 'INVALID_DIFFICULTY', field: 'metadata.difficulty' });
  }
  return violations;
}

/**
 * Validate one question.
 *
 * @returns every violation found, or an empty list
 * @throws TypeError when `question` is not shaped like a question record
 */
export function validateQuestion(question: QuestionRecord): Violation[] {
  assertQuestionRecord(question);

  const violations: Violation[] = [];

  if (isBlank(question.id)) {
    violations.push({ kind: 'EMPTY_ID', field: 'id' });
  }
  if (isBlank(question.text)) {
    violations.push({ kind: 'EMPTY_TEXT', field: 'text' });
  }
  if (!isQuestionType(question.type)) {
    violations.push({ kind: 'UNKNOWN_TYPE', field: 'type' });
  }

  violations.push(...validateChoices(question));
  violations.push(...validateAnswer(question));
  violations.push(...validateRanges(question));
  violations.push(...validateNotation(question));

  return violations;
}

/**
 * Validate every question in a collection, tagging each violation with
 * where it came from.
 */
export function validateCollection(
  collection: Collection<QuestionRecord>,
  sourceIndex = 0
): SourcedViolation[] {
  const sourced: SourcedViolation[] = [];
  collection.questions.forEach((question, position) => {
    for (const violation of validateQuestion(question)) {
      sourced.push({ sourceIndex, position, questionId: question.id, violation });
    }
  });
  return sourced;
}
