/**
 * Question Model
 *
 * Field names follow the portable JSON format so that records can be read and
 * written without a mapping layer.
 */

/**
 * Closed set of question variants
 */
export const QUESTION_TYPES = [
  'multiple_choice',
  'true_false',
  'numerical',
  'fill_in_blank',
  'short_answer',
  'essay',
] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

export const DIFFICULTY_LEVELS = ['Easy', 'Medium', 'Hard'] as const;

export type Difficulty = (typeof DIFFICULTY_LEVELS)[number];

export const TRUE_FALSE_ANSWERS = ['True', 'False'] as const;

export type TrueFalseAnswer = (typeof TRUE_FALSE_ANSWERS)[number];

/**
 * Recognized metadata keys. Anything else is carried through untouched.
 */
export interface QuestionMetadata {
  topic?: string;
  subtopic?: string;
  difficulty?: string;
  [key: string]: unknown;
}

/**
 * Fields shared by every variant
 */
interface QuestionFields {
  /** Unique within a collection */
  id: string;

  /** Question stem (portable math dialect) */
  text: string;

  /** Ordered answer options; empty for non-choice types */
  choices: string[];

  /** Choice text, numeric string or True/False depending on type */
  correct_answer: string;

  /** Accepted deviation for numerical answers */
  tolerance?: number;

  points: number;

  feedback_correct?: string;

  feedback_incorrect?: string;

  /** Optional display title */
  title?: string;

  metadata: QuestionMetadata;
}

/**
 * A question as loaded, before its type has been checked
 */
export interface QuestionRecord extends QuestionFields {
  type: string;
}

export interface MultipleChoiceQuestion extends QuestionFields {
  type: 'multiple_choice';
}

export interface TrueFalseQuestion extends QuestionFields {
  type: 'true_false';
  correct_answer: TrueFalseAnswer;
}

export interface NumericalQuestion extends QuestionFields {
  type: 'numerical';
}

export interface FillInBlankQuestion extends QuestionFields {
  type: 'fill_in_blank';
}

export interface ShortAnswerQuestion extends QuestionFields {
  type: 'short_answer';
}

export interface EssayQuestion extends QuestionFields {
  type: 'essay';
}

export type Question =
  | MultipleChoiceQuestion
  | TrueFalseQuestion
  | NumericalQuestion
  | FillInBlankQuestion
  | ShortAnswerQuestion
  | EssayQuestion;

/**
 * Prose fields that may carry math. Structural fields (id, type, metadata)
 * are never rewritten.
 */
export type QuestionField =
  | 'id'
  | 'type'
  | 'text'
  | 'choices'
  | `choices[${number}]`
  | 'correct_answer'
  | 'tolerance'
  | 'points'
  | 'feedback_correct'
  | 'feedback_incorrect'
  | 'metadata.difficulty';

export function isQuestionType(value: string): value is QuestionType {
  return QUESTION_TYPES.some(candidate => candidate === value);
}

export function isTrueFalseAnswer(value: string): value is TrueFalseAnswer {
  return TRUE_FALSE_ANSWERS.some(candidate => candidate === value);
}

export function isDifficulty(value: string): value is Difficulty {
  return DIFFICULTY_LEVELS.some(candidate => candidate === value);
}

/**
 * Narrow a record to the tagged union.
 *
 * Only checks the tag and the literal-typed answer; full content checks live
 * in the question validator.
 */
export function isQuestion(record: QuestionRecord): record is Question {
  if (!isQuestionType(record.type)) {
    return false;
  }
  if (record.type === 'true_false') {
    return isTrueFalseAnswer(record.correct_answer);
  }
  return true;
}

/**
 * Tolerance for a numerical question (0 when unset)
 */
export function toleranceOf(question: Pick<QuestionFields, 'tolerance'>): number {
  return question.tolerance ?? 0;
}
