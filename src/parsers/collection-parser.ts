/**
 * Collection Parser
 *
 * Loads question collections from the portable JSON format.
 *
 * Accepted shapes:
 * - { "questions": [...], "metadata": {...} }
 * - a bare array of questions
 *
 * Compatibility with older files:
 * - `question_text` is read when `text` is absent
 * - `topic`, `subtopic`, `difficulty` beside the question move into metadata
 *   unless metadata already has them
 * - numeric and boolean answers become strings (true → "True")
 * - nulls read as absent; missing points default to 1
 *
 * Content rules (answers matching choices, math delimiters, ...) are not
 * checked here; that is the question validator's job.
 */

import * as fs from 'fs';

import { CollectionMetadata, RawCollection } from '../models/collection.model';
import { StructuralError } from '../models/errors';
import { QuestionMetadata, QuestionRecord } from '../models/question.model';
import { QuestionInput, collectionInputSchema } from '../schemas/collection.schema';

export const DEFAULT_POINTS = 1;

const FOLDED_METADATA_KEYS = ['topic', 'subtopic', 'difficulty'] as const;

function answerText(answer: QuestionInput['correct_answer']): string {
  if (typeof answer === 'boolean') {
    return answer ? 'True' : 'False';
  }
  if (typeof answer === 'number') {
    return String(answer);
  }
  return answer ?? '';
}

function toMetadata(input: QuestionInput): QuestionMetadata {
  const metadata: QuestionMetadata = { ...(input.metadata ?? {}) };
  for (const key of FOLDED_METADATA_KEYS) {
    const value = input[key];
    if (metadata[key] === undefined && typeof value === 'string') {
      metadata[key] = value;
    }
  }
  return metadata;
}

/**
 * Turn one schema-checked question into a record
 */
export function toQuestionRecord(input: QuestionInput): QuestionRecord {
  const record: QuestionRecord = {
    id: String(input.id),
    type: input.type,
    text: input.text ?? input.question_text ?? '',
    choices: (input.choices ?? []).map(String),
    correct_answer: answerText(input.correct_answer),
    points: input.points ?? DEFAULT_POINTS,
    metadata: toMetadata(input),
  };

  if (typeof input.tolerance === 'number') {
    record.tolerance = input.tolerance;
  }
  if (typeof input.feedback_correct === 'string') {
    record.feedback_correct = input.feedback_correct;
  }
  if (typeof input.feedback_incorrect === 'string') {
    record.feedback_incorrect = input.feedback_incorrect;
  }
  if (typeof input.title === 'string') {
    record.title = input.title;
  }
  return record;
}

/**
 * Parse a collection from JSON text or an already-decoded value.
 *
 * @param source - file name or label used in error messages
 * @throws StructuralError when the input is not JSON or not a collection
 */
export function parseCollection(input: unknown, source?: string): RawCollection {
  const label = source ? ` in ${source}` : '';
  let value = input;

  if (typeof input === 'string') {
    try {
      value = JSON.parse(input);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StructuralError(`Invalid JSON${label}`, [message], source);
    }
  }

  const result = collectionInputSchema.safeParse(Array.isArray(value) ? { questions: value } : value);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new StructuralError(`Not a question collection${label}`, issues, source);
  }

  const metadata: CollectionMetadata = { ...(result.data.metadata ?? {}) };
  return {
    questions: result.data.questions.map(toQuestionRecord),
    metadata,
  };
}

/**
 * Read and parse a collection file
 *
 * @throws StructuralError when the file cannot be read or parsed
 */
export function readCollectionFile(filePath: string): RawCollection {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new StructuralError(`Cannot read ${filePath}`, [message], filePath);
  }
  return parseCollection(content, filePath);
}
