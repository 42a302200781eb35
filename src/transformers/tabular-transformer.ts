/**
 * Tabular Transformer
 *
 * Flattens questions into CSV rows, one per question. Choice columns are
 * numbered from 1 and there are as many as the widest question needs.
 * A question that cannot be rendered is reported and left out; the rest of
 * the table is still written.
 */

import * as Papa from 'papaparse';

import { NotationError } from '../models/errors';
import { PackagingFailure } from '../models/package.model';
import { Question, QuestionRecord, isQuestion } from '../models/question.model';

import { findAnswerFailure } from './answer-check';
import { TargetDialect, transformQuestionNotation } from './notation-transformer';

/** Columns written before the choices */
export const LEADING_COLUMNS = ['id', 'type', 'text', 'points', 'topic', 'difficulty'] as const;

/** Columns written after the choices */
export const TRAILING_COLUMNS = [
  'feedback_correct',
  'feedback_incorrect',
  'correct_answer',
  'tolerance',
  'subtopic',
] as const;

export const CHOICE_COLUMN_PREFIX = 'choice_';

export interface TabularOptions {
  dialect: TargetDialect;

  /** Fewest choice columns to write */
  minChoiceColumns: number;
}

export interface TabularRendering {
  csv: string;
  columns: string[];
  rowCount: number;
  failures: PackagingFailure[];
}

export function tabularColumns(choiceColumns: number): string[] {
  const choices = Array.from({ length: choiceColumns }, (_, i) => `${CHOICE_COLUMN_PREFIX}${i + 1}`);
  return [...LEADING_COLUMNS, ...choices, ...TRAILING_COLUMNS];
}

function metadataText(question: QuestionRecord, key: 'topic' | 'subtopic' | 'difficulty'): string {
  const value = question.metadata[key];
  return typeof value === 'string' ? value : '';
}

/**
 * One row in column order. The correct answer of a multiple choice question
 * is written as its rewritten choice, so it still matches a choice cell.
 */
function toRow(authored: Question, rendered: Question, choiceColumns: number): Array<string | number> {
  const choices = Array.from({ length: choiceColumns }, (_, i) => rendered.choices[i] ?? '');
  const correctAnswer =
    authored.type === 'multiple_choice'
      ? rendered.choices[authored.choices.indexOf(authored.correct_answer)]
      : rendered.correct_answer;

  return [
    rendered.id,
    rendered.type,
    rendered.text,
    rendered.points,
    metadataText(rendered, 'topic'),
    metadataText(rendered, 'difficulty'),
    ...choices,
    rendered.feedback_correct ?? '',
    rendered.feedback_incorrect ?? '',
    correctAnswer,
    rendered.tolerance ?? '',
    metadataText(rendered, 'subtopic'),
  ];
}

export function toTabular(questions: QuestionRecord[], options: TabularOptions): TabularRendering {
  const widest = questions.reduce((max, q) => Math.max(max, q.choices.length), 0);
  const columns = tabularColumns(Math.max(widest, options.minChoiceColumns));
  const choiceColumns = columns.length - LEADING_COLUMNS.length - TRAILING_COLUMNS.length;

  const rows: Array<Array<string | number>> = [];
  const failures: PackagingFailure[] = [];

  for (const record of questions) {
    if (!isQuestion(record)) {
      failures.push({ questionId: record.id, reason: 'UNSUPPORTED_TYPE', field: 'type' });
      continue;
    }
    const answerProblem = findAnswerFailure(record);
    if (answerProblem !== undefined) {
      failures.push(answerProblem);
      continue;
    }

    try {
      rows.push(toRow(record, transformQuestionNotation(record, options.dialect), choiceColumns));
    } catch (error) {
      if (!(error instanceof NotationError)) {
        throw error;
      }
      const failed: PackagingFailure = { questionId: record.id, reason: 'NOTATION_ERROR' };
      if (error.field !== undefined) {
        failed.field = error.field;
      }
      failures.push(failed);
    }
  }

  const csv = Papa.unparse({ fields: columns, data: rows }, { newline: '\n' });
  return { csv, columns, rowCount: rows.length, failures };
}
