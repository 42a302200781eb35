/**
 * Tabular Parser
 *
 * Reads a question table written by the tabular transformer back into
 * question records. Used by the export validator and for CSV imports.
 */

import * as Papa from 'papaparse';

import { QuestionMetadata, QuestionRecord } from '../models/question.model';
import { CHOICE_COLUMN_PREFIX } from '../transformers/tabular-transformer';

type TableRow = Record<string, string | undefined>;

export interface ParsedTable {
  columns: string[];
  rows: TableRow[];

  /** Parser complaints, with the 1-based data row they concern */
  errors: string[];
}

/**
 * Parse CSV text into header names and keyed rows
 */
export function parseTable(csv: string): ParsedTable {
  const result = Papa.parse<TableRow>(csv, {
    header: true,
    skipEmptyLines: true,
  });
  return {
    columns: result.meta.fields ?? [],
    rows: result.data,
    errors: result.errors.map(error =>
      error.row === undefined ? error.message : `row ${error.row + 1}: ${error.message}`
    ),
  };
}

function cell(row: TableRow, column: string): string {
  return (row[column] ?? '').trim();
}

function choiceNumber(column: string): number | undefined {
  if (!column.startsWith(CHOICE_COLUMN_PREFIX)) {
    return undefined;
  }
  const n = Number(column.slice(CHOICE_COLUMN_PREFIX.length));
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

/**
 * Turn one table row into a question record.
 * Blank choice cells are dropped; a blank points cell means 1 point.
 */
export function rowToQuestion(row: TableRow, columns: string[]): QuestionRecord {
  const choiceColumns = columns
    .map(column => ({ column, n: choiceNumber(column) }))
    .filter((entry): entry is { column: string; n: number } => entry.n !== undefined)
    .sort((a, b) => a.n - b.n);

  const metadata: QuestionMetadata = {};
  for (const key of ['topic', 'subtopic', 'difficulty'] as const) {
    const value = cell(row, key);
    if (value !== '') {
      metadata[key] = value;
    }
  }

  const points = cell(row, 'points');
  const question: QuestionRecord = {
    id: cell(row, 'id'),
    type: cell(row, 'type'),
    text: cell(row, 'text'),
    choices: choiceColumns.map(({ column }) => cell(row, column)).filter(choice => choice !== ''),
    correct_answer: cell(row, 'correct_answer'),
    points: points === '' ? 1 : Number(points),
    metadata,
  };

  const tolerance = cell(row, 'tolerance');
  if (tolerance !== '') {
    question.tolerance = Number(tolerance);
  }
  const feedbackCorrect = cell(row, 'feedback_correct');
  if (feedbackCorrect !== '') {
    question.feedback_correct = feedbackCorrect;
  }
  const feedbackIncorrect = cell(row, 'feedback_incorrect');
  if (feedbackIncorrect !== '') {
    question.feedback_incorrect = feedbackIncorrect;
  }
  return question;
}

/**
 * Parse a question table into records, in row order
 */
export function parseTabularQuestions(csv: string): QuestionRecord[] {
  const table = parseTable(csv);
  return table.rows.map(row => rowToQuestion(row, table.columns));
}
