/**
 * Notation Transformer
 *
 * Rewrites math delimiters from the portable authoring dialect into the
 * dialect the target LMS renderer expects.
 *
 * Portable dialect:
 * - inline math: `$...$`
 * - block math:  `$$...$$`
 *
 * Target dialects:
 * - canvas:    inline `\(...\)`, block left as `$$...$$`
 * - bracketed: inline `\(...\)`, block `\[...\]`
 *
 * The scanner walks left to right and always tries the doubled delimiter
 * first, so the opening of a block is never read as two inline delimiters.
 * A backslash escapes the character after it. Problems are reported, never
 * repaired.
 */

import { NotationError } from '../models/errors';
import { QuestionField, QuestionRecord } from '../models/question.model';

export type TargetDialect = 'canvas' | 'bracketed';

export const TARGET_DIALECTS: readonly TargetDialect[] = ['canvas', 'bracketed'];

export function isTargetDialect(value: string): value is TargetDialect {
  return TARGET_DIALECTS.some(candidate => candidate === value);
}

export type NotationIssueCode =
  | 'UNCLOSED_INLINE'
  | 'UNCLOSED_BLOCK'
  | 'NESTED_DELIMITER'
  | 'EMPTY_SPAN';

export interface NotationIssue {
  code: NotationIssueCode;

  /** Offset of the opening delimiter, or of the misplaced one for NESTED_DELIMITER */
  position: number;
}

export interface TextSegment {
  kind: 'text';
  value: string;
  start: number;
}

export interface MathSegment {
  kind: 'inline' | 'block';
  content: string;
  start: number;
  end: number;
}

export type NotationSegment = TextSegment | MathSegment;

export interface NotationScan {
  segments: NotationSegment[];
  issues: NotationIssue[];
}

export interface MathSpanCounts {
  inline: number;
  block: number;
  total: number;
}

const DELIMITER = '$';
const BLOCK_DELIMITER = '$$';
const ESCAPE = '\\';
const TARGET_DELIMITER_CHARS = new Set(['(', ')', '[', ']']);

type ClosingMatch =
  | { type: 'closed'; position: number }
  | { type: 'nested'; position: number }
  | { type: 'unclosed' };

function findClosing(text: string, from: number, kind: MathSegment['kind']): ClosingMatch {
  let i = from;
  while (i < text.length) {
    const ch = text[i];
    if (ch === ESCAPE) {
      i += 2;
      continue;
    }
    if (ch === DELIMITER) {
      const doubled = text.startsWith(BLOCK_DELIMITER, i);
      if (kind === 'block') {
        return doubled ? { type: 'closed', position: i } : { type: 'nested', position: i };
      }
      return doubled ? { type: 'nested', position: i } : { type: 'closed', position: i };
    }
    i++;
  }
  return { type: 'unclosed' };
}

/**
 * Split text into plain and math segments.
 *
 * Scanning stops at the first unclosed or nested delimiter; the remainder is
 * returned as one text segment. Empty spans are reported and scanning goes on.
 */
export function scanNotation(text: string): NotationScan {
  const segments: NotationSegment[] = [];
  const issues: NotationIssue[] = [];
  let textStart = 0;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (ch === ESCAPE) {
      i += 2;
      continue;
    }
    if (ch !== DELIMITER) {
      i++;
      continue;
    }

    const kind: MathSegment['kind'] = text.startsWith(BLOCK_DELIMITER, i) ? 'block' : 'inline';
    const width = kind === 'block' ? BLOCK_DELIMITER.length : DELIMITER.length;
    const match = findClosing(text, i + width, kind);

    if (match.type === 'unclosed') {
      issues.push({ code: kind === 'block' ? 'UNCLOSED_BLOCK' : 'UNCLOSED_INLINE', position: i });
      break;
    }
    if (match.type === 'nested') {
      issues.push({ code: 'NESTED_DELIMITER', position: match.position });
      break;
    }

    if (i > textStart) {
      segments.push({ kind: 'text', value: text.slice(textStart, i), start: textStart });
    }
    const content = text.slice(i + width, match.position);
    if (content.trim() === '') {
      issues.push({ code: 'EMPTY_SPAN', position: i });
    }
    const end = match.position + width;
    segments.push({ kind, content, start: i, end });
    i = end;
    textStart = end;
  }

  if (textStart < text.length) {
    segments.push({ kind: 'text', value: text.slice(textStart), start: textStart });
  }

  return { segments, issues };
}

function renderSegment(segment: NotationSegment, dialect: TargetDialect): string {
  switch (segment.kind) {
    case 'text':
      return segment.value;
    case 'inline':
      return `\\(${segment.content}\\)`;
    case 'block':
      return dialect === 'bracketed'
        ? `\\[${segment.content}\\]`
        : `${BLOCK_DELIMITER}${segment.content}${BLOCK_DELIMITER}`;
  }
}

/**
 * Convert portable-dialect math to the target dialect.
 *
 * @throws NotationError when a span is unclosed, nested or empty
 * @example
 * transformNotation('$x$') // returns '\\(x\\)'
 * transformNotation('$$x$$') // returns '$$x$$'
 */
export function transformNotation(text: string, dialect: TargetDialect = 'canvas'): string {
  const scan = scanNotation(text);
  if (scan.issues.length > 0) {
    throw new NotationError(
      `Cannot convert math notation: ${scan.issues.map(i => `${i.code}@${i.position}`).join(', ')}`,
      scan.issues
    );
  }
  return scan.segments.map(s => renderSegment(s, dialect)).join('');
}

/**
 * Offsets of target-dialect delimiters (`\(`, `\)`, `\[`, `\]`) outside math spans.
 * Their presence in authoring input means the text was already converted.
 */
export function findTargetDialectDelimiters(text: string): number[] {
  const positions: number[] = [];
  for (const segment of scanNotation(text).segments) {
    if (segment.kind !== 'text') {
      continue;
    }
    const value = segment.value;
    let i = 0;
    while (i < value.length) {
      if (value[i] === ESCAPE) {
        if (TARGET_DELIMITER_CHARS.has(value[i + 1] ?? '')) {
          positions.push(segment.start + i);
        }
        i += 2;
        continue;
      }
      i++;
    }
  }
  return positions;
}

export function countMathSpans(text: string): MathSpanCounts {
  const counts: MathSpanCounts = { inline: 0, block: 0, total: 0 };
  for (const segment of scanNotation(text).segments) {
    if (segment.kind === 'text') {
      continue;
    }
    counts[segment.kind]++;
    counts.total++;
  }
  return counts;
}

export interface ProseField {
  field: QuestionField;
  value: string;
}

/**
 * The fields of a question that carry author prose (and therefore math)
 */
export function listProseFields(question: QuestionRecord): ProseField[] {
  const fields: ProseField[] = [{ field: 'text', value: question.text }];
  question.choices.forEach((choice, index) => {
    fields.push({ field: `choices[${index}]`, value: choice });
  });
  if (question.feedback_correct !== undefined) {
    fields.push({ field: 'feedback_correct', value: question.feedback_correct });
  }
  if (question.feedback_incorrect !== undefined) {
    fields.push({ field: 'feedback_incorrect', value: question.feedback_incorrect });
  }
  return fields;
}

function transformField(value: string, field: QuestionField, dialect: TargetDialect): string {
  try {
    return transformNotation(value, dialect);
  } catch (error) {
    if (error instanceof NotationError) {
      throw new NotationError(error.message, error.issues, field);
    }
    throw error;
  }
}

/**
 * Return a copy of the question with every prose field converted.
 * id, type and metadata are left alone.
 *
 * @throws NotationError naming the first field that cannot be converted
 */
export function transformQuestionNotation<Q extends QuestionRecord>(
  question: Q,
  dialect: TargetDialect = 'canvas'
): Q {
  const { feedback_correct: feedbackCorrect, feedback_incorrect: feedbackIncorrect } = question;
  return {
    ...question,
    text: transformField(question.text, 'text', dialect),
    choices: question.choices.map((choice, index) =>
      transformField(choice, `choices[${index}]`, dialect)
    ),
    ...(feedbackCorrect !== undefined
      ? { feedback_correct: transformField(feedbackCorrect, 'feedback_correct', dialect) }
      : {}),
    ...(feedbackIncorrect !== undefined
      ? { feedback_incorrect: transformField(feedbackIncorrect, 'feedback_incorrect', dialect) }
      : {}),
  };
}
