/**
 * Notation Analysis Service
 *
 * Summarizes how much math a question set carries, so authors can see what
 * a conversion will touch before exporting.
 */

import { QuestionRecord } from '../models/question.model';
import { MathSpanCounts, scanNotation } from '../transformers/notation-transformer';

export const MAX_SAMPLE_SPANS = 10;

/** Questions with more spans than this are complex */
export const SIMPLE_SPAN_LIMIT = 3;

export interface NotationAnalysis {
  totalQuestions: number;
  questionsWithMath: number;

  /** Number of field values containing math, by field group */
  fieldsWithMath: {
    text: number;
    choices: number;
    feedback: number;
  };

  spans: MathSpanCounts;

  questionsByComplexity: {
    none: number;
    simple: number;
    complex: number;
  };

  /** Share of questions with math, 0-100 */
  mathPercentage: number;

  /** Distinct spans as written, in order of first appearance */
  samples: string[];
}

interface FieldScan {
  counts: MathSpanCounts;
  spans: string[];
}

function scanField(value: string): FieldScan {
  const counts: MathSpanCounts = { inline: 0, block: 0, total: 0 };
  const spans: string[] = [];
  for (const segment of scanNotation(value).segments) {
    if (segment.kind === 'text') {
      continue;
    }
    counts[segment.kind]++;
    counts.total++;
    spans.push(value.slice(segment.start, segment.end));
  }
  return { counts, spans };
}

function addCounts(into: MathSpanCounts, from: MathSpanCounts): void {
  into.inline += from.inline;
  into.block += from.block;
  into.total += from.total;
}

/**
 * Analyze math usage across questions.
 *
 * Samples take up to two spans from each question text and one from each
 * choice; feedback spans are counted but not sampled.
 */
export function analyzeNotation(questions: QuestionRecord[]): NotationAnalysis {
  const analysis: NotationAnalysis = {
    totalQuestions: questions.length,
    questionsWithMath: 0,
    fieldsWithMath: { text: 0, choices: 0, feedback: 0 },
    spans: { inline: 0, block: 0, total: 0 },
    questionsByComplexity: { none: 0, simple: 0, complex: 0 },
    mathPercentage: 0,
    samples: [],
  };

  for (const question of questions) {
    let spanCount = 0;
    const candidates: string[] = [];

    const text = scanField(question.text);
    if (text.counts.total > 0) {
      analysis.fieldsWithMath.text++;
      spanCount += text.counts.total;
      addCounts(analysis.spans, text.counts);
      candidates.push(...text.spans.slice(0, 2));
    }

    for (const choice of question.choices) {
      const scan = scanField(choice);
      if (scan.counts.total > 0) {
        analysis.fieldsWithMath.choices++;
        spanCount += scan.counts.total;
        addCounts(analysis.spans, scan.counts);
        candidates.push(...scan.spans.slice(0, 1));
      }
    }

    for (const feedback of [question.feedback_correct, question.feedback_incorrect]) {
      if (feedback === undefined) {
        continue;
      }
      const scan = scanField(feedback);
      if (scan.counts.total > 0) {
        analysis.fieldsWithMath.feedback++;
        spanCount += scan.counts.total;
        addCounts(analysis.spans, scan.counts);
      }
    }

    if (spanCount === 0) {
      analysis.questionsByComplexity.none++;
    } else {
      analysis.questionsWithMath++;
      if (spanCount <= SIMPLE_SPAN_LIMIT) {
        analysis.questionsByComplexity.simple++;
      } else {
        analysis.questionsByComplexity.complex++;
      }
    }

    for (const span of candidates) {
      if (analysis.samples.length < MAX_SAMPLE_SPANS && !analysis.samples.includes(span)) {
        analysis.samples.push(span);
      }
    }
  }

  if (questions.length > 0) {
    analysis.mathPercentage = (analysis.questionsWithMath / questions.length) * 100;
  }
  return analysis;
}
