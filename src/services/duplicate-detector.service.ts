/**
 * Duplicate Detector
 *
 * Flags questions from different sources whose content looks alike. The
 * result is advisory: the merge keeps both questions either way.
 */

import { Collection } from '../models/collection.model';
import { ContentDuplicate, QuestionLocation } from '../models/merge-report.model';
import { QuestionRecord } from '../models/question.model';
import { textSimilarity } from '../utils/text-similarity';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.8;

const TEXT_WEIGHT = 0.7;
const ANSWER_WEIGHT = 0.3;

/**
 * Similarity of two questions. Stem text dominates; the answer contributes
 * when both questions have one.
 */
export function questionSimilarity(a: QuestionRecord, b: QuestionRecord): number {
  const text = textSimilarity(a.text, b.text);
  if (a.correct_answer.trim() === '' || b.correct_answer.trim() === '') {
    return text;
  }
  return TEXT_WEIGHT * text + ANSWER_WEIGHT * textSimilarity(a.correct_answer, b.correct_answer);
}

/**
 * Names of the descriptive fields that both questions set to different values
 */
export function compareQuestionMetadata(a: QuestionRecord, b: QuestionRecord): string[] {
  const differences: string[] = [];
  for (const key of ['topic', 'subtopic', 'difficulty'] as const) {
    const left = a.metadata[key];
    const right = b.metadata[key];
    if (left !== undefined && right !== undefined && left !== right) {
      differences.push(key);
    }
  }
  if (a.points !== b.points) {
    differences.push('points');
  }
  if (a.type !== b.type) {
    differences.push('type');
  }
  return differences;
}

interface LocatedQuestion {
  location: QuestionLocation;
  question: QuestionRecord;
}

function locate(collections: Collection<QuestionRecord>[]): LocatedQuestion[] {
  return collections.flatMap((collection, sourceIndex) =>
    collection.questions.map((question, position) => ({
      location: { sourceIndex, position, id: question.id },
      question,
    }))
  );
}

/**
 * Compare every pair of questions that come from different sources
 * @param threshold - pairs scoring strictly above this are reported
 */
export function detectContentDuplicates(
  collections: Collection<QuestionRecord>[],
  threshold = DEFAULT_SIMILARITY_THRESHOLD
): ContentDuplicate[] {
  const located = locate(collections);
  const duplicates: ContentDuplicate[] = [];

  for (let i = 0; i < located.length; i++) {
    for (let j = i + 1; j < located.length; j++) {
      const first = located[i];
      const second = located[j];
      if (first.location.sourceIndex === second.location.sourceIndex) {
        continue;
      }
      const similarity = questionSimilarity(first.question, second.question);
      if (similarity > threshold) {
        duplicates.push({
          first: first.location,
          second: second.location,
          similarity,
          metadataDifferences: compareQuestionMetadata(first.question, second.question),
        });
      }
    }
  }

  return duplicates;
}
