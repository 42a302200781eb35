/**
 * Merge Engine
 *
 * Combines several question collections into one:
 * 1. Validate every question of every source (all violations are collected)
 * 2. Resolve id collisions across the union
 * 3. Concatenate sources in order, each in its own order, with ids remapped
 * 4. Report counts, renames and advisory near-duplicates
 *
 * A single invalid question stops the merge before anything is combined.
 */

import {
  Collection,
  CollectionMetadata,
  CURRENT_FORMAT_VERSION,
} from '../models/collection.model';
import { MergeOutcome, MergeReport, SourceSummary } from '../models/merge-report.model';
import { Question, QuestionRecord, isQuestion } from '../models/question.model';
import { SourcedViolation } from '../models/violation.model';
import { createLogger } from '../logging/console-logger';
import { Logger } from '../logging/logger';

import { resolveConflicts } from './conflict-resolver.service';
import { DEFAULT_SIMILARITY_THRESHOLD, detectContentDuplicates } from './duplicate-detector.service';
import { validateCollection } from './question-validator.service';

export interface MergeOptions {
  /** Report cross-source near-duplicates (default true) */
  detectDuplicates?: boolean;

  /** Similarity above which a pair counts as a duplicate */
  similarityThreshold?: number;

  /** Clock for the merged collection's created_date */
  now?: () => Date;

  logger?: Logger;
}

/**
 * Metadata of the merged collection: the first subject (or every distinct
 * subject joined), the current format version and the merge time.
 */
export function mergeMetadata(collections: Collection<QuestionRecord>[], now: Date): CollectionMetadata {
  const subjects: string[] = [];
  for (const collection of collections) {
    const subject = collection.metadata.subject?.trim();
    if (subject && !subjects.includes(subject)) {
      subjects.push(subject);
    }
  }

  const metadata: CollectionMetadata = {
    format_version: CURRENT_FORMAT_VERSION,
    created_date: now.toISOString(),
    merged_sources: collections.length,
  };
  if (subjects.length > 0) {
    metadata.subject = subjects.join(' + ');
  }
  return metadata;
}

function collectViolations(collections: Collection<QuestionRecord>[]): SourcedViolation[] {
  return collections.flatMap((collection, sourceIndex) =>
    validateCollection(collection, sourceIndex)
  );
}

/**
 * Merge collections into one with a collision-free id space.
 *
 * Inputs are never modified; output questions are new objects that differ
 * from their source only in `id`.
 */
export function mergeCollections(
  collections: Collection<QuestionRecord>[],
  options: MergeOptions = {}
): MergeOutcome {
  const logger = options.logger ?? createLogger('merge');
  const now = options.now ?? (() => new Date());

  const violations = collectViolations(collections);
  if (violations.length > 0) {
    logger.warn(`Merge aborted: ${violations.length} violations`, {
      sources: collections.length,
    });
    return { ok: false, violations };
  }

  const space = resolveConflicts(collections);
  const questions: Question[] = [];
  let cursor = 0;

  collections.forEach(collection => {
    for (const record of collection.questions) {
      const assignment = space.assignments[cursor++];
      const renamed: QuestionRecord = { ...record, id: assignment.finalId };
      // validated above, so the tag is known
      if (isQuestion(renamed)) {
        questions.push(renamed);
      }
    }
  });

  const sources: SourceSummary[] = collections.map((collection, sourceIndex) => ({
    sourceIndex,
    questionCount: collection.questions.length,
    renamedCount: space.conflicts.filter(c => c.sourceIndex === sourceIndex).length,
  }));

  const duplicates =
    options.detectDuplicates === false
      ? []
      : detectContentDuplicates(
          collections,
          options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD
        );

  const report: MergeReport = {
    questionsIn: sources.reduce((sum, s) => sum + s.questionCount, 0),
    questionsOut: questions.length,
    collisionCount: space.conflicts.length,
    conflicts: space.conflicts,
    sources,
    duplicates,
  };

  logger.info(
    `Merged ${report.questionsIn} questions from ${collections.length} sources`,
    { collisions: report.collisionCount, duplicates: duplicates.length }
  );

  return {
    ok: true,
    collection: { questions, metadata: mergeMetadata(collections, now()) },
    report,
  };
}
