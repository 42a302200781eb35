/**
 * Merge Report Model
 *
 * Audit trail of a merge. Nothing here is consulted after the merge returns;
 * the merged collection is self-consistent on its own.
 */

import { Collection } from './collection.model';
import { Question } from './question.model';
import { SourcedViolation } from './violation.model';

/**
 * Final id chosen for one input question
 */
export interface IdAssignment {
  sourceIndex: number;
  position: number;
  originalId: string;
  finalId: string;
}

/**
 * A renamed question. Same shape as an assignment, kept as its own type so
 * that reports cannot mix the two lists up.
 */
export interface ConflictRecord {
  sourceIndex: number;
  position: number;
  originalId: string;
  finalId: string;
}

export interface ResolvedIdSpace {
  /** One entry per input question, in merge order */
  assignments: IdAssignment[];

  /** Only the renamed questions */
  conflicts: ConflictRecord[];
}

/**
 * Location of a question inside the merge inputs
 */
export interface QuestionLocation {
  sourceIndex: number;
  position: number;
  id: string;
}

/**
 * Advisory note about two questions from different sources that look alike
 */
export interface ContentDuplicate {
  first: QuestionLocation;
  second: QuestionLocation;

  /** 0..1 */
  similarity: number;

  /** Metadata keys whose values differ between the two */
  metadataDifferences: string[];
}

export interface SourceSummary {
  sourceIndex: number;
  questionCount: number;
  renamedCount: number;
}

export interface MergeReport {
  questionsIn: number;
  questionsOut: number;
  collisionCount: number;
  conflicts: ConflictRecord[];
  sources: SourceSummary[];
  duplicates: ContentDuplicate[];
}

export type MergeOutcome =
  | { ok: true; collection: Collection<Question>; report: MergeReport }
  | { ok: false; violations: SourcedViolation[] };
