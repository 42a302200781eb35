/**
 * Conflict Resolver
 *
 * Builds a collision-free id space over several collections that were each
 * valid on their own. Resolution only ever renames: no question is dropped
 * and none is overwritten.
 *
 * Rules:
 * - collections are walked in the order given, questions in their own order
 * - the first occurrence of an id keeps it
 * - every later occurrence gets `<id>_<n>` with the smallest n >= 1 whose
 *   result is not among the ids assigned so far
 * - a question reached later whose own id was already generated is itself a
 *   collision and is suffixed the same way (`Q1_1` becomes `Q1_1_1`)
 */

import { Collection } from '../models/collection.model';
import { ConflictRecord, IdAssignment, ResolvedIdSpace } from '../models/merge-report.model';
import { QuestionRecord } from '../models/question.model';
import { nextAvailableId } from '../utils/id-generator';

export function resolveConflicts(collections: Collection<QuestionRecord>[]): ResolvedIdSpace {
  const assigned = new Set<string>();
  const assignments: IdAssignment[] = [];
  const conflicts: ConflictRecord[] = [];

  collections.forEach((collection, sourceIndex) => {
    collection.questions.forEach((question, position) => {
      const originalId = question.id;
      let finalId = originalId;

      if (assigned.has(originalId)) {
        finalId = nextAvailableId(originalId, id => assigned.has(id));
        conflicts.push({ sourceIndex, position, originalId, finalId });
      }

      assigned.add(finalId);
      assignments.push({ sourceIndex, position, originalId, finalId });
    });
  });

  return { assignments, conflicts };
}

/**
 * Look up the final id of one input question
 */
export function finalIdOf(
  space: ResolvedIdSpace,
  sourceIndex: number,
  position: number
): string | undefined {
  return space.assignments.find(a => a.sourceIndex === sourceIndex && a.position === position)
    ?.finalId;
}
