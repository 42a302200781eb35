/**
 * Answer checks shared by the package renderers
 */

import { PackagingFailure } from '../models/package.model';
import { Question } from '../models/question.model';

/**
 * Reason a question's answer cannot be rendered, if any.
 * Mirrors the validator so that unvalidated collections still fail cleanly.
 */
export function findAnswerFailure(question: Question): PackagingFailure | undefined {
  if (question.type === 'multiple_choice' && !question.choices.includes(question.correct_answer)) {
    return { questionId: question.id, reason: 'CORRECT_ANSWER_NOT_IN_CHOICES', field: 'correct_answer' };
  }
  if (question.type === 'numerical') {
    const answer = question.correct_answer;
    if (answer.trim() === '' || !Number.isFinite(Number(answer))) {
      return { questionId: question.id, reason: 'NON_NUMERIC_ANSWER', field: 'correct_answer' };
    }
  }
  return undefined;
}
