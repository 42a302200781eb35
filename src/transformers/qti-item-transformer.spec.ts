import { PackagingError } from '../models/errors';
import { buildQuestion } from '../testing/question-fixtures';
import { child, children, textOf } from '../utils/xml';

import { choiceIdent, formatBound, toAssessmentDocument, toAssessmentItem } from './qti-item-transformer';

function thrownBy(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
}

function scoringConditions(item: unknown): unknown[] {
  return children(child(item, 'resprocessing'), 'respcondition');
}

describe('qti-item-transformer', () => {
  describe('choiceIdent', () => {
    it('should label choices with letters', () => {
      expect([0, 1, 25, 26, 27, 701, 702].map(choiceIdent)).toEqual([
        'A',
        'B',
        'Z',
        'AA',
        'AB',
        'ZZ',
        'AAA',
      ]);
    });
  });

  describe('formatBound', () => {
    it('should drop floating point noise', () => {
      expect(formatBound(0.1 + 0.2)).toBe('0.3');
      expect(formatBound(3.5 - 0.1)).toBe('3.4');
    });
  });

  describe('toAssessmentItem', () => {
    it('should render a multiple choice question with converted math', () => {
      const question = buildQuestion({
        id: 'M1',
        text: 'Solve $x + 1 = 2$',
        choices: ['$0$', '$1$', '$2$'],
        correct_answer: '$1$',
        points: 2,
      });

      const item = toAssessmentItem(question, 'canvas');

      expect(child(item, '@_ident')).toBe('M1');
      expect(textOf(child(child(child(item, 'presentation'), 'material'), 'mattext'))).toBe(
        'Solve \\(x + 1 = 2\\)'
      );

      const labels = children(child(child(child(item, 'presentation'), 'response_lid'), 'render_choice'), 'response_label');
      expect(labels.map(label => child(label, '@_ident'))).toEqual(['A', 'B', 'C']);
      expect(textOf(child(child(labels[1], 'material'), 'mattext'))).toBe('\\(1\\)');

      const [scored] = scoringConditions(item);
      expect(textOf(child(child(scored, 'conditionvar'), 'varequal'))).toBe('B');
      expect(child(child(scored, 'setvar'), '#text')).toBe(2);
    });

    it('should write item metadata', () => {
      const question = buildQuestion({ metadata: { topic: 'Arithmetic', difficulty: 'Easy' } });

      const item = toAssessmentItem(question, 'canvas');

      expect(child(child(child(item, 'itemmetadata'), 'qtimetadata'), 'qtimetadatafield')).toEqual([
        { fieldlabel: 'question_type', fieldentry: 'multiple_choice_question' },
        { fieldlabel: 'points_possible', fieldentry: 1 },
        { fieldlabel: 'topic', fieldentry: 'Arithmetic' },
        { fieldlabel: 'difficulty', fieldentry: 'Easy' },
      ]);
    });

    it('should render true/false with a fixed pair of choices', () => {
      const question = buildQuestion({ type: 'true_false', choices: [], correct_answer: 'False' });

      const item = toAssessmentItem(question, 'canvas');

      const labels = children(child(child(child(item, 'presentation'), 'response_lid'), 'render_choice'), 'response_label');
      expect(labels.map(label => textOf(child(child(label, 'material'), 'mattext')))).toEqual([
        'True',
        'False',
      ]);
      const [scored] = scoringConditions(item);
      expect(textOf(child(child(scored, 'conditionvar'), 'varequal'))).toBe('B');
    });

    it('should render a numerical tolerance as a range', () => {
      const question = buildQuestion({
        type: 'numerical',
        choices: [],
        correct_answer: '3.5',
        tolerance: 0.1,
      });

      const item = toAssessmentItem(question, 'canvas');

      const conditionvar = child(scoringConditions(item)[0], 'conditionvar');
      expect(textOf(child(conditionvar, 'vargte'))).toBe('3.4');
      expect(textOf(child(conditionvar, 'varlte'))).toBe('3.6');
      expect(child(child(child(child(item, 'presentation'), 'response_str'), 'render_fib'), '@_fibtype')).toBe(
        'Decimal'
      );
    });

    it('should match a numerical answer exactly without tolerance', () => {
      const question = buildQuestion({ type: 'numerical', choices: [], correct_answer: '42' });

      const item = toAssessmentItem(question, 'canvas');

      expect(textOf(child(child(scoringConditions(item)[0], 'conditionvar'), 'varequal'))).toBe('42');
    });

    it('should keep every digit of an exact numerical answer', () => {
      const question = buildQuestion({ type: 'numerical', choices: [], correct_answer: '3.14159265358979' });

      const item = toAssessmentItem(question, 'canvas');

      expect(textOf(child(child(scoringConditions(item)[0], 'conditionvar'), 'varequal'))).toBe(
        '3.14159265358979'
      );
    });

    it('should match short answers case-insensitively', () => {
      const question = buildQuestion({ type: 'fill_in_blank', choices: [], correct_answer: 'Paris' });

      const item = toAssessmentItem(question, 'canvas');

      const varequal = child(child(scoringConditions(item)[0], 'conditionvar'), 'varequal');
      expect(textOf(varequal)).toBe('Paris');
      expect(child(varequal, '@_case')).toBe('No');
    });

    it('should leave essays unscored and show feedback as general feedback', () => {
      const question = buildQuestion({
        type: 'essay',
        choices: [],
        correct_answer: '',
        feedback_correct: 'Mention $F = ma$',
      });

      const item = toAssessmentItem(question, 'canvas');

      const conditions = scoringConditions(item);
      expect(conditions).toHaveLength(1);
      expect(child(conditions[0], 'setvar')).toBeUndefined();
      expect(child(child(conditions[0], 'displayfeedback'), '@_linkrefid')).toBe('general_fb');
      const [feedback] = children(item, 'itemfeedback');
      expect(textOf(child(child(child(feedback, 'flow_mat'), 'material'), 'mattext'))).toBe(
        'Mention \\(F = ma\\)'
      );
    });

    it('should show both feedback texts on an unscored item', () => {
      const question = buildQuestion({
        type: 'short_answer',
        choices: [],
        correct_answer: '',
        feedback_correct: 'Good reasoning.',
        feedback_incorrect: 'Revisit chapter 2.',
      });

      const item = toAssessmentItem(question, 'canvas');

      const conditions = scoringConditions(item);
      expect(conditions).toHaveLength(1);
      expect(child(child(conditions[0], 'displayfeedback'), '@_linkrefid')).toBe('general_fb');
      const feedback = children(item, 'itemfeedback');
      expect(feedback).toHaveLength(1);
      expect(textOf(child(child(child(feedback[0], 'flow_mat'), 'material'), 'mattext'))).toBe(
        'Good reasoning.\n\nRevisit chapter 2.'
      );
    });

    it('should link correct and incorrect feedback', () => {
      const question = buildQuestion({ feedback_correct: 'Yes', feedback_incorrect: 'No' });

      const item = toAssessmentItem(question, 'canvas');

      const conditions = scoringConditions(item);
      expect(conditions.map(c => child(child(c, 'displayfeedback'), '@_linkrefid'))).toEqual([
        'correct_fb',
        'incorrect_fb',
      ]);
      expect(children(item, 'itemfeedback').map(f => child(f, '@_ident'))).toEqual([
        'correct_fb',
        'incorrect_fb',
      ]);
    });

    it('should convert block math for the bracketed dialect', () => {
      const question = buildQuestion({ text: 'Evaluate $$\\int_0^1 x\\,dx$$' });

      const item = toAssessmentItem(question, 'bracketed');

      expect(textOf(child(child(child(item, 'presentation'), 'material'), 'mattext'))).toBe(
        'Evaluate \\[\\int_0^1 x\\,dx\\]'
      );
    });

    it('should reject an unknown type', () => {
      const error = thrownBy(() => toAssessmentItem(buildQuestion({ id: 'Z1', type: 'matching' }), 'canvas'));

      expect(error).toBeInstanceOf(PackagingError);
      expect(error).toMatchObject({
        failures: [{ questionId: 'Z1', reason: 'UNSUPPORTED_TYPE', field: 'type' }],
      });
    });

    it('should reject math that cannot be converted and name the field', () => {
      const error = thrownBy(() =>
        toAssessmentItem(buildQuestion({ id: 'Z2', feedback_incorrect: 'Costs $5' }), 'canvas')
      );

      expect(error).toMatchObject({
        failures: [{ questionId: 'Z2', reason: 'NOTATION_ERROR', field: 'feedback_incorrect' }],
      });
    });

    it('should reject a correct answer that is not a choice', () => {
      const error = thrownBy(() =>
        toAssessmentItem(buildQuestion({ id: 'Z3', correct_answer: '7' }), 'canvas')
      );

      expect(error).toMatchObject({
        failures: [{ questionId: 'Z3', reason: 'CORRECT_ANSWER_NOT_IN_CHOICES', field: 'correct_answer' }],
      });
    });
  });

  describe('toAssessmentDocument', () => {
    it('should place items in the root section', () => {
      const items = [toAssessmentItem(buildQuestion(), 'canvas')];

      const document = toAssessmentDocument(items, { ident: 'Quiz', title: 'Quiz' });

      const assessment = child(child(document, 'questestinterop'), 'assessment');
      expect(child(assessment, '@_title')).toBe('Quiz');
      expect(child(child(assessment, 'section'), 'item')).toBe(items);
    });
  });
});
