import { buildQuestion } from '../testing/question-fixtures';

import { tabularColumns, toTabular } from './tabular-transformer';

describe('tabular-transformer', () => {
  describe('tabularColumns', () => {
    it('should number choice columns between the leading and trailing columns', () => {
      expect(tabularColumns(2)).toEqual([
        'id',
        'type',
        'text',
        'points',
        'topic',
        'difficulty',
        'choice_1',
        'choice_2',
        'feedback_correct',
        'feedback_incorrect',
        'correct_answer',
        'tolerance',
        'subtopic',
      ]);
    });
  });

  describe('toTabular', () => {
    it('should write one row per question with converted math', () => {
      const question = buildQuestion({
        text: 'Pick $x$',
        choices: ['$1$', '2'],
        correct_answer: '$1$',
        metadata: { topic: 'Sets', difficulty: 'Easy' },
      });

      const table = toTabular([question], { dialect: 'canvas', minChoiceColumns: 2 });

      expect(table.rowCount).toBe(1);
      expect(table.failures).toEqual([]);
      expect(table.csv.split('\n')).toEqual([
        'id,type,text,points,topic,difficulty,choice_1,choice_2,feedback_correct,feedback_incorrect,correct_answer,tolerance,subtopic',
        'Q1,multiple_choice,Pick \\(x\\),1,Sets,Easy,\\(1\\),2,,,\\(1\\),,',
      ]);
    });

    it('should widen the table to the question with the most choices', () => {
      const table = toTabular(
        [buildQuestion({ choices: ['a', 'b', 'c', 'd', 'e'], correct_answer: 'e' })],
        { dialect: 'canvas', minChoiceColumns: 4 }
      );

      expect(table.columns.filter(column => column.startsWith('choice_'))).toHaveLength(5);
    });

    it('should keep block math in the bracketed dialect', () => {
      const question = buildQuestion({
        id: 'N1',
        type: 'numerical',
        text: 'Evaluate $$2^3$$',
        choices: [],
        correct_answer: '8',
        tolerance: 0.5,
        metadata: { subtopic: 'Powers' },
      });

      const table = toTabular([question], { dialect: 'bracketed', minChoiceColumns: 0 });

      expect(table.csv.split('\n')[1]).toBe('N1,numerical,Evaluate \\[2^3\\],1,,,,,8,0.5,Powers');
    });

    it('should quote cells that hold commas', () => {
      const question = buildQuestion({
        id: 'S1',
        type: 'short_answer',
        text: 'List two primes, smallest first',
        choices: [],
        correct_answer: '2, 3',
      });

      const table = toTabular([question], { dialect: 'canvas', minChoiceColumns: 0 });

      expect(table.csv.split('\n')[1]).toBe('S1,short_answer,"List two primes, smallest first",1,,,,,"2, 3",,');
    });

    it('should leave out questions that cannot be rendered and report them', () => {
      const questions = [
        buildQuestion({ id: 'OK' }),
        buildQuestion({ id: 'T1', type: 'matching' }),
        buildQuestion({ id: 'M1', correct_answer: '9' }),
        buildQuestion({ id: 'N1', type: 'numerical', choices: [], correct_answer: 'four' }),
        buildQuestion({ id: 'X1', choices: ['$1', '2'], correct_answer: '2' }),
      ];

      const table = toTabular(questions, { dialect: 'canvas', minChoiceColumns: 4 });

      expect(table.rowCount).toBe(1);
      expect(table.csv.split('\n')).toHaveLength(2);
      expect(table.failures).toEqual([
        { questionId: 'T1', reason: 'UNSUPPORTED_TYPE', field: 'type' },
        { questionId: 'M1', reason: 'CORRECT_ANSWER_NOT_IN_CHOICES', field: 'correct_answer' },
        { questionId: 'N1', reason: 'NON_NUMERIC_ANSWER', field: 'correct_answer' },
        { questionId: 'X1', reason: 'NOTATION_ERROR', field: 'choices[0]' },
      ]);
    });
  });
});
