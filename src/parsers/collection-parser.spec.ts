import * as path from 'path';

import { StructuralError } from '../models/errors';

import { parseCollection, readCollectionFile, toQuestionRecord } from './collection-parser';

function thrownBy(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('collection-parser', () => {
  describe('parseCollection', () => {
    it('should read a collection object', () => {
      const collection = parseCollection({
        questions: [
          {
            id: 'Q1',
            type: 'short_answer',
            text: 'Name the largest planet.',
            correct_answer: 'Jupiter',
            points: 2,
            feedback_correct: 'Right.',
          },
        ],
        metadata: { subject: 'Astronomy', owner: 'dept' },
      });

      expect(collection).toEqual({
        questions: [
          {
            id: 'Q1',
            type: 'short_answer',
            text: 'Name the largest planet.',
            choices: [],
            correct_answer: 'Jupiter',
            points: 2,
            feedback_correct: 'Right.',
            metadata: {},
          },
        ],
        metadata: { subject: 'Astronomy', owner: 'dept' },
      });
    });

    it('should read a bare array of questions', () => {
      const collection = parseCollection('[{"id":"Q1","type":"essay","text":"Discuss."}]');

      expect(collection.metadata).toEqual({});
      expect(collection.questions.map(q => q.id)).toEqual(['Q1']);
    });

    it('should default missing points to 1 and read nulls as absent', () => {
      const [question] = parseCollection([
        { id: 'Q1', type: 'numerical', text: 'Pi to two places?', correct_answer: '3.14', tolerance: null, points: null },
      ]).questions;

      expect(question.points).toBe(1);
      expect(question).not.toHaveProperty('tolerance');
    });
  });

  describe('toQuestionRecord', () => {
    it('should read question_text when text is absent', () => {
      const record = toQuestionRecord({ id: 'Q1', type: 'essay', question_text: 'Explain.' });

      expect(record.text).toBe('Explain.');
    });

    it('should turn numeric ids and answers into strings', () => {
      const record = toQuestionRecord({ id: 7, type: 'numerical', text: 'Half of 7?', correct_answer: 3.5 });

      expect(record.id).toBe('7');
      expect(record.correct_answer).toBe('3.5');
    });

    it('should spell boolean answers as True and False', () => {
      expect(toQuestionRecord({ id: 'T1', type: 'true_false', text: 'Water is wet.', correct_answer: true }).correct_answer).toBe('True');
      expect(toQuestionRecord({ id: 'T2', type: 'true_false', text: 'Fire is cold.', correct_answer: false }).correct_answer).toBe('False');
    });

    it('should fold top-level topic fields into metadata without overriding it', () => {
      const record = toQuestionRecord({
        id: 'Q1',
        type: 'essay',
        text: 'Discuss.',
        topic: 'Old topic',
        difficulty: 'Hard',
        metadata: { topic: 'New topic', reviewer: 'ab' },
      });

      expect(record.metadata).toEqual({ topic: 'New topic', difficulty: 'Hard', reviewer: 'ab' });
    });
  });

  describe('errors', () => {
    it('should reject text that is not JSON', () => {
      const error = thrownBy(() => parseCollection('{ questions: ', 'unit.json'));

      expect(error).toBeInstanceOf(StructuralError);
      expect(error).toMatchObject({ message: 'Invalid JSON in unit.json', source: 'unit.json' });
    });

    it('should reject a value without questions', () => {
      const error = thrownBy(() => parseCollection({ metadata: {} }));

      expect(error).toBeInstanceOf(StructuralError);
      expect(error).toMatchObject({ message: 'Not a question collection', issues: ['questions: Required'] });
    });

    it('should name the question that has no text', () => {
      const error = thrownBy(() => parseCollection([{ id: 'Q1', type: 'essay' }]));

      expect(error).toMatchObject({
        issues: ['questions.0.text: Either text or question_text is required'],
      });
    });
  });

  describe('readCollectionFile', () => {
    it('should read a collection file', () => {
      const collection = readCollectionFile(path.join(__dirname, '../testing/fixtures/algebra-unit.json'));

      expect(collection.metadata.subject).toBe('Algebra');
      expect(collection.questions.map(q => q.id)).toEqual(['ALG1', 'ALG2']);
      expect(collection.questions[1]).toMatchObject({
        text: 'What is $\\sqrt{16}$?',
        correct_answer: '4',
        tolerance: 0,
        points: 1,
        metadata: { topic: 'Roots' },
      });
    });

    it('should report a file that cannot be read', () => {
      const error = thrownBy(() => readCollectionFile('/no/such/collection.json'));

      expect(error).toBeInstanceOf(StructuralError);
      expect(error).toMatchObject({
        message: 'Cannot read /no/such/collection.json',
        source: '/no/such/collection.json',
      });
    });
  });
});
