import { buildQuestion } from '../testing/question-fixtures';

import { MAX_SAMPLE_SPANS, analyzeNotation } from './notation-analysis.service';

describe('notation-analysis', () => {
  it('should count math by field, delimiter and question', () => {
    const questions = [
      buildQuestion({ id: 'Q1', text: 'Find $x$ and $y$ and $z$', choices: ['$1$', '2'], correct_answer: '2' }),
      buildQuestion({ id: 'Q2', text: 'No math', feedback_correct: '$$a$$' }),
      buildQuestion({ id: 'Q3', text: 'Plain text' }),
    ];

    const analysis = analyzeNotation(questions);

    expect(analysis).toEqual({
      totalQuestions: 3,
      questionsWithMath: 2,
      fieldsWithMath: { text: 1, choices: 1, feedback: 1 },
      spans: { inline: 4, block: 1, total: 5 },
      questionsByComplexity: { none: 1, simple: 1, complex: 1 },
      mathPercentage: expect.closeTo(66.67, 2),
      samples: ['$x$', '$y$', '$1$'],
    });
  });

  it('should keep each sample once', () => {
    const questions = [
      buildQuestion({ id: 'Q1', text: 'Let $n$ be odd' }),
      buildQuestion({ id: 'Q2', text: 'Let $n$ be even' }),
    ];

    expect(analyzeNotation(questions).samples).toEqual(['$n$']);
  });

  it('should stop sampling at the sample limit', () => {
    const questions = Array.from({ length: 8 }, (_, i) =>
      buildQuestion({ id: `Q${i}`, text: `$a_${i}$ and $b_${i}$` })
    );

    const analysis = analyzeNotation(questions);

    expect(analysis.samples).toHaveLength(MAX_SAMPLE_SPANS);
    expect(analysis.samples[MAX_SAMPLE_SPANS - 1]).toBe('$b_4$');
    expect(analysis.spans.total).toBe(16);
  });

  it('should report zero for an empty question list', () => {
    const analysis = analyzeNotation([]);

    expect(analysis.totalQuestions).toBe(0);
    expect(analysis.mathPercentage).toBe(0);
    expect(analysis.samples).toEqual([]);
  });
});
