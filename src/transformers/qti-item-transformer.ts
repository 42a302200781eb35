/**
 * QTI Item Transformer
 *
 * Renders questions as QTI 1.2 assessment items in the flavour Canvas
 * imports. Each variant has its own response template:
 *
 * - multiple_choice: response_lid + render_choice, one varequal marker
 * - true_false:      same template with a fixed True/False pair
 * - numerical:       render_fib Decimal, tolerance range or exact match
 * - fill_in_blank,
 *   short_answer:    render_fib String, case-insensitive exact match
 * - essay:           render_fib String, no scoring condition
 *
 * Prose is converted to the target math dialect here; ids, types and
 * metadata pass through untouched.
 */

import { NotationError, PackagingError } from '../models/errors';
import { PackagingFailure } from '../models/package.model';
import {
  Question,
  QuestionRecord,
  QuestionType,
  TRUE_FALSE_ANSWERS,
  isQuestion,
  toleranceOf,
} from '../models/question.model';
import { XML_DECLARATION, XmlElement, textElement } from '../utils/xml';

import { findAnswerFailure } from './answer-check';
import { TargetDialect, transformQuestionNotation } from './notation-transformer';

/** Canvas names for each question type */
export const QTI_QUESTION_TYPES: Record<QuestionType, string> = {
  multiple_choice: 'multiple_choice_question',
  true_false: 'true_false_question',
  numerical: 'numerical_question',
  fill_in_blank: 'short_answer_question',
  short_answer: 'short_answer_question',
  essay: 'essay_question',
};

export const QTI_NAMESPACE = 'http://www.imsglobal.org/xsd/ims_qtiasiv1p2';

export const RESPONSE_IDENT = 'response1';
export const CORRECT_FEEDBACK_IDENT = 'correct_fb';
export const INCORRECT_FEEDBACK_IDENT = 'incorrect_fb';
export const GENERAL_FEEDBACK_IDENT = 'general_fb';

const BOUND_PRECISION = 12;

/**
 * Label identifier for the choice at `index`: A..Z, then AA, AB, ...
 */
export function choiceIdent(index: number): string {
  let ident = '';
  let n = index + 1;
  while (n > 0) {
    const remainder = (n - 1) % 26;
    ident = String.fromCharCode(65 + remainder) + ident;
    n = Math.floor((n - 1) / 26);
  }
  return ident;
}

/**
 * Decimal text of a computed tolerance bound, without float noise.
 * Authored answers are written as given, never through this.
 * @example
 * formatBound(0.1 + 0.2) // returns '0.3'
 */
export function formatBound(value: number): string {
  return String(Number(value.toPrecision(BOUND_PRECISION)));
}

function failure(question: QuestionRecord, reason: PackagingFailure['reason'], field?: string): PackagingError {
  const item: PackagingFailure = { questionId: question.id, reason };
  if (field !== undefined) {
    item.field = field;
  }
  return new PackagingError(`Cannot render question '${question.id}': ${reason}`, [item]);
}

function metadataField(label: string, entry: string | number): XmlElement {
  return { fieldlabel: label, fieldentry: entry };
}

function itemMetadata(question: Question): XmlElement {
  const fields: XmlElement[] = [
    metadataField('question_type', QTI_QUESTION_TYPES[question.type]),
    metadataField('points_possible', question.points),
  ];
  for (const key of ['topic', 'subtopic', 'difficulty'] as const) {
    const value = question.metadata[key];
    if (typeof value === 'string' && value.trim() !== '') {
      fields.push(metadataField(key, value));
    }
  }
  return { qtimetadata: { qtimetadatafield: fields } };
}

function material(text: string): XmlElement {
  return { mattext: textElement(text, { texttype: 'text/html' }) };
}

function choiceResponse(labels: readonly string[]): XmlElement {
  return {
    '@_ident': RESPONSE_IDENT,
    '@_rcardinality': 'Single',
    render_choice: {
      '@_shuffle': 'No',
      response_label: labels.map((label, index) => ({
        '@_ident': choiceIdent(index),
        material: material(label),
      })),
    },
  };
}

function fibResponse(fibtype: 'Decimal' | 'String'): XmlElement {
  return {
    '@_ident': RESPONSE_IDENT,
    '@_rcardinality': 'Single',
    render_fib: { '@_fibtype': fibtype },
  };
}

function responseValue(name: string, value: string, attributes: Record<string, string> = {}): XmlElement {
  return { [name]: textElement(value, { respident: RESPONSE_IDENT, ...attributes }) };
}

function numericalCondition(answerText: string, tolerance: number): XmlElement {
  const answer = Number(answerText);
  if (tolerance === 0) {
    return responseValue('varequal', String(answer));
  }
  return {
    ...responseValue('vargte', formatBound(answer - tolerance)),
    ...responseValue('varlte', formatBound(answer + tolerance)),
  };
}

interface ItemTemplate {
  /** Response element name and body inside <presentation> */
  response: { name: string; body: XmlElement };

  /** Condition that awards the points, when the type is auto-scored */
  condition?: XmlElement;
}

/**
 * Response and scoring template for a question.
 * The correct choice is found in the question as authored, before any
 * notation rewrite; labels come from the rewritten choices at the same index.
 */
function itemTemplate(question: Question, renderedChoices: string[]): ItemTemplate {
  switch (question.type) {
    case 'multiple_choice': {
      const index = question.choices.indexOf(question.correct_answer);
      return {
        response: { name: 'response_lid', body: choiceResponse(renderedChoices) },
        condition: responseValue('varequal', choiceIdent(index)),
      };
    }
    case 'true_false': {
      const index = TRUE_FALSE_ANSWERS.indexOf(question.correct_answer);
      return {
        response: { name: 'response_lid', body: choiceResponse(TRUE_FALSE_ANSWERS) },
        condition: responseValue('varequal', choiceIdent(index)),
      };
    }
    case 'numerical':
      return {
        response: { name: 'response_str', body: fibResponse('Decimal') },
        condition: numericalCondition(question.correct_answer, toleranceOf(question)),
      };
    case 'fill_in_blank':
    case 'short_answer': {
      const response = { name: 'response_str', body: fibResponse('String') };
      if (question.correct_answer.trim() === '') {
        return { response };
      }
      return {
        response,
        condition: responseValue('varequal', question.correct_answer, { case: 'No' }),
      };
    }
    case 'essay':
      return { response: { name: 'response_str', body: fibResponse('String') } };
  }
}

function displayFeedback(ident: string): XmlElement {
  return { '@_feedbacktype': 'Response', '@_linkrefid': ident };
}

function itemFeedback(ident: string, text: string): XmlElement {
  return {
    '@_ident': ident,
    flow_mat: { material: material(text) },
  };
}

/**
 * Feedback for an item with no scoring condition. Nothing can be judged
 * right or wrong, so both texts are shown, correct first.
 */
function generalFeedbackText(question: Question): string | undefined {
  const parts = [question.feedback_correct, question.feedback_incorrect].filter(
    (text): text is string => text !== undefined
  );
  return parts.length > 0 ? parts.join('\n\n') : undefined;
}

function resprocessing(question: Question, condition: XmlElement | undefined): XmlElement {
  const conditions: XmlElement[] = [];

  if (condition !== undefined) {
    const scored: XmlElement = {
      '@_continue': 'No',
      conditionvar: condition,
      setvar: textElement(question.points, { action: 'Set', varname: 'SCORE' }),
    };
    if (question.feedback_correct !== undefined) {
      scored.displayfeedback = displayFeedback(CORRECT_FEEDBACK_IDENT);
    }
    conditions.push(scored);

    if (question.feedback_incorrect !== undefined) {
      conditions.push({
        '@_continue': 'Yes',
        conditionvar: { other: '' },
        displayfeedback: displayFeedback(INCORRECT_FEEDBACK_IDENT),
      });
    }
  } else if (generalFeedbackText(question) !== undefined) {
    conditions.push({
      '@_continue': 'Yes',
      conditionvar: { other: '' },
      displayfeedback: displayFeedback(GENERAL_FEEDBACK_IDENT),
    });
  }

  const processing: XmlElement = {
    outcomes: {
      decvar: {
        '@_maxvalue': question.points,
        '@_minvalue': 0,
        '@_varname': 'SCORE',
        '@_vartype': 'Decimal',
      },
    },
  };
  if (conditions.length > 0) {
    processing.respcondition = conditions;
  }
  return processing;
}

function feedbackElements(question: Question, scored: boolean): XmlElement[] {
  const feedback: XmlElement[] = [];
  if (!scored) {
    const general = generalFeedbackText(question);
    if (general !== undefined) {
      feedback.push(itemFeedback(GENERAL_FEEDBACK_IDENT, general));
    }
    return feedback;
  }
  if (question.feedback_correct !== undefined) {
    feedback.push(itemFeedback(CORRECT_FEEDBACK_IDENT, question.feedback_correct));
  }
  if (question.feedback_incorrect !== undefined) {
    feedback.push(itemFeedback(INCORRECT_FEEDBACK_IDENT, question.feedback_incorrect));
  }
  return feedback;
}

/**
 * Render one question as an `<item>` element.
 *
 * @throws PackagingError with a single failure when the question cannot be
 * expressed in QTI
 */
export function toAssessmentItem(record: QuestionRecord, dialect: TargetDialect): XmlElement {
  if (!isQuestion(record)) {
    throw failure(record, 'UNSUPPORTED_TYPE', 'type');
  }

  const answerProblem = findAnswerFailure(record);
  if (answerProblem !== undefined) {
    throw new PackagingError(`Cannot render question '${record.id}': ${answerProblem.reason}`, [answerProblem]);
  }

  let question: Question;
  try {
    question = transformQuestionNotation(record, dialect);
  } catch (error) {
    if (error instanceof NotationError) {
      throw failure(record, 'NOTATION_ERROR', error.field);
    }
    throw error;
  }

  const template = itemTemplate(record, question.choices);

  const presentation: XmlElement = {
    material: material(question.text),
    [template.response.name]: template.response.body,
  };

  const item: XmlElement = {
    '@_ident': question.id,
    '@_title': question.title ?? question.id,
    itemmetadata: itemMetadata(question),
    presentation,
    resprocessing: resprocessing(question, template.condition),
  };

  const feedback = feedbackElements(question, template.condition !== undefined);
  if (feedback.length > 0) {
    item.itemfeedback = feedback;
  }
  return item;
}

export interface AssessmentHeader {
  /** Package name, used as the assessment ident */
  ident: string;
  title: string;
}

/**
 * Wrap rendered items into the assessment document
 */
export function toAssessmentDocument(items: XmlElement[], header: AssessmentHeader): XmlElement {
  return {
    '?xml': XML_DECLARATION,
    questestinterop: {
      '@_xmlns': QTI_NAMESPACE,
      assessment: {
        '@_ident': header.ident,
        '@_title': header.title,
        qtimetadata: {
          qtimetadatafield: [metadataField('cc_maxattempts', 1)],
        },
        section: {
          '@_ident': 'root_section',
          item: items,
        },
      },
    },
  };
}
