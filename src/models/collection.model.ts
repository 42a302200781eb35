/**
 * Collection Model
 *
 * An ordered list of questions loaded from one source, plus its metadata.
 */

import { Question, QuestionRecord } from './question.model';

/** Format version written into merged collections */
export const CURRENT_FORMAT_VERSION = '1.0';

export interface CollectionMetadata {
  subject?: string;
  format_version?: string;
  created_date?: string;
  [key: string]: unknown;
}

export interface Collection<Q extends QuestionRecord = Question> {
  questions: Q[];
  metadata: CollectionMetadata;
}

/**
 * Collection as read from disk, before validation
 */
export type RawCollection = Collection<QuestionRecord>;
