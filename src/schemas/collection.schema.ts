/**
 * Zod Schemas for Question Collection Files
 *
 * Describe the portable JSON format as authors write it. The schemas are
 * lenient where older files differ (aliases, loose scalar types, nulls);
 * the collection parser folds those differences into question records.
 */

import { z } from 'zod';

/**
 * Scalar a choice or answer may be written as
 */
const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * Per-question metadata; unrecognized keys are kept
 */
export const questionMetadataSchema = z
  .object({
    topic: z.string().optional(),
    subtopic: z.string().optional(),
    difficulty: z.string().optional(),
  })
  .passthrough();

/**
 * A question as written in a collection file
 */
export const questionInputSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    type: z.string(),
    text: z.string().nullish(),
    question_text: z.string().nullish(),
    choices: z.array(z.union([z.string(), z.number()])).nullish(),
    correct_answer: scalarSchema.nullish(),
    tolerance: z.number().nullish(),
    points: z.number().nullish(),
    feedback_correct: z.string().nullish(),
    feedback_incorrect: z.string().nullish(),
    title: z.string().nullish(),

    // Older files put these beside the question instead of in metadata
    topic: z.string().nullish(),
    subtopic: z.string().nullish(),
    difficulty: z.string().nullish(),

    metadata: questionMetadataSchema.nullish(),
  })
  .refine(q => typeof q.text === 'string' || typeof q.question_text === 'string', {
    message: 'Either text or question_text is required',
    path: ['text'],
  });

export type QuestionInput = z.infer<typeof questionInputSchema>;

export const collectionMetadataSchema = z
  .object({
    subject: z.string().optional(),
    format_version: z.string().optional(),
    created_date: z.string().optional(),
  })
  .passthrough();

/**
 * Collection file: `{ questions, metadata }`
 */
export const collectionInputSchema = z.object({
  questions: z.array(questionInputSchema),
  metadata: collectionMetadataSchema.nullish(),
});

export type CollectionInput = z.infer<typeof collectionInputSchema>;
