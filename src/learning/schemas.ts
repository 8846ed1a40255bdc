import { z } from 'zod';
import { ValidationError } from '../core/errors.js';

const requiredText = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} is required`);

const scoreSchema = (field: string) =>
  z
    .number({ required_error: `${field} is required`, invalid_type_error: `${field} must be a number` })
    .finite(`${field} must be a finite number`)
    .min(0, `${field} must be between 0 and 10`)
    .max(10, `${field} must be between 0 and 10`);

export const digestFeedbackSchema = z.object({
  digestId: requiredText('digestId'),
  rating: scoreSchema('rating'),
  comment: z.string().default(''),
});

export const articleFeedbackSchema = z
  .object({
    articleId: requiredText('articleId'),
    headline: requiredText('headline'),
    source: requiredText('source'),
    contentType: requiredText('contentType'),
    rating: scoreSchema('rating').optional(),
    irrelevant: z.boolean().optional(),
    comment: z.string().default(''),
  })
  .superRefine((value, ctx) => {
    const rated = value.rating !== undefined;
    const irrelevant = value.irrelevant === true;
    if (rated && irrelevant) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['irrelevant'],
        message: 'give either a rating or irrelevant, not both',
      });
    } else if (!rated && !irrelevant) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['rating'],
        message: 'a rating or irrelevant is required',
      });
    }
  });

export const falsePositiveSchema = z.object({
  headline: requiredText('headline'),
  reason: z.string().default(''),
});

export const missedSignalSchema = z.object({
  event: requiredText('event'),
  details: z.string().default(''),
});

export const economicSnapshotSchema = z.object({
  vix: z.number().finite().optional(),
  goldDelta: z.number().finite().optional(),
  usdIndexDelta: z.number().finite().optional(),
  btcTrend: z.number().finite().optional(),
});

export const predictionInputSchema = z.object({
  headline: requiredText('headline'),
  source: requiredText('source'),
  contentType: requiredText('contentType'),
  economic: economicSnapshotSchema.optional(),
  fallbackScore: scoreSchema('fallbackScore').optional(),
});

export const digestEntryInputSchema = z.object({
  articleId: requiredText('articleId').optional(),
  headline: requiredText('headline'),
  source: requiredText('source'),
  contentType: requiredText('contentType'),
  predictionId: requiredText('predictionId').optional(),
  predictedScore: scoreSchema('predictedScore').optional(),
});

export const digestRegistrationSchema = z.object({
  digestId: requiredText('digestId'),
  entries: z.array(digestEntryInputSchema).min(1, 'a digest needs at least one headline'),
});

export type DigestFeedbackInput = z.input<typeof digestFeedbackSchema>;
export type ArticleFeedbackInput = z.input<typeof articleFeedbackSchema>;
export type FalsePositiveInput = z.input<typeof falsePositiveSchema>;
export type MissedSignalInput = z.input<typeof missedSignalSchema>;
export type PredictionInput = z.input<typeof predictionInputSchema>;
export type DigestEntryInput = z.input<typeof digestEntryInputSchema>;
export type DigestRegistration = z.input<typeof digestRegistrationSchema>;

/**
 * Parse a value or throw ValidationError naming the first failing field.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }

  const [issue] = parsed.error.issues;
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'input';
  throw new ValidationError(field, `${field}: ${issue?.message ?? 'invalid input'}`);
}
