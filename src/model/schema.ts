import { z } from 'zod';
import { ValidationError } from '../shared/errors.js';
import { CARD_STATUSES, ORIGIN_KINDS, SOURCE_STATUSES } from './types.js';

const nonBlank = z.string().trim().min(1);
const optionalText = z.string().trim().min(1).nullish();

export const CreateSourceSchema = z.object({
  text: nonBlank,
  origin_kind: z.enum(ORIGIN_KINDS).default('manual_entry'),
  origin_url: optionalText,
  origin_title: optionalText,
  external_key: optionalText,
  highlight_color: optionalText,
  tags: z.array(z.string()).default([]),
});
export type CreateSourceInput = z.input<typeof CreateSourceSchema>;

export const UpdateSourceSchema = z.object({
  text: nonBlank.optional(),
  origin_url: z.string().trim().nullish(),
  origin_title: z.string().trim().nullish(),
  tags: z.array(z.string()).optional(),
});
export type UpdateSourceInput = z.input<typeof UpdateSourceSchema>;

export const CardDraftSchema = z.object({
  front: nonBlank,
  back: nonBlank,
  hint: optionalText,
  tags: z.array(z.string()).default([]),
});

export const CreateCardSchema = CardDraftSchema.extend({
  source_id: z.string().min(1).nullish(),
  activate: z.boolean().default(true),
});
export type CreateCardInput = z.input<typeof CreateCardSchema>;

export const UpdateCardSchema = z.object({
  front: nonBlank.optional(),
  back: nonBlank.optional(),
  hint: z.string().trim().nullish(),
  tags: z.array(z.string()).optional(),
});
export type UpdateCardInput = z.input<typeof UpdateCardSchema>;

export const TagCreateSchema = z.object({
  name: nonBlank,
  color: optionalText,
});

/** Numeric command-line options such as --limit and --port arrive as strings. */
export const PositiveIntSchema = z.coerce.number().int().min(1);

export const SourceStatusSchema = z.enum(SOURCE_STATUSES);
export const CardStatusSchema = z.enum(CARD_STATUSES);

/**
 * Validate untrusted input against a schema, throwing ValidationError with
 * the flattened field errors on failure.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, {
      errors: result.error.flatten().fieldErrors,
    });
  }
  return result.data;
}
