import { z } from 'zod';
import { MessageKey, describeMessage } from '../errors/messageKeys.js';

/**
 * Input Validation Framework
 * Schemas for every catalog request. Messages come from the message table so
 * field errors read the same wherever they are raised.
 */

const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

const text = (key: MessageKey) => describeMessage(key);

const requiredString = (key: MessageKey) =>
    z.string({ required_error: text(key), invalid_type_error: text(key) });

export const IdSchema = requiredString(MessageKey.IdInvalid).uuid(text(MessageKey.IdInvalid));

export const SlugSchema = requiredString(MessageKey.SlugCannotBeEmpty)
    .trim()
    .min(1, text(MessageKey.SlugCannotBeEmpty))
    .max(120, text(MessageKey.SlugTooLong))
    .regex(SLUG_PATTERN, text(MessageKey.SlugInvalidFormat));

const PatternFields = z.object({
    name: requiredString(MessageKey.NameCannotBeEmpty)
        .trim()
        .min(1, text(MessageKey.NameCannotBeEmpty))
        .max(120, text(MessageKey.NameTooLong)),
    slug: SlugSchema,
    summary: z.string().max(500, text(MessageKey.SummaryTooLong)).default(''),
    problem: z.string().max(4000, text(MessageKey.ProblemTooLong)).default(''),
    solution: z.string().max(4000, text(MessageKey.SolutionTooLong)).default(''),
    categoryId: requiredString(MessageKey.CategoryIdInvalid).uuid(text(MessageKey.CategoryIdInvalid)),
});

export const CreatePatternSchema = PatternFields;

export const UpdatePatternSchema = PatternFields.extend({
    id: IdSchema,
});

export const GetPatternSchema = z.object({
    slug: SlugSchema,
});

export const DeletePatternSchema = z.object({
    id: IdSchema,
});

export type CreatePatternInput = z.infer<typeof CreatePatternSchema>;
export type UpdatePatternInput = z.infer<typeof UpdatePatternSchema>;
