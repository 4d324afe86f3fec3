import { z } from 'zod';
import { parseTimestamp } from '../utils/time.js';
import { ValidationError } from './errors.js';
import { NON_ACTOR_ENTITY_TYPES, type EntityType, type TypedEntity } from './types.js';

export const entityTypeSchema = z.enum([
  'actor_handle',
  'poi',
  'location',
  'cve',
  'md5',
  'sha1',
  'sha256',
  ...NON_ACTOR_ENTITY_TYPES,
]);

const objectEntitySchema = z.object({
  type: entityTypeSchema,
  value: z.string().trim().min(1),
});

// Accepts `{ type, value }` or the compact `type:value` form
export const typedEntitySchema = z.union([
  objectEntitySchema,
  z
    .string()
    .trim()
    .transform((raw, ctx): TypedEntity => {
      const idx = raw.indexOf(':');
      const parsed = objectEntitySchema.safeParse({
        type: idx > 0 ? raw.slice(0, idx) : raw,
        value: idx > 0 ? raw.slice(idx + 1) : '',
      });
      if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `malformed entity "${raw}"` });
        return z.NEVER;
      }
      return parsed.data;
    }),
]);

export const timestampSchema = z.union([z.string(), z.date()]).transform((value, ctx) => {
  const parsed = parseTimestamp(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `malformed timestamp "${String(value)}"` });
    return z.NEVER;
  }
  return parsed;
});

export const alertContextSchema = z
  .object({
    proximity: z
      .array(
        z.object({
          distanceMiles: z.number().min(0),
          withinRadius: z.boolean().default(false),
        }),
      )
      .default([]),
    upcomingEventDistancesMiles: z.array(z.number().min(0)).default([]),
  })
  .default({});

export const newAlertSchema = z.object({
  id: z.string().min(1).optional(),
  title: z.string(),
  content: z.string().default(''),
  url: z.string().url().optional().nullable(),
  sourceId: z.string().min(1),
  matchedTerm: z.string().default(''),
  publishedAt: timestampSchema,
  entities: z.array(typedEntitySchema).default([]),
  context: alertContextSchema,
});
export type NewAlert = z.infer<typeof newAlertSchema>;

export const keywordInputSchema = z.object({
  term: z.string().trim().min(1),
  weight: z.number().min(0.1).max(5),
  category: z.string().trim().min(1).default('general'),
  weightSigma: z.number().positive().optional().nullable(),
});
export type KeywordInput = z.infer<typeof keywordInputSchema>;

export const sourceInputSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().trim().min(1),
  sourceType: z.string().trim().min(1),
  credibilityAlpha: z.number().positive().optional(),
  credibilityBeta: z.number().positive().optional(),
});
export type SourceInput = z.infer<typeof sourceInputSchema>;

export const poiInputSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().trim().min(1),
  org: z.string().trim().min(1).optional().nullable(),
  role: z.string().trim().min(1).optional().nullable(),
  sensitivity: z.number().int().min(1).max(5).default(3),
  aliases: z.array(z.string().trim().min(1)).default([]),
});
export type PoiInput = z.infer<typeof poiInputSchema>;

export const feedbackOutcomeSchema = z.enum(['TruePositive', 'FalsePositive']);

export const correlationRequestSchema = z
  .object({
    windowStart: timestampSchema,
    windowEnd: timestampSchema,
    minClusterSize: z.number().int().min(2).optional(),
    edgeThreshold: z.number().min(0).max(1).optional(),
  })
  .refine((r) => r.windowEnd >= r.windowStart, {
    message: 'windowEnd must not be before windowStart',
    path: ['windowEnd'],
  });
export type CorrelationRequest = z.infer<typeof correlationRequestSchema>;

export const intervalRequestSchema = z.object({
  samples: z.number().int().positive().optional(),
  seed: z.number().int().min(0).optional(),
});

export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, context: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw ValidationError.fromZod(context, parsed.error);
  return parsed.data;
}

export function isEntityType(value: string): value is EntityType {
  return entityTypeSchema.safeParse(value).success;
}
