import { z } from 'zod';
import { feedbackOutcomeSchema, timestampSchema } from '../../core/validation.js';
import type { CorrelationResult, ScoreBreakdown, Source, Thread } from '../../core/types.js';

export const scoreBodySchema = z
  .object({
    samples: z.number().int().positive().optional(),
    seed: z.number().int().min(0).optional(),
    now: timestampSchema.optional(),
  })
  .default({});

export const feedbackBodySchema = z.object({
  outcome: feedbackOutcomeSchema,
});

export const assessmentBodySchema = z
  .object({
    now: timestampSchema.optional(),
  })
  .default({});

export const spikesQuerySchema = z.object({
  day: z.string().optional(),
});

export type ScoreBody = z.infer<typeof scoreBodySchema>;

export function toPublicSource(s: Source) {
  return {
    id: s.id,
    name: s.name,
    sourceType: s.sourceType,
    credibilityAlpha: s.credibilityAlpha,
    credibilityBeta: s.credibilityBeta,
    credibility: s.credibilityAlpha / (s.credibilityAlpha + s.credibilityBeta),
  };
}

export function toPublicScore(b: ScoreBreakdown) {
  return { ...b, computedAt: b.computedAt.toISOString() };
}

function toPublicThread(t: Thread) {
  return {
    ...t,
    startTs: t.startTs.toISOString(),
    endTs: t.endTs.toISOString(),
  };
}

export function toPublicCorrelation(r: CorrelationResult) {
  return { ...r, threads: r.threads.map(toPublicThread) };
}
