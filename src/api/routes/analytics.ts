import type { FastifyInstance } from 'fastify';
import { parseOrThrow } from '../../core/validation.js';
import type { AnalyticsService } from '../../services/analyticsService.js';
import {
  assessmentBodySchema,
  feedbackBodySchema,
  scoreBodySchema,
  spikesQuerySchema,
  toPublicCorrelation,
  toPublicScore,
  toPublicSource,
} from '../schemas/analyticsSchemas.js';

interface IdParams {
  id: string;
}

interface SubjectParams {
  subject: string;
}

export function analyticsRoutes(service: AnalyticsService) {
  return async (app: FastifyInstance) => {
    app.post('/v1/sources', async (req, reply) => {
      const source = service.registerSource(req.body);
      return reply.status(201).send({ source: toPublicSource(source) });
    });

    app.post('/v1/keywords', async (req, reply) => {
      const keyword = service.upsertKeyword(req.body);
      return reply.status(200).send({ keyword });
    });

    app.post('/v1/pois', async (req, reply) => {
      const poi = service.registerPoi(req.body);
      return reply.status(201).send({ poi });
    });

    app.post('/v1/alerts', async (req, reply) => {
      const { alert, decision, poiHits, score } = await service.ingestAlert(req.body);
      return reply.status(201).send({
        alert: { id: alert.id, isDuplicateOf: alert.isDuplicateOf ?? null, entities: alert.entities },
        dedup: decision,
        poiHits,
        score: score ? toPublicScore(score) : null,
      });
    });

    app.post<{ Params: IdParams }>('/v1/alerts/:id/score', async (req) => {
      const body = parseOrThrow(scoreBodySchema, req.body ?? {}, 'score request');
      const { breakdown, interval } = await service.scoreAlert(req.params.id, body);
      return { score: toPublicScore(breakdown), interval: interval ?? null };
    });

    app.post<{ Params: IdParams }>('/v1/alerts/:id/feedback', async (req) => {
      const body = parseOrThrow(feedbackBodySchema, req.body, 'feedback');
      const source = await service.classifyFeedback(req.params.id, body.outcome);
      return { source: toPublicSource(source) };
    });

    app.post('/v1/correlation/run', async (req) => {
      const result = await service.runCorrelation(req.body);
      return toPublicCorrelation(result);
    });

    app.get('/v1/keywords/spikes', async (req) => {
      const { day } = parseOrThrow(spikesQuerySchema, req.query, 'spikes query');
      return { spikes: service.detectSpikes(day) };
    });

    app.post<{ Params: SubjectParams }>('/v1/subjects/:subject/assessment', async (req) => {
      const body = parseOrThrow(assessmentBodySchema, req.body ?? {}, 'assessment request');
      const assessment = service.assessSubject(req.params.subject, body.now);
      return {
        assessment: {
          ...assessment,
          windowStart: assessment.windowStart.toISOString(),
          windowEnd: assessment.windowEnd.toISOString(),
        },
      };
    });
  };
}
