/**
 * Scores Routes - ocena katalogów logów i historia wyników
 *
 * Endpoints:
 * - POST   /api/scores          - Oceń katalog logów (zapis w historii), 409 gdy ocena
 *                                  tego katalogu już trwa
 * - GET    /api/scores          - Lista ocen
 * - GET    /api/scores/:id      - Szczegóły oceny
 * - DELETE /api/scores/:id      - Usuń ocenę
 * - POST   /api/logs/merge      - Scal logi shardów
 */

import fs from 'fs';
import path from 'path';
import { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { z } from 'zod';
import {
  AlignmentMissingError,
  DuplicateInstanceError,
  ExternalToolError,
  InstanceLogError,
  computeScore,
  logPathFor,
  mergeLogdirs,
  type ComputeScoreOptions,
  type ScorerLogger,
} from '../../simul-evals';
import type { ScoreHistoryStore } from '../services/score-history-store';

export interface ScoresRoutesOptions extends FastifyPluginOptions {
  historyStore: ScoreHistoryStore;
  scoreOptions?: ComputeScoreOptions;
  scorerLogger?: ScorerLogger;
}

// ============================================================================
// BODY SCHEMAS
// ============================================================================

const scoreBodySchema = z.object({
  logdir: z.string().min(1),
  label: z.string().min(1).optional(),
});

const mergeBodySchema = z.object({
  logdirs: z.array(z.string().min(1)).min(1),
  output: z.string().min(1),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).default(50),
});

interface IdParams {
  id: string;
}

/**
 * Kod HTTP dla błędów silnika
 */
function statusForError(error: unknown): number {
  if (error instanceof DuplicateInstanceError) return 409;
  if (error instanceof ExternalToolError || error instanceof AlignmentMissingError) return 422;
  if (error instanceof InstanceLogError) return 422;
  return 500;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function validationMessage(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
}

// ============================================================================
// ROUTES
// ============================================================================

export default async function scoresRoutes(
  fastify: FastifyInstance,
  options: ScoresRoutesOptions
): Promise<void> {
  const { historyStore } = options;
  const scoreOptions: ComputeScoreOptions = { ...options.scoreOptions, logger: options.scorerLogger ?? options.scoreOptions?.logger };
  // Ocena mowy resetuje asr_out/, align/ i mfa/ w katalogu logów
  const scoringInProgress = new Set<string>();

  fastify.post('/scores', async (request, reply) => {
    const body = scoreBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: validationMessage(body.error) });
    }

    const { logdir, label } = body.data;
    if (!fs.existsSync(logPathFor(logdir))) {
      return reply.status(404).send({ error: `No instances.log in ${logdir}` });
    }

    const key = path.resolve(logdir);
    if (scoringInProgress.has(key)) {
      return reply.status(409).send({ error: `Scoring already in progress for ${logdir}` });
    }
    scoringInProgress.add(key);

    try {
      const result = await computeScore(logdir, scoreOptions);
      const run = historyStore.saveRun({ logdir, mode: result.mode, label, report: result.report });
      return reply.status(201).send(run);
    } catch (error) {
      const status = statusForError(error);
      if (status === 500) {
        request.log.error(error);
      }
      return reply.status(status).send({ error: errorMessage(error) });
    } finally {
      scoringInProgress.delete(key);
    }
  });

  fastify.get('/scores', async (request, reply) => {
    const query = listQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: validationMessage(query.error) });
    }
    return historyStore.listRuns(query.data.limit);
  });

  fastify.get<{ Params: IdParams }>('/scores/:id', async (request, reply) => {
    const run = historyStore.getRun(request.params.id);
    if (!run) {
      return reply.status(404).send({ error: 'Score run not found' });
    }
    return run;
  });

  fastify.delete<{ Params: IdParams }>('/scores/:id', async (request, reply) => {
    const deleted = historyStore.deleteRun(request.params.id);
    if (!deleted) {
      return reply.status(404).send({ error: 'Score run not found' });
    }
    return { success: true };
  });

  fastify.post('/logs/merge', async (request, reply) => {
    const body = mergeBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: validationMessage(body.error) });
    }

    const missing = body.data.logdirs.filter(dir => !fs.existsSync(logPathFor(dir)));
    if (missing.length > 0) {
      return reply.status(404).send({ error: `No instances.log in: ${missing.join(', ')}` });
    }

    try {
      const result = mergeLogdirs(body.data.logdirs, body.data.output, scoreOptions.logger);
      return { output: result.output, instances: result.instances };
    } catch (error) {
      return reply.status(statusForError(error)).send({ error: errorMessage(error) });
    }
  });
}
