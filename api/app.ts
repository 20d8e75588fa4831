/**
 * Scoring API - budowa instancji Fastify (bez nasłuchu)
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import scoresRoutes from './routes/scores';
import type { ScoreHistoryStore } from './services/score-history-store';
import type { ComputeScoreOptions, ScorerLogger } from '../simul-evals';

export interface ScoringApiOptions {
  historyStore: ScoreHistoryStore;
  scoreOptions?: ComputeScoreOptions;
  scorerLogger?: ScorerLogger;
  logger?: FastifyServerOptions['logger'];
}

export async function buildScoringApi(options: ScoringApiOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? false });

  await fastify.register(cors, {
    origin: true,
    credentials: true,
  });

  await fastify.register(scoresRoutes, {
    prefix: '/api',
    historyStore: options.historyStore,
    scoreOptions: options.scoreOptions,
    scorerLogger: options.scorerLogger,
  });

  fastify.get('/health', async () => ({ status: 'ok', timestamp: new Date().toISOString() }));

  fastify.get('/', async () => ({
    name: 'Simultaneous Translation Scoring API',
    version: '1.0.0',
    endpoints: {
      scores: '/api/scores',
      score: '/api/scores/:id',
      merge: '/api/logs/merge',
      health: '/health',
    },
  }));

  return fastify;
}
