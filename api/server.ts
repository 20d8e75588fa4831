/**
 * API Server - Fastify server dla oceny tłumaczenia symultanicznego
 */

import { buildScoringApi } from './app';
import { loadScoringConfig, createSpeechTools } from './config/scoring';
import { ScoreHistoryStore } from './services/score-history-store';

async function start(): Promise<void> {
  const config = loadScoringConfig();

  console.log(`[API] Opening score history at ${config.SCORE_HISTORY_DB}...`);
  const historyStore = new ScoreHistoryStore(config.SCORE_HISTORY_DB);

  const fastify = await buildScoringApi({
    historyStore,
    scoreOptions: createSpeechTools(config),
    logger: {
      level: 'info',
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    },
  });

  // Obsłuż sygnały zamknięcia
  const shutdown = async (signal: string): Promise<void> => {
    console.log(`\n[API] Received ${signal}, shutting down...`);

    await fastify.close();
    historyStore.close();

    console.log('[API] Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => (): void => {
    shutdown(signal).catch((err) => {
      console.error('[API] Shutdown failed:', err);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal('SIGINT'));
  process.on('SIGTERM', onSignal('SIGTERM'));

  try {
    await fastify.listen({ port: config.SCORE_API_PORT, host: config.SCORE_API_HOST });
    console.log(`\n[API] Server running at http://${config.SCORE_API_HOST}:${config.SCORE_API_PORT}`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

start().catch((err) => {
  console.error('[API] Fatal error:', err);
  process.exit(1);
});
