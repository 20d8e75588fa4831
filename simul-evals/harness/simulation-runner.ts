/**
 * Simulation Runner - prowadzi agenta strumieniowego przez shard
 *
 * Dla każdej instancji: reset agenta, naprzemiennie read (odsłonięcie segmentu
 * źródła) i write (predykcja), do zakończenia instancji. Czas obliczeń agenta
 * (od ostatniego zapisu) jest przekazywany do instancji przy każdym write.
 * Zakończona instancja trafia do instances.log.
 */

import { appendInstanceRecord } from '../log/instance-log';
import { defaultLogger, type ScorerLogger } from './logger';
import type { InstanceStore } from '../store/instance-store';
import type { PredictionOutput, SendSourceResult } from '../types/instance';

const LOG_SOURCE = 'SimulationRunner';
const DEFAULT_MAX_POLICY_CALLS = 10_000;

export type AgentAction<O extends PredictionOutput = PredictionOutput> =
  | { type: 'read' }
  | { type: 'write'; content: O; finished: boolean };

/**
 * System oceniany - jedyny punkt styku silnika z modelem tłumaczenia
 */
export interface StreamingAgent<O extends PredictionOutput = PredictionOutput> {
  reset(): void;
  pushSource(segment: SendSourceResult): void;
  policy(): AgentAction<O> | Promise<AgentAction<O>>;
}

export interface SimulationOptions {
  /** Ścieżka instances.log; bez niej nic nie jest zapisywane */
  logPath?: string;
  /** Tokeny (źródło tekstowe) albo ms (źródło mowy) na jedno read */
  segmentSize?: number;
  maxPolicyCalls?: number;
  clock?: () => number;
  logger?: ScorerLogger;
}

export interface SimulationResult {
  instances: number;
  /** Instancje zakończone wymuszeniem (agent chciał czytać po końcu źródła) */
  forced: number[];
}

export async function runSimulation<O extends PredictionOutput>(
  store: InstanceStore,
  agent: StreamingAgent<O>,
  options: SimulationOptions = {}
): Promise<SimulationResult> {
  const logger = options.logger ?? defaultLogger;
  const clock = options.clock ?? (() => performance.now());
  const segmentSize = options.segmentSize ?? 1;
  const maxPolicyCalls = options.maxPolicyCalls ?? DEFAULT_MAX_POLICY_CALLS;
  const forced: number[] = [];

  for (const index of store.indices()) {
    const instance = store.get(index);
    agent.reset();

    let pendingComputeMs = 0;
    let calls = 0;

    while (!instance.finishPrediction) {
      if (calls++ >= maxPolicyCalls) {
        logger.warn(LOG_SOURCE, `Instance ${index}: no completion after ${maxPolicyCalls} policy calls, forcing`);
        instance.sentenceLevelEval();
        forced.push(index);
        break;
      }

      const started = clock();
      const action = await agent.policy();
      pendingComputeMs += clock() - started;

      if (action.type === 'read') {
        if (instance.sourceFinished) {
          logger.warn(LOG_SOURCE, `Instance ${index}: agent requested a read after the source ended, forcing completion`);
          instance.sentenceLevelEval();
          forced.push(index);
          break;
        }
        agent.pushSource(store.sendSource(index, segmentSize));
        continue;
      }

      instance.receivePrediction(action.content, { computeMs: pendingComputeMs, finished: action.finished });
      pendingComputeMs = 0;
    }

    logger.debug(LOG_SOURCE, `Instance ${index} finished: ${instance.prediction}`);

    if (options.logPath) {
      appendInstanceRecord(options.logPath, instance);
    }
  }

  logger.info(LOG_SOURCE, `Simulated ${store.size} instances (${forced.length} forced)`);
  return { instances: store.size, forced };
}
