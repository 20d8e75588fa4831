/**
 * Speech Realignment - opóźnienie na poziomie słów dla wyjścia mowy
 *
 * 1. offset = opóźnienie (ms) pierwszego wyemitowanego segmentu instancji
 * 2. interwały słów z alignera, bez pustych etykiet (cisza)
 * 3. BOW = offset + 1000·minTime, EOW = offset + 1000·maxTime,
 *    COW = offset + 500·(minTime + maxTime)
 * 4. każda konwencja → evalAllLatency (to samo co ścieżka tekstowa)
 * 5. średnia po instancjach, osobno dla każdej konwencji
 */

import fs from 'fs';
import path from 'path';
import { evalAllLatency, mean } from '../metrics/latency';
import { parseTextGrid } from './textgrid';
import { alignmentPath, ALIGN_DIR, ALIGN_SCRATCH_DIR, WAVS_DIR } from './artifacts';
import { resetDirectory } from './scoped-dir';
import { AlignmentMissingError, ExternalToolError } from '../harness/errors';
import { defaultLogger, type ScorerLogger } from '../harness/logger';
import {
  BOUNDARY_CONVENTIONS,
  LATENCY_METRICS,
  type BoundaryConvention,
  type LatencyMetrics,
  type SpeechLatencyReport,
  type WordInterval,
} from '../types/score';
import type { ForcedAligner } from './forced-aligner';

const LOG_SOURCE = 'SpeechRealignment';

export type WordDelays = Record<BoundaryConvention, number[]>;

/** Wejście realignmentu dla jednej instancji */
export interface RealignmentEntry {
  index: number;
  targetOffset: number;
  intervals: WordInterval[];
  sourceLength: number;
  referenceLength: number;
}

export function collectWordDelays(intervals: WordInterval[], targetOffset: number): WordDelays {
  const delays: WordDelays = { BOW: [], EOW: [], COW: [] };

  for (const interval of intervals) {
    if (interval.label.length === 0) continue;
    delays.BOW.push(targetOffset + 1000 * interval.minTime);
    delays.EOW.push(targetOffset + 1000 * interval.maxTime);
    delays.COW.push(targetOffset + 500 * (interval.minTime + interval.maxTime));
  }

  return delays;
}

/**
 * Opóźnienie per instancja per konwencja, następnie średnia nieważona
 */
export function realignLatency(entries: RealignmentEntry[]): SpeechLatencyReport {
  if (entries.length === 0) return {};

  const perConvention: Record<BoundaryConvention, LatencyMetrics[]> = { BOW: [], EOW: [], COW: [] };
  const sorted = [...entries].sort((a, b) => a.index - b.index);

  for (const entry of sorted) {
    const delays = collectWordDelays(entry.intervals, entry.targetOffset);
    for (const convention of BOUNDARY_CONVENTIONS) {
      perConvention[convention].push(
        evalAllLatency(delays[convention], entry.sourceLength, entry.referenceLength)
      );
    }
  }

  const report: SpeechLatencyReport = {};
  for (const convention of BOUNDARY_CONVENTIONS) {
    const results = perConvention[convention];
    const averaged: LatencyMetrics = { AL: 0, AP: 0, DAL: 0 };
    for (const metric of LATENCY_METRICS) {
      averaged[metric] = mean(results.map(r => r[metric]));
    }
    report[convention] = averaged;
  }

  return report;
}

// ============================================================================
// ALIGNMENT
// ============================================================================

/**
 * Uruchamia aligner nad wavs/ → align/. Brak narzędzia przerywa obliczenie
 * opóźnienia mowy (bez cichego przejścia na opóźnienie tekstowe).
 * Przy błędzie align/ jest usuwany, żeby częściowe wyniki nie były widoczne.
 */
export async function prepareAlignment(
  outputDir: string,
  aligner: ForcedAligner,
  logger: ScorerLogger = defaultLogger
): Promise<string> {
  const availability = await aligner.checkAvailability();
  if (!availability.available) {
    logger.error(LOG_SOURCE, `Forced aligner unavailable: ${availability.error ?? aligner.name}`);
    throw new ExternalToolError(aligner.name, availability.error ?? 'not available');
  }

  const alignDir = path.join(outputDir, ALIGN_DIR);
  resetDirectory(alignDir);

  logger.info(LOG_SOURCE, 'Align target transcripts with speech');
  try {
    await aligner.align({
      audioDir: path.join(outputDir, WAVS_DIR),
      outputDir: alignDir,
      scratchDir: path.join(outputDir, ALIGN_SCRATCH_DIR),
    });
  } catch (error) {
    fs.rmSync(alignDir, { recursive: true, force: true });
    throw error;
  }

  return alignDir;
}

export interface AlignedInstance {
  index: number;
  /** undefined, gdy instancja nic nie wyemitowała */
  targetOffset: number | undefined;
  sourceLength: number;
  referenceLength: number;
}

/**
 * Wczytuje TextGrid dla każdej instancji. Brak artefaktu dla którejkolwiek
 * instancji → AlignmentMissingError (lista indeksów).
 */
export function loadRealignmentEntries(outputDir: string, instances: AlignedInstance[]): RealignmentEntry[] {
  const missing: number[] = [];
  const entries: RealignmentEntry[] = [];

  for (const instance of instances) {
    const file = alignmentPath(outputDir, instance.index);
    if (instance.targetOffset === undefined || !fs.existsSync(file)) {
      missing.push(instance.index);
      continue;
    }
    entries.push({
      index: instance.index,
      targetOffset: instance.targetOffset,
      intervals: parseTextGrid(fs.readFileSync(file, 'utf-8')),
      sourceLength: instance.sourceLength,
      referenceLength: instance.referenceLength,
    });
  }

  if (missing.length > 0) {
    throw new AlignmentMissingError(missing, path.join(outputDir, ALIGN_DIR));
  }

  return entries;
}
