/**
 * computeScore - ocena zakończonego katalogu logów
 *
 * wavs/ obecne → tryb mowy, inaczej tekst. Raport trafia do <logdir>/scores.
 */

import fs from 'fs';
import path from 'path';
import { SpeechScorer, TextScorer, type ReplayOptions, type SpeechScorerOptions } from './sentence-level-scorer';
import { writeFileAtomic } from '../harness/atomic-write';
import { defaultLogger } from '../harness/logger';
import { SCORES_FILE, WAVS_DIR } from '../speech/artifacts';
import type { ScoreReport, ScoringMode } from '../types/score';

export type ComputeScoreOptions = Omit<SpeechScorerOptions, 'outputDir'> & ReplayOptions;

export interface ComputeScoreResult {
  mode: ScoringMode;
  report: ScoreReport;
  scoresPath: string;
}

export function detectScoringMode(logdir: string): ScoringMode {
  return fs.existsSync(path.join(logdir, WAVS_DIR)) ? 'speech' : 'text';
}

export function formatReport(report: ScoreReport): string {
  return JSON.stringify(report, null, 4);
}

export async function computeScore(logdir: string, options: ComputeScoreOptions = {}): Promise<ComputeScoreResult> {
  const logger = options.logger ?? defaultLogger;
  const mode = detectScoringMode(logdir);

  logger.info('ComputeScore', `Scoring ${logdir} (${mode})`);

  const report: ScoreReport = mode === 'speech'
    ? await SpeechScorer.fromLogdir(logdir, { ...options, logger }).score()
    : await TextScorer.fromLogdir(logdir, { ...options, logger }).score();

  const scoresPath = path.join(logdir, SCORES_FILE);
  writeFileAtomic(scoresPath, formatReport(report) + '\n');

  return { mode, report, scoresPath };
}
