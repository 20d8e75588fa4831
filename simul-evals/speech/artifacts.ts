/**
 * Konwencje nazw w katalogu logów
 *
 * instances.log, wavs/, asr_prep_data/, asr_out/, align/, mfa/, scores
 */

import path from 'path';

export const INSTANCES_LOG = 'instances.log';
export const SCORES_FILE = 'scores';
export const WAVS_DIR = 'wavs';
export const ASR_PREP_DIR = 'asr_prep_data';
export const ASR_OUT_DIR = 'asr_out';
export const ALIGN_DIR = 'align';
export const ALIGN_SCRATCH_DIR = 'mfa';
export const ASR_MANIFEST = 'eval_asr_predictions.tsv';

export function predictionWavPath(outputDir: string, index: number): string {
  return path.join(outputDir, WAVS_DIR, `${index}_pred.wav`);
}

export function predictionTranscriptPath(outputDir: string, index: number): string {
  return path.join(outputDir, WAVS_DIR, `${index}_pred.txt`);
}

export function alignmentPath(outputDir: string, index: number): string {
  return path.join(outputDir, ALIGN_DIR, `${index}_pred.TextGrid`);
}

/**
 * Indeks instancji z nazwy artefaktu (`12_pred.wav` → 12) albo identyfikatora
 * manifestu ASR (`eval_12` → 12). Zwraca null, jeśli nie da się go odczytać.
 */
export function parseArtifactIndex(name: string): number | null {
  const base = path.basename(name).replace(/\.[^.]+$/, '');
  const prefixed = /^(\d+)_pred$/.exec(base);
  if (prefixed) return parseInt(prefixed[1], 10);
  const suffixed = /_(\d+)$/.exec(base);
  if (suffixed) return parseInt(suffixed[1], 10);
  return /^\d+$/.test(base) ? parseInt(base, 10) : null;
}
