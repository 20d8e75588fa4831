/**
 * Quality Aggregator
 *
 * Zbiera hipotezy i referencje sharda w kolejności indeksów i liczy BLEU korpusu.
 * Dla wyjścia mowy hipotezy pochodzą z ASR uruchomionego na wavs/.
 */

import fs from 'fs';
import path from 'path';
import { corpusBleu, type QualityScorer } from '../metrics/bleu';
import { defaultLogger, type ScorerLogger } from '../harness/logger';
import { parseAsrManifest, type AsrTranscriber } from '../speech/asr-transcriber';
import {
  ASR_OUT_DIR,
  ASR_PREP_DIR,
  WAVS_DIR,
  parseArtifactIndex,
  predictionTranscriptPath,
} from '../speech/artifacts';
import { resetDirectory } from '../speech/scoped-dir';
import type { InstanceStore } from '../store/instance-store';
import type { QualityScore } from '../types/score';

const LOG_SOURCE = 'QualityAggregator';

export interface QualityAggregatorOptions {
  qualityScorer?: QualityScorer;
  /** Wymagany dla wyjścia mowy; brak = ASR niedostępny */
  transcriber?: AsrTranscriber;
  /** Katalog z wavs/ dla wyjścia mowy; domyślnie store.outputDir */
  outputDir?: string;
  logger?: ScorerLogger;
}

/**
 * Wymusza ocenę każdej niezakończonej instancji (jeden raz) z jednym
 * ostrzeżeniem wymieniającym wszystkie indeksy. Zwraca wymuszone indeksy.
 */
export function finalizeUnfinished(store: InstanceStore, logger: ScorerLogger = defaultLogger): number[] {
  const unfinished = store.values().filter(i => !i.finishPrediction);
  if (unfinished.length === 0) return [];

  const indices = unfinished.map(i => i.index);
  logger.warn(LOG_SOURCE, `Instances not finished, evaluating partial predictions: ${indices.join(', ')}`);
  for (const instance of unfinished) {
    instance.sentenceLevelEval();
  }
  return indices;
}

export class QualityAggregator {
  private readonly qualityScorer: QualityScorer;
  private readonly transcriber?: AsrTranscriber;
  private readonly outputDir?: string;
  private readonly logger: ScorerLogger;
  private translations: string[] | null = null;

  constructor(private readonly store: InstanceStore, options: QualityAggregatorOptions = {}) {
    this.qualityScorer = options.qualityScorer ?? corpusBleu;
    this.transcriber = options.transcriber;
    this.outputDir = options.outputDir ?? store.outputDir;
    this.logger = options.logger ?? defaultLogger;
  }

  async getTranslationList(): Promise<string[]> {
    if (this.translations) return [...this.translations];

    finalizeUnfinished(this.store, this.logger);

    const translations = this.store.targetType === 'speech'
      ? await this.transcribeSpeech()
      : this.store.values().map(i => i.prediction);

    const indices = this.store.indices();
    const empty = indices.filter((_, i) => translations[i].trim().length === 0);
    if (empty.length > 0) {
      this.logger.warn(LOG_SOURCE, `Empty hypotheses for instances: ${empty.join(', ')}`);
    }

    this.translations = translations;
    return [...translations];
  }

  getReferenceList(): string[] {
    return this.store.values().map(i => i.reference);
  }

  async getQualityScore(): Promise<QualityScore> {
    const hypotheses = await this.getTranslationList();
    const references = this.getReferenceList();
    return { BLEU: this.qualityScorer(hypotheses, references) };
  }

  // ==========================================================================
  // ASR
  // ==========================================================================

  /**
   * Transkrypcja wavs/ → manifest → hipotezy według indeksu z identyfikatora.
   * Transkrypcje zapisywane są też jako wavs/<index>_pred.txt (wejście alignera).
   */
  private async transcribeSpeech(): Promise<string[]> {
    const indices = this.store.indices();
    const outputDir = this.outputDir;
    const blank = indices.map(() => '');

    if (!outputDir) {
      this.logger.warn(LOG_SOURCE, 'No output directory for speech instances, hypotheses are empty');
      return blank;
    }
    if (!this.transcriber) {
      this.logger.warn(LOG_SOURCE, 'No ASR transcriber configured, hypotheses are empty');
      return blank;
    }

    const availability = await this.transcriber.checkAvailability();
    if (!availability.available) {
      this.logger.warn(
        LOG_SOURCE,
        `ASR unavailable (${this.transcriber.name}), hypotheses are empty: ${availability.error ?? 'unknown reason'}`
      );
      return blank;
    }

    const prepDir = path.join(outputDir, ASR_PREP_DIR);
    const asrOutDir = path.join(outputDir, ASR_OUT_DIR);
    resetDirectory(prepDir);
    resetDirectory(asrOutDir);

    this.logger.info(LOG_SOURCE, `Transcribing speech output with ${this.transcriber.name}`);
    const manifestPath = await this.transcriber.transcribe({
      audioDir: path.join(outputDir, WAVS_DIR),
      prepDir,
      outputDir: asrOutDir,
    });

    const byIndex = new Map<number, string>();
    for (const entry of parseAsrManifest(fs.readFileSync(manifestPath, 'utf-8'))) {
      const index = parseArtifactIndex(entry.id);
      if (index === null) {
        this.logger.warn(LOG_SOURCE, `Unrecognized ASR identifier: ${entry.id}`);
        continue;
      }
      byIndex.set(index, entry.transcription);
    }

    const missing: number[] = [];
    const translations = indices.map(index => {
      const text = byIndex.get(index);
      if (text === undefined) {
        missing.push(index);
        return '';
      }
      fs.writeFileSync(predictionTranscriptPath(outputDir, index), text + '\n', 'utf-8');
      return text;
    });

    if (missing.length > 0) {
      this.logger.warn(LOG_SOURCE, `No ASR transcription for instances: ${missing.join(', ')}`);
    }

    return translations;
  }
}
