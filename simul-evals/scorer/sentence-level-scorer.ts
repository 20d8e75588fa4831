/**
 * Sentence-Level Scorer - fasada: jakość + opóźnienie dla sharda
 *
 * Kolejność w score(): najpierw jakość, potem opóźnienie. Dla wyjścia mowy
 * alignment korzysta z transkrypcji ASR zapisanych przy liczeniu jakości.
 */

import fs from 'fs';
import path from 'path';
import { QualityAggregator, finalizeUnfinished } from './quality-aggregator';
import { aggregateTextLatency } from './latency-aggregator';
import { InstanceStore } from '../store/instance-store';
import { readInstanceLogs, logPathFor } from '../log/instance-log';
import { instanceFromRecord, type InstanceTable } from '../instances/instance-table';
import { countWords } from '../metrics/latency';
import { defaultLogger, type ScorerLogger } from '../harness/logger';
import { MfaForcedAligner, type ForcedAligner } from '../speech/forced-aligner';
import { WhisperCppTranscriber, type AsrTranscriber } from '../speech/asr-transcriber';
import { loadRealignmentEntries, prepareAlignment, realignLatency } from '../speech/speech-realignment';
import { WAVS_DIR } from '../speech/artifacts';
import type { QualityScorer } from '../metrics/bleu';
import type { ScoreReport, SpeechLatencyReport, TextLatencyReport } from '../types/score';

export interface ScorerOptions {
  qualityScorer?: QualityScorer;
  logger?: ScorerLogger;
}

export interface SpeechScorerOptions extends ScorerOptions {
  /** Domyślnie store.outputDir */
  outputDir?: string;
  aligner?: ForcedAligner;
  transcriber?: AsrTranscriber;
}

export interface ReplayOptions {
  instanceTable?: InstanceTable;
}

/**
 * Odtwarza shard z instances.log katalogu (granice [min, max + 1))
 */
export function restoreStore(logdir: string, logger: ScorerLogger, instanceTable?: InstanceTable): InstanceStore {
  const records = readInstanceLogs([logPathFor(logdir)]);
  const instances = records.map(r => instanceFromRecord(r, instanceTable));
  return InstanceStore.fromInstances(instances, { outputDir: logdir, logger });
}

export abstract class SentenceLevelScorer<L extends TextLatencyReport | SpeechLatencyReport> {
  readonly quality: QualityAggregator;
  protected readonly logger: ScorerLogger;

  constructor(readonly store: InstanceStore, options: ScorerOptions & { transcriber?: AsrTranscriber; outputDir?: string } = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.quality = new QualityAggregator(store, {
      qualityScorer: options.qualityScorer,
      transcriber: options.transcriber,
      outputDir: options.outputDir,
      logger: this.logger,
    });
  }

  abstract getLatencyScore(): Promise<L>;

  async score(): Promise<ScoreReport<L>> {
    const quality = await this.quality.getQualityScore();
    const latency = await this.getLatencyScore();
    return { Quality: quality, Latency: latency };
  }
}

// ============================================================================
// TEXT
// ============================================================================

export class TextScorer extends SentenceLevelScorer<TextLatencyReport> {
  static fromLogdir(logdir: string, options: ScorerOptions & ReplayOptions = {}): TextScorer {
    const logger = options.logger ?? defaultLogger;
    return new TextScorer(restoreStore(logdir, logger, options.instanceTable), { ...options, logger });
  }

  async getLatencyScore(): Promise<TextLatencyReport> {
    finalizeUnfinished(this.store, this.logger);
    return aggregateTextLatency(this.store.values());
  }
}

// ============================================================================
// SPEECH
// ============================================================================

export class SpeechScorer extends SentenceLevelScorer<SpeechLatencyReport> {
  readonly outputDir: string;
  private readonly aligner: ForcedAligner;

  constructor(store: InstanceStore, options: SpeechScorerOptions = {}) {
    const logger = options.logger ?? defaultLogger;
    super(store, {
      ...options,
      logger,
      outputDir: options.outputDir ?? store.outputDir,
      transcriber: options.transcriber ?? new WhisperCppTranscriber({ logger }),
    });

    const outputDir = options.outputDir ?? store.outputDir;
    if (!outputDir) {
      throw new Error('SpeechScorer requires an output directory with speech artifacts');
    }
    this.outputDir = outputDir;
    this.aligner = options.aligner ?? new MfaForcedAligner({ logger });
    fs.mkdirSync(path.join(outputDir, WAVS_DIR), { recursive: true });
  }

  static fromLogdir(logdir: string, options: SpeechScorerOptions & ReplayOptions = {}): SpeechScorer {
    const logger = options.logger ?? defaultLogger;
    return new SpeechScorer(restoreStore(logdir, logger, options.instanceTable), {
      ...options,
      logger,
      outputDir: options.outputDir ?? logdir,
    });
  }

  async getLatencyScore(): Promise<SpeechLatencyReport> {
    finalizeUnfinished(this.store, this.logger);
    await prepareAlignment(this.outputDir, this.aligner, this.logger);

    const entries = loadRealignmentEntries(
      this.outputDir,
      this.store.values().map(instance => {
        const { delays } = instance.toRecord();
        return {
          index: instance.index,
          targetOffset: delays.length > 0 ? delays[0] : undefined,
          sourceLength: instance.sourceLength,
          referenceLength: countWords(instance.reference),
        };
      })
    );

    return realignLatency(entries);
  }
}
