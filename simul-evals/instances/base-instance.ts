/**
 * BaseInstance - wspólna logika odsłaniania źródła i liczenia metryk
 *
 * Instancja żywa dostaje źródło z korpusu; instancja odtworzona z logu ma tylko
 * zapisane opóźnienia i metryki (sendSource rzuca błąd).
 */

import { evalAllLatency, countWords } from '../metrics/latency';
import { InvalidPredictionError } from '../harness/errors';
import type {
  Instance,
  InstanceRecord,
  InstanceSummary,
  MetricsMap,
  PredictionOutput,
  ReceiveOptions,
  SourceContent,
  SourceSegment,
  SourceType,
  TargetType,
  DelayEntry,
} from '../types/instance';

export interface InstanceState {
  index: number;
  sourceType: SourceType;
  reference: string;
  sourceLength: number;
  /** Brak dla instancji odtworzonych z logu */
  source?: SourceContent;
  delays?: number[];
  elapsed?: number[];
  finished?: boolean;
  metrics?: MetricsMap;
}

/** Długość źródła: liczba tokenów albo ms audio */
export function measureSource(source: SourceContent): number {
  if (source.kind === 'text') {
    return source.tokens.length;
  }
  return (source.samples.length * 1000) / source.sampleRate;
}

export abstract class BaseInstance implements Instance {
  abstract readonly targetType: TargetType;

  readonly index: number;
  readonly sourceType: SourceType;
  readonly reference: string;
  readonly sourceLength: number;

  protected readonly source?: SourceContent;
  protected delays: number[];
  protected elapsed: number[];
  protected finished: boolean;
  protected metricsMap: MetricsMap;

  /** Odsłonięta część źródła: tokeny albo próbki */
  private revealed = 0;
  private segmentId = 0;
  private computeMs = 0;

  constructor(state: InstanceState) {
    this.index = state.index;
    this.sourceType = state.sourceType;
    this.reference = state.reference;
    this.sourceLength = state.sourceLength;
    this.source = state.source;
    this.delays = state.delays ? [...state.delays] : [];
    this.elapsed = state.elapsed ? [...state.elapsed] : [];
    this.finished = state.finished ?? false;
    this.metricsMap = state.metrics ?? {};
  }

  abstract get prediction(): string;
  abstract receivePrediction(output: PredictionOutput, options?: ReceiveOptions): void;
  protected abstract delayEntries(): DelayEntry[];
  protected abstract recordExtras(): Pick<InstanceRecord, 'durations' | 'predictionLength'>;

  get finishPrediction(): boolean {
    return this.finished;
  }

  get metrics(): MetricsMap {
    return this.metricsMap;
  }

  get sourceFinished(): boolean {
    if (!this.source) return true;
    return this.revealed >= this.sourceUnits(this.source);
  }

  /**
   * Aktualne opóźnienie - ile źródła odczytano (tokeny albo ms)
   */
  protected get currentDelay(): number {
    if (!this.source || this.source.kind === 'text') {
      return this.revealed;
    }
    return (this.revealed * 1000) / this.source.sampleRate;
  }

  sendSource(segmentSize: number): SourceSegment {
    if (!this.source) {
      throw new InvalidPredictionError(`Instance ${this.index} was restored from a log and has no source`);
    }

    const total = this.sourceUnits(this.source);
    const start = this.revealed;
    let end: number;

    if (this.source.kind === 'text') {
      end = Math.min(total, start + Math.max(1, Math.floor(segmentSize)));
      this.revealed = end;
      return {
        segmentId: this.segmentId++,
        content: this.source.tokens.slice(start, end),
        finished: end >= total,
      };
    }

    const chunk = Math.max(1, Math.round((segmentSize * this.source.sampleRate) / 1000));
    end = Math.min(total, start + chunk);
    this.revealed = end;
    return {
      segmentId: this.segmentId++,
      content: this.source.samples.slice(start, end),
      sampleRate: this.source.sampleRate,
      finished: end >= total,
    };
  }

  sentenceLevelEval(): void {
    this.finished = true;
    this.metricsMap = this.computeMetrics();
  }

  summarize(): InstanceSummary {
    return {
      index: this.index,
      prediction: this.prediction,
      reference: this.reference,
      sourceLength: this.sourceLength,
      delays: this.delayEntries(),
      elapsed: [...this.elapsed],
      metrics: this.metricsMap,
    };
  }

  toRecord(): InstanceRecord {
    return {
      index: this.index,
      sourceType: this.sourceType,
      targetType: this.targetType,
      reference: this.reference,
      prediction: this.prediction,
      delays: [...this.delays],
      elapsed: [...this.elapsed],
      sourceLength: this.sourceLength,
      finished: this.finished,
      metrics: this.metricsMap,
      ...this.recordExtras(),
    };
  }

  // ==========================================================================
  // DLA PODKLAS
  // ==========================================================================

  protected assertWritable(): void {
    if (this.finished) {
      throw new InvalidPredictionError(`Instance ${this.index} is finished; prediction is frozen`);
    }
  }

  /**
   * Zapisuje opóźnienie emisji. Czas obliczeń liczy się tylko dla źródła mowy
   * (te same jednostki - ms).
   */
  protected recordEmission(computeMs?: number): number {
    const delay = this.currentDelay;
    this.delays.push(delay);
    if (this.sourceType === 'speech' && computeMs !== undefined) {
      this.computeMs += computeMs;
      this.elapsed.push(delay + this.computeMs);
    }
    return delay;
  }

  protected computeMetrics(): MetricsMap {
    const referenceLength = countWords(this.reference);
    const metrics: MetricsMap = {
      latency: evalAllLatency(this.delays, this.sourceLength, referenceLength),
    };

    if (this.elapsed.length > 0 && this.elapsed.length === this.delays.length) {
      metrics.latency_ca = evalAllLatency(this.elapsed, this.sourceLength, referenceLength);
    }

    return metrics;
  }

  private sourceUnits(source: SourceContent): number {
    return source.kind === 'text' ? source.tokens.length : source.samples.length;
  }
}
