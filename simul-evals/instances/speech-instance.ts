/**
 * SpeechOutputInstance - instancja z wyjściem mowy (speech-speech, text-speech)
 *
 * Segmenty audio są układane na osi czasu względem pierwszej emisji: segment
 * zaczyna się nie wcześniej niż w chwili swojej emisji, a luki wypełnia cisza.
 * Dzięki temu czas w pliku WAV + offset pierwszej emisji = czas bezwzględny,
 * co wykorzystuje realignment (offset + 1000 * minTime).
 */

import { BaseInstance, measureSource, type InstanceState } from './base-instance';
import { InvalidPredictionError } from '../harness/errors';
import { predictionWavPath } from '../speech/artifacts';
import { writeWav } from '../speech/wav';
import type { CorpusAccessor } from '../harness/corpus';
import type {
  DelayEntry,
  InstanceRecord,
  PredictionOutput,
  ReceiveOptions,
  SourceType,
} from '../types/instance';

export class SpeechOutputInstance extends BaseInstance {
  readonly targetType = 'speech' as const;

  private durations: number[];
  private audio: number[] = [];
  private sampleRate?: number;
  private readonly outputDir?: string;
  private wavWritten = false;

  private constructor(state: InstanceState, durations: number[] = [], outputDir?: string) {
    super(state);
    this.durations = [...durations];
    this.outputDir = outputDir;
  }

  /**
   * @param outputDir - katalog logów; po zakończeniu zapisywany jest wavs/<index>_pred.wav
   */
  static fromCorpus(
    index: number,
    corpus: CorpusAccessor,
    sourceType: SourceType,
    outputDir?: string
  ): SpeechOutputInstance {
    const source = corpus.getSource(index);
    if (source.kind !== sourceType) {
      throw new InvalidPredictionError(`Instance ${index}: expected ${sourceType} source, corpus has ${source.kind}`);
    }
    return new SpeechOutputInstance(
      {
        index,
        sourceType,
        reference: corpus.getReference(index),
        sourceLength: measureSource(source),
        source,
      },
      [],
      outputDir
    );
  }

  static fromRecord(record: InstanceRecord): SpeechOutputInstance {
    return new SpeechOutputInstance(
      {
        index: record.index,
        sourceType: record.sourceType,
        reference: record.reference,
        sourceLength: record.sourceLength,
        delays: record.delays,
        elapsed: record.elapsed,
        finished: record.finished,
        metrics: record.metrics,
      },
      record.durations
    );
  }

  /** Tekst wyjścia mowy odzyskuje dopiero ASR */
  get prediction(): string {
    return '';
  }

  /** Opóźnienie (ms) pierwszego wyemitowanego segmentu */
  get targetOffset(): number | undefined {
    return this.delays[0];
  }

  receivePrediction(output: PredictionOutput, options: ReceiveOptions = {}): void {
    this.assertWritable();
    if (output.kind !== 'speech') {
      throw new InvalidPredictionError(`Instance ${this.index} expects speech output, got ${output.kind}`);
    }

    if (output.samples.length > 0) {
      if (this.sampleRate === undefined) {
        this.sampleRate = output.sampleRate;
      } else if (this.sampleRate !== output.sampleRate) {
        throw new InvalidPredictionError(
          `Instance ${this.index}: sample rate changed from ${this.sampleRate} to ${output.sampleRate}`
        );
      }

      const offset = this.recordEmission(options.computeMs);
      this.durations.push((output.samples.length * 1000) / output.sampleRate);
      this.place(output.samples, offset - this.delays[0], output.sampleRate);
    }

    if (options.finished) {
      this.sentenceLevelEval();
    }
  }

  sentenceLevelEval(): void {
    super.sentenceLevelEval();
    if (this.outputDir && this.sampleRate !== undefined && !this.wavWritten) {
      writeWav(predictionWavPath(this.outputDir, this.index), this.audio, this.sampleRate);
      this.wavWritten = true;
    }
  }

  protected delayEntries(): DelayEntry[] {
    return this.durations.map((duration, i) => ({ unit: duration, offset: this.delays[i] }));
  }

  protected recordExtras(): Pick<InstanceRecord, 'durations' | 'predictionLength'> {
    return { durations: [...this.durations], predictionLength: this.durations.length };
  }

  private place(samples: number[], relativeOffsetMs: number, sampleRate: number): void {
    const start = Math.max(this.audio.length, Math.round((relativeOffsetMs * sampleRate) / 1000));
    while (this.audio.length < start) {
      this.audio.push(0);
    }
    for (const sample of samples) {
      this.audio.push(sample);
    }
  }
}
