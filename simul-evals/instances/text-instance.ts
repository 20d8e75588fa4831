/**
 * TextOutputInstance - instancja z wyjściem tekstowym (text-text, speech-text)
 */

import { BaseInstance, measureSource, type InstanceState } from './base-instance';
import { InvalidPredictionError } from '../harness/errors';
import { END_OF_SENTENCE } from '../types/instance';
import type { CorpusAccessor } from '../harness/corpus';
import type {
  DelayEntry,
  InstanceRecord,
  PredictionOutput,
  ReceiveOptions,
  SourceType,
} from '../types/instance';

export class TextOutputInstance extends BaseInstance {
  readonly targetType = 'text' as const;

  private tokens: string[];

  private constructor(state: InstanceState, tokens: string[] = []) {
    super(state);
    this.tokens = [...tokens];
  }

  static fromCorpus(index: number, corpus: CorpusAccessor, sourceType: SourceType): TextOutputInstance {
    const source = corpus.getSource(index);
    if (source.kind !== sourceType) {
      throw new InvalidPredictionError(`Instance ${index}: expected ${sourceType} source, corpus has ${source.kind}`);
    }
    return new TextOutputInstance({
      index,
      sourceType,
      reference: corpus.getReference(index),
      sourceLength: measureSource(source),
      source,
    });
  }

  static fromRecord(record: InstanceRecord): TextOutputInstance {
    const tokens = record.prediction.split(' ').filter(t => t.length > 0);
    return new TextOutputInstance(
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
      tokens
    );
  }

  get prediction(): string {
    return this.tokens.join(' ');
  }

  receivePrediction(output: PredictionOutput, options: ReceiveOptions = {}): void {
    this.assertWritable();
    if (output.kind !== 'text') {
      throw new InvalidPredictionError(`Instance ${this.index} expects text output, got ${output.kind}`);
    }

    // czas obliczeń przypisany do pierwszego tokenu zapisu
    let computeMs = options.computeMs;
    for (const token of output.text.split(/\s+/)) {
      if (token.length === 0) continue;
      if (token === END_OF_SENTENCE) {
        this.sentenceLevelEval();
        return;
      }
      this.tokens.push(token);
      this.recordEmission(computeMs);
      if (computeMs !== undefined) computeMs = 0;
    }

    if (options.finished) {
      this.sentenceLevelEval();
    }
  }

  protected delayEntries(): DelayEntry[] {
    return this.tokens.map((token, i) => ({ unit: token, offset: this.delays[i] }));
  }

  protected recordExtras(): Pick<InstanceRecord, 'durations' | 'predictionLength'> {
    return { durations: [], predictionLength: this.tokens.length };
  }
}
