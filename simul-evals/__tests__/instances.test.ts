import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InMemoryCorpus } from '../harness/corpus';
import { InvalidPredictionError } from '../harness/errors';
import { MemoryLogger } from '../harness/memory-logger';
import { InstanceStore } from '../store/instance-store';
import { SpeechOutputInstance } from '../instances/speech-instance';
import { TextOutputInstance } from '../instances/text-instance';
import { instanceFromRecord } from '../instances/instance-table';
import { predictionWavPath } from '../speech/artifacts';

function textStore(pairs: Array<[string, string]>): InstanceStore {
  return new InstanceStore({
    corpus: InMemoryCorpus.fromTextPairs(pairs),
    shard: { startIndex: 0, endIndex: -1 },
    sourceType: 'text',
    targetType: 'text',
    logger: new MemoryLogger(),
  });
}

describe('TextOutputInstance', () => {
  it('records one delay per emitted token and finishes on </s>', () => {
    const store = textStore([['a b c', 'x y z']]);
    const instance = store.get(0);

    expect(store.sendSource(0, 1)).toEqual({ segmentId: 0, content: ['a'], finished: false, instanceId: 0 });
    instance.receivePrediction({ kind: 'text', text: 'x' });

    expect(store.sendSource(0, 2)).toEqual({ segmentId: 1, content: ['b', 'c'], finished: true, instanceId: 0 });
    instance.receivePrediction({ kind: 'text', text: 'y z' });
    instance.receivePrediction({ kind: 'text', text: '</s>' });

    expect(instance.finishPrediction).toBe(true);
    expect(instance.prediction).toBe('x y z');
    expect(instance.summarize().delays).toEqual([
      { unit: 'x', offset: 1 },
      { unit: 'y', offset: 3 },
      { unit: 'z', offset: 3 },
    ]);

    const latency = instance.metrics.latency;
    expect(latency.AP).toBeCloseTo(7 / 9, 10);
    expect(latency.AL).toBeCloseTo(1.5, 10);
    expect(latency.DAL).toBeCloseTo(5 / 3, 10);
    expect(instance.metrics.latency_ca).toBeUndefined();
  });

  it('rejects predictions after completion', () => {
    const store = textStore([['a', 'x']]);
    const instance = store.get(0);
    store.sendSource(0, 1);
    instance.receivePrediction({ kind: 'text', text: 'x' }, { finished: true });

    expect(() => instance.receivePrediction({ kind: 'text', text: 'more' })).toThrow(InvalidPredictionError);
    expect(instance.prediction).toBe('x');
  });

  it('rejects speech output', () => {
    const store = textStore([['a', 'x']]);
    expect(() => store.get(0).receivePrediction({ kind: 'speech', samples: [0], sampleRate: 16000 }))
      .toThrow('expects text output, got speech');
  });

  it('serializes to a record that replays to the same state', () => {
    const store = textStore([['a b', 'x y']]);
    const instance = store.get(0);
    store.sendSource(0, 1);
    instance.receivePrediction({ kind: 'text', text: 'x' });
    store.sendSource(0, 1);
    instance.receivePrediction({ kind: 'text', text: 'y' }, { finished: true });

    const record = instance.toRecord();
    expect(record).toEqual({
      index: 0,
      sourceType: 'text',
      targetType: 'text',
      reference: 'x y',
      prediction: 'x y',
      predictionLength: 2,
      delays: [1, 2],
      elapsed: [],
      durations: [],
      sourceLength: 2,
      finished: true,
      metrics: instance.metrics,
    });

    const replayed = instanceFromRecord(record);
    expect(replayed).toBeInstanceOf(TextOutputInstance);
    expect(replayed.toRecord()).toEqual(record);
    expect(() => replayed.sendSource(1)).toThrow('restored from a log');
  });
});

describe('SpeechOutputInstance', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'simul-speech-'));
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  function speechStore(): InstanceStore {
    const corpus = new InMemoryCorpus([
      {
        source: { kind: 'speech', samples: new Array<number>(3000).fill(0.1), sampleRate: 1000 },
        reference: 'hello world',
      },
    ]);
    return new InstanceStore({
      corpus,
      shard: { startIndex: 0, endIndex: 1 },
      sourceType: 'speech',
      targetType: 'speech',
      outputDir,
      logger: new MemoryLogger(),
    });
  }

  it('places segments on a timeline relative to the first emission and writes the wav', () => {
    const store = speechStore();
    const instance = store.get(0);
    expect(instance.sourceLength).toBe(3000);

    const first = store.sendSource(0, 1000);
    expect(first.content).toHaveLength(1000);
    expect(first.sampleRate).toBe(1000);
    instance.receivePrediction({ kind: 'speech', samples: new Array<number>(500).fill(0.5), sampleRate: 1000 }, { computeMs: 100 });

    store.sendSource(0, 1000);
    instance.receivePrediction(
      { kind: 'speech', samples: new Array<number>(200).fill(0.5), sampleRate: 1000 },
      { computeMs: 50, finished: true }
    );

    const record = instance.toRecord();
    expect(record.delays).toEqual([1000, 2000]);
    expect(record.elapsed).toEqual([1100, 2150]);
    expect(record.durations).toEqual([500, 200]);
    expect(record.prediction).toBe('');
    expect(Object.keys(instance.metrics)).toEqual(['latency', 'latency_ca']);

    expect(instance).toBeInstanceOf(SpeechOutputInstance);
    if (instance instanceof SpeechOutputInstance) {
      expect(instance.targetOffset).toBe(1000);
    }

    // 500 próbek + 500 ciszy + 200 próbek, 16 bit
    const wav = fs.readFileSync(predictionWavPath(outputDir, 0));
    expect(wav.length).toBe(44 + 1200 * 2);
    expect(wav.readUInt32LE(24)).toBe(1000);
  });

  it('rejects a change of sample rate between segments', () => {
    const store = speechStore();
    const instance = store.get(0);
    store.sendSource(0, 1000);
    instance.receivePrediction({ kind: 'speech', samples: [0.1], sampleRate: 1000 });

    expect(() => instance.receivePrediction({ kind: 'speech', samples: [0.1], sampleRate: 2000 }))
      .toThrow('sample rate changed from 1000 to 2000');
  });
});
