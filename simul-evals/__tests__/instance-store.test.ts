import { describe, it, expect } from 'vitest';
import { InMemoryCorpus } from '../harness/corpus';
import { InvalidPredictionError, ShardRangeError } from '../harness/errors';
import { MemoryLogger } from '../harness/memory-logger';
import { InstanceStore, resolveShard } from '../store/instance-store';
import { TextOutputInstance } from '../instances/text-instance';
import { instanceFromRecord } from '../instances/instance-table';
import type { InstanceRecord } from '../types/instance';

const corpus = InMemoryCorpus.fromTextPairs([
  ['s0 a', 'r0'],
  ['s1 a', 'r1'],
  ['s2 a', 'r2'],
  ['s3 a', 'r3'],
  ['s4 a', 'r4'],
]);

function makeRecord(index: number): InstanceRecord {
  return {
    index,
    sourceType: 'text',
    targetType: 'text',
    reference: `r${index}`,
    prediction: `p${index}`,
    predictionLength: 1,
    delays: [2],
    elapsed: [],
    durations: [],
    sourceLength: 2,
    finished: true,
    metrics: { latency: { AL: 2, AP: 1, DAL: 2 } },
  };
}

describe('resolveShard', () => {
  it('resolves a negative end index to the corpus length', () => {
    expect(resolveShard({ startIndex: 1, endIndex: -1 }, 5)).toEqual({ startIndex: 1, endIndex: 5 });
  });

  it.each([
    [{ startIndex: -1, endIndex: 2 }],
    [{ startIndex: 3, endIndex: 2 }],
    [{ startIndex: 0, endIndex: 6 }],
    [{ startIndex: 0.5, endIndex: 2 }],
  ])('rejects %o', shard => {
    expect(() => resolveShard(shard, 5)).toThrow(ShardRangeError);
  });

  it('accepts an empty shard', () => {
    expect(resolveShard({ startIndex: 2, endIndex: 2 }, 5)).toEqual({ startIndex: 2, endIndex: 2 });
  });
});

describe('InstanceStore', () => {
  it('builds exactly one instance per index in the shard', () => {
    const store = new InstanceStore({
      corpus,
      shard: { startIndex: 1, endIndex: 4 },
      sourceType: 'text',
      targetType: 'text',
      logger: new MemoryLogger(),
    });

    expect(store.size).toBe(3);
    expect(store.info()).toEqual({ numSentences: 3 });
    expect(store.indices()).toEqual([1, 2, 3]);
    expect(store.values().map(i => i.reference)).toEqual(['r1', 'r2', 'r3']);
    expect(store.values().every(i => i instanceof TextOutputInstance)).toBe(true);
  });

  it('throws for indices outside the shard', () => {
    const store = new InstanceStore({
      corpus,
      shard: { startIndex: 1, endIndex: 3 },
      sourceType: 'text',
      targetType: 'text',
      logger: new MemoryLogger(),
    });

    expect(() => store.get(0)).toThrow(ShardRangeError);
    expect(() => store.get(3)).toThrow('Instance 3 is outside shard [1, 3)');
    expect(() => store.sendSource(4, 1)).toThrow(ShardRangeError);
  });

  it('warns and rebuilds instances on reset', () => {
    const logger = new MemoryLogger();
    const store = new InstanceStore({
      corpus,
      shard: { startIndex: 0, endIndex: 2 },
      sourceType: 'text',
      targetType: 'text',
      logger,
    });
    expect(logger.getWarnings()).toHaveLength(0);

    const before = store.get(0);
    store.sendSource(0, 1);
    store.reset();

    expect(logger.getWarnings().map(w => w.message)).toEqual(['Resetting instance store [0, 2)']);
    expect(store.get(0)).not.toBe(before);
    expect(store.sendSource(0, 1).content).toEqual(['s0']);
  });

  it('defers construction when reset is disabled', () => {
    const store = new InstanceStore({
      corpus,
      shard: { startIndex: 0, endIndex: 2 },
      sourceType: 'text',
      targetType: 'text',
      reset: false,
      logger: new MemoryLogger(),
    });

    expect(store.has(0)).toBe(false);
    store.reset();
    expect(store.has(0)).toBe(true);
  });

  it('rejects a corpus whose source kind does not match the variant', () => {
    expect(() => new InstanceStore({
      corpus,
      shard: { startIndex: 0, endIndex: 1 },
      sourceType: 'speech',
      targetType: 'text',
      logger: new MemoryLogger(),
    })).toThrow(InvalidPredictionError);
  });

  describe('restored from log records', () => {
    it('uses [min, max + 1) bounds and warns about gaps', () => {
      const logger = new MemoryLogger();
      const store = InstanceStore.fromInstances([7, 3, 4].map(i => instanceFromRecord(makeRecord(i))), { logger });

      expect(store.startIndex).toBe(3);
      expect(store.endIndex).toBe(8);
      expect(store.size).toBe(3);
      expect(store.indices()).toEqual([3, 4, 7]);
      expect(logger.getWarnings().map(w => w.message)).toEqual(['Restored shard [3, 8) has gaps: 3 instances']);
      expect(() => store.get(5)).toThrow(ShardRangeError);
    });

    it('is empty with bounds [0, 0) when there are no records', () => {
      const store = InstanceStore.fromInstances([], { logger: new MemoryLogger() });
      expect(store.size).toBe(0);
      expect([store.startIndex, store.endIndex]).toEqual([0, 0]);
    });

    it('cannot be reset', () => {
      const store = InstanceStore.fromInstances([instanceFromRecord(makeRecord(0))], { logger: new MemoryLogger() });
      expect(() => store.reset()).toThrow('Cannot reset a shard restored from logs');
    });
  });
});
