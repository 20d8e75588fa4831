import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InMemoryCorpus } from '../harness/corpus';
import { MemoryLogger } from '../harness/memory-logger';
import { runSimulation, type AgentAction, type StreamingAgent } from '../harness/simulation-runner';
import { InstanceStore } from '../store/instance-store';
import { logPathFor, readInstanceLog } from '../log/instance-log';
import type { SendSourceResult, SpeechOutput, TextOutput } from '../types/instance';

/** Wait-1: po każdym odczytanym tokenie emituje go wielkimi literami */
class UppercaseAgent implements StreamingAgent<TextOutput> {
  private tokens: string[] = [];
  private written = 0;
  private sourceDone = false;

  reset(): void {
    this.tokens = [];
    this.written = 0;
    this.sourceDone = false;
  }

  pushSource(segment: SendSourceResult): void {
    for (const item of segment.content) {
      this.tokens.push(String(item));
    }
    this.sourceDone = segment.finished;
  }

  policy(): AgentAction<TextOutput> {
    if (this.written < this.tokens.length) {
      const token = this.tokens[this.written++];
      return {
        type: 'write',
        content: { kind: 'text', text: token.toUpperCase() },
        finished: this.sourceDone && this.written === this.tokens.length,
      };
    }
    return { type: 'read' };
  }
}

class AlwaysReadAgent implements StreamingAgent<TextOutput> {
  reset(): void {}
  pushSource(): void {}
  policy(): AgentAction<TextOutput> {
    return { type: 'read' };
  }
}

/** Po każdym segmencie źródła emituje 100 ms audio */
class EchoSpeechAgent implements StreamingAgent<SpeechOutput> {
  private hasNew = false;
  private sourceDone = false;

  reset(): void {
    this.hasNew = false;
    this.sourceDone = false;
  }

  pushSource(segment: SendSourceResult): void {
    this.hasNew = true;
    this.sourceDone = segment.finished;
  }

  async policy(): Promise<AgentAction<SpeechOutput>> {
    if (!this.hasNew) return { type: 'read' };
    this.hasNew = false;
    return {
      type: 'write',
      content: { kind: 'speech', samples: new Array<number>(100).fill(0.2), sampleRate: 1000 },
      finished: this.sourceDone,
    };
  }
}

function steppingClock(stepMs: number): () => number {
  let now = 0;
  return () => {
    now += stepMs;
    return now;
  };
}

describe('runSimulation', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'simul-run-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('drives a text agent through the shard and logs each finished instance', async () => {
    const logger = new MemoryLogger();
    const store = new InstanceStore({
      corpus: InMemoryCorpus.fromTextPairs([
        ['a b c', 'A B C'],
        ['d e', 'D E'],
      ]),
      shard: { startIndex: 0, endIndex: 2 },
      sourceType: 'text',
      targetType: 'text',
      logger,
    });

    const result = await runSimulation(store, new UppercaseAgent(), { logPath: logPathFor(dir), logger });

    expect(result).toEqual({ instances: 2, forced: [] });
    const records = readInstanceLog(logPathFor(dir));
    expect(records.map(r => r.prediction)).toEqual(['A B C', 'D E']);
    expect(records.map(r => r.delays)).toEqual([[1, 2, 3], [1, 2]]);
    expect(records.every(r => r.finished)).toBe(true);
    expect(logger.getWarnings()).toHaveLength(0);
  });

  it('forces completion when the agent reads past the end of the source', async () => {
    const logger = new MemoryLogger();
    const store = new InstanceStore({
      corpus: InMemoryCorpus.fromTextPairs([['a b', 'x y']]),
      shard: { startIndex: 0, endIndex: 1 },
      sourceType: 'text',
      targetType: 'text',
      logger,
    });

    const result = await runSimulation(store, new AlwaysReadAgent(), { logger, segmentSize: 1 });

    expect(result.forced).toEqual([0]);
    expect(store.get(0).finishPrediction).toBe(true);
    expect(store.get(0).prediction).toBe('');
    expect(logger.getWarnings().map(w => w.message)).toEqual([
      'Instance 0: agent requested a read after the source ended, forcing completion',
    ]);
  });

  it('charges agent compute time to speech emissions', async () => {
    const corpus = new InMemoryCorpus([
      {
        source: { kind: 'speech', samples: new Array<number>(2000).fill(0.1), sampleRate: 1000 },
        reference: 'one two',
      },
    ]);
    const store = new InstanceStore({
      corpus,
      shard: { startIndex: 0, endIndex: 1 },
      sourceType: 'speech',
      targetType: 'speech',
      logger: new MemoryLogger(),
    });

    await runSimulation(store, new EchoSpeechAgent(), {
      segmentSize: 1000,
      clock: steppingClock(5),
      logger: new MemoryLogger(),
    });

    const record = store.get(0).toRecord();
    // każde wywołanie policy trwa 5 ms: read + write przed każdą emisją
    expect(record.delays).toEqual([1000, 2000]);
    expect(record.elapsed).toEqual([1010, 2020]);
    expect(record.durations).toEqual([100, 100]);
    expect(Object.keys(store.get(0).metrics)).toEqual(['latency', 'latency_ca']);
  });
});
