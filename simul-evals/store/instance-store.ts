/**
 * InstanceStore - instancje jednego sharda [startIndex, endIndex) korpusu
 *
 * Dwa tryby:
 * - żywy: instancje budowane z korpusu przez tablicę konstruktorów (reset)
 * - odtworzony: instancje z instances.log (fromInstances), bez korpusu
 *
 * Indeks spoza sharda to błąd programisty (ShardRangeError).
 */

import { ShardRangeError } from '../harness/errors';
import { defaultLogger, type ScorerLogger } from '../harness/logger';
import { defaultInstanceTable, resolveFactory, variantOf, type InstanceTable } from '../instances/instance-table';
import type { CorpusAccessor } from '../harness/corpus';
import type { Instance, SendSourceResult, SourceType, TargetType } from '../types/instance';
import type { Shard } from '../types/score';

const LOG_SOURCE = 'InstanceStore';

export interface InstanceStoreOptions {
  corpus: CorpusAccessor;
  /** endIndex < 0 oznacza "do końca korpusu" */
  shard: Shard;
  sourceType: SourceType;
  targetType: TargetType;
  instanceTable?: InstanceTable;
  /** Katalog logów (artefakty mowy) */
  outputDir?: string;
  logger?: ScorerLogger;
  /** Zbuduj instancje od razu (domyślnie: true) */
  reset?: boolean;
}

export interface RestoredShardOptions {
  restored: Instance[];
  instanceTable?: InstanceTable;
  outputDir?: string;
  logger?: ScorerLogger;
}

/**
 * Rozwiązuje ujemny endIndex do długości korpusu i waliduje zakres
 */
export function resolveShard(shard: Shard, corpusLength: number): Shard {
  const endIndex = shard.endIndex < 0 ? corpusLength : shard.endIndex;
  const { startIndex } = shard;

  if (!Number.isInteger(startIndex) || !Number.isInteger(endIndex)) {
    throw new ShardRangeError(`Shard bounds must be integers, got [${startIndex}, ${endIndex})`);
  }
  if (startIndex < 0 || startIndex > endIndex) {
    throw new ShardRangeError(`Invalid shard [${startIndex}, ${endIndex})`);
  }
  if (endIndex > corpusLength) {
    throw new ShardRangeError(`Shard [${startIndex}, ${endIndex}) exceeds corpus length ${corpusLength}`);
  }

  return { startIndex, endIndex };
}

export class InstanceStore {
  readonly startIndex: number;
  readonly endIndex: number;
  readonly sourceType: SourceType;
  readonly targetType: TargetType;
  readonly outputDir?: string;

  private instances = new Map<number, Instance>();
  private readonly corpus: CorpusAccessor | null;
  private readonly instanceTable: InstanceTable;
  private readonly logger: ScorerLogger;
  /** Tylko dla sharda odtworzonego z logów - indeksy mogą mieć luki */
  private readonly restoredIndices: number[] | null;

  constructor(options: InstanceStoreOptions | RestoredShardOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.outputDir = options.outputDir;
    this.instanceTable = options.instanceTable ?? defaultInstanceTable;

    if ('restored' in options) {
      const sorted = [...options.restored].sort((a, b) => a.index - b.index);
      const first = sorted[0];
      this.restoredIndices = sorted.map(i => i.index);
      this.startIndex = first ? first.index : 0;
      this.endIndex = first ? sorted[sorted.length - 1].index + 1 : 0;
      this.sourceType = first?.sourceType ?? 'text';
      this.targetType = first?.targetType ?? 'text';
      this.corpus = null;
      this.instances = new Map(sorted.map(i => [i.index, i]));

      if (this.restoredIndices.length !== this.endIndex - this.startIndex) {
        this.logger.warn(
          LOG_SOURCE,
          `Restored shard [${this.startIndex}, ${this.endIndex}) has gaps: ${this.restoredIndices.length} instances`
        );
      }
      return;
    }

    const shard = resolveShard(options.shard, options.corpus.length);
    this.startIndex = shard.startIndex;
    this.endIndex = shard.endIndex;
    this.sourceType = options.sourceType;
    this.targetType = options.targetType;
    this.corpus = options.corpus;
    this.restoredIndices = null;

    if (options.reset !== false) {
      this.reset();
    }
  }

  /**
   * Shard odtworzony z gotowych instancji (replay). Granice: [min, max + 1).
   */
  static fromInstances(
    instances: Instance[],
    options: { outputDir?: string; logger?: ScorerLogger } = {}
  ): InstanceStore {
    return new InstanceStore({ restored: instances, ...options });
  }

  get size(): number {
    return this.restoredIndices ? this.restoredIndices.length : this.endIndex - this.startIndex;
  }

  /** Indeksy sharda w rosnącej kolejności */
  indices(): number[] {
    if (this.restoredIndices) return [...this.restoredIndices];
    const result: number[] = [];
    for (let i = this.startIndex; i < this.endIndex; i++) result.push(i);
    return result;
  }

  /** Instancje w kolejności indeksów */
  values(): Instance[] {
    return this.indices().map(i => this.get(i));
  }

  info(): { numSentences: number } {
    return { numSentences: this.size };
  }

  has(index: number): boolean {
    return this.instances.has(index);
  }

  get(index: number): Instance {
    const instance = this.instances.get(index);
    if (index < this.startIndex || index >= this.endIndex || !instance) {
      throw new ShardRangeError(`Instance ${index} is outside shard [${this.startIndex}, ${this.endIndex})`);
    }
    return instance;
  }

  /**
   * Buduje od nowa wszystkie instancje sharda. Operacja destrukcyjna -
   * poprzedni stan symulacji jest tracony (ostrzeżenie w logu).
   */
  reset(): void {
    if (!this.corpus) {
      throw new ShardRangeError('Cannot reset a shard restored from logs: no corpus available');
    }

    if (this.instances.size > 0) {
      this.logger.warn(LOG_SOURCE, `Resetting instance store [${this.startIndex}, ${this.endIndex})`);
    }

    const factory = resolveFactory(this.instanceTable, variantOf(this.sourceType, this.targetType));
    const instances = new Map<number, Instance>();
    for (const index of this.indices()) {
      instances.set(index, factory.fromCorpus(index, this.corpus, this.outputDir));
    }
    this.instances = instances;
  }

  /**
   * Przekazuje żądanie odsłonięcia źródła do instancji; wynik oznaczony instanceId
   */
  sendSource(instanceId: number, segmentSize: number): SendSourceResult {
    const segment = this.get(instanceId).sendSource(segmentSize);
    return { ...segment, instanceId };
  }
}
