/**
 * Dostęp do korpusu
 *
 * Ładowanie korpusu z dysku jest poza silnikiem - scorer dostaje tylko ten interfejs.
 */

import type { SourceContent } from '../types/instance';

export interface CorpusAccessor {
  readonly length: number;
  getSource(index: number): SourceContent;
  getReference(index: number): string;
}

export interface CorpusItem {
  source: SourceContent;
  reference: string;
}

/**
 * Korpus w pamięci - do testów i użycia programistycznego
 */
export class InMemoryCorpus implements CorpusAccessor {
  constructor(private readonly items: CorpusItem[]) {}

  /** Korpus tekst → tekst z par (źródło, referencja) */
  static fromTextPairs(pairs: Array<[string, string]>): InMemoryCorpus {
    return new InMemoryCorpus(
      pairs.map(([source, reference]) => ({
        source: { kind: 'text', tokens: source.split(/\s+/).filter(t => t.length > 0) },
        reference,
      }))
    );
  }

  get length(): number {
    return this.items.length;
  }

  getSource(index: number): SourceContent {
    return this.getItem(index).source;
  }

  getReference(index: number): string {
    return this.getItem(index).reference;
  }

  private getItem(index: number): CorpusItem {
    const item = this.items[index];
    if (!item) {
      throw new RangeError(`Corpus has no item at index ${index} (length ${this.items.length})`);
    }
    return item;
  }
}
