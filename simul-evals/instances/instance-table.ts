/**
 * Tablica konstruktorów instancji
 *
 * Wariant wybierany raz, przy budowie sharda, z pary (sourceType, targetType).
 * Tablica jest przekazywana jawnie do InstanceStore - bez globalnej rejestracji.
 */

import { TextOutputInstance } from './text-instance';
import { SpeechOutputInstance } from './speech-instance';
import type { CorpusAccessor } from '../harness/corpus';
import type { Instance, InstanceRecord, SourceType, TargetType } from '../types/instance';

export type InstanceVariant = `${SourceType}-${TargetType}`;

export interface InstanceFactory {
  fromCorpus(index: number, corpus: CorpusAccessor, outputDir?: string): Instance;
  fromRecord(record: InstanceRecord): Instance;
}

export type InstanceTable = Partial<Record<InstanceVariant, InstanceFactory>>;

function textFactory(sourceType: SourceType): InstanceFactory {
  return {
    fromCorpus: (index, corpus) => TextOutputInstance.fromCorpus(index, corpus, sourceType),
    fromRecord: record => TextOutputInstance.fromRecord(record),
  };
}

function speechFactory(sourceType: SourceType): InstanceFactory {
  return {
    fromCorpus: (index, corpus, outputDir) => SpeechOutputInstance.fromCorpus(index, corpus, sourceType, outputDir),
    fromRecord: record => SpeechOutputInstance.fromRecord(record),
  };
}

export const defaultInstanceTable: InstanceTable = {
  'text-text': textFactory('text'),
  'speech-text': textFactory('speech'),
  'text-speech': speechFactory('text'),
  'speech-speech': speechFactory('speech'),
};

export function variantOf(sourceType: SourceType, targetType: TargetType): InstanceVariant {
  return `${sourceType}-${targetType}`;
}

export function resolveFactory(table: InstanceTable, variant: InstanceVariant): InstanceFactory {
  const factory = table[variant];
  if (!factory) {
    throw new Error(`No instance type registered for ${variant}`);
  }
  return factory;
}

/** Odtwarza instancję z rekordu logu według jego wariantu */
export function instanceFromRecord(record: InstanceRecord, table: InstanceTable = defaultInstanceTable): Instance {
  return resolveFactory(table, variantOf(record.sourceType, record.targetType)).fromRecord(record);
}
