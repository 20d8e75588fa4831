/**
 * Latency Aggregator (ścieżka tekstowa)
 *
 * Polityka: rodzina metryk wchodzi do raportu tylko wtedy, gdy ma ją KAŻDA
 * instancja sharda. Rodzina obecna w części instancji jest pomijana w całości -
 * nigdy nie jest uśredniana po podzbiorze.
 *
 * Średnia jest nieważona: każde zdanie liczy się tak samo, niezależnie od długości.
 */

import { mean } from '../metrics/latency';
import { LATENCY_METRICS, type TextLatencyReport } from '../types/score';
import type { Instance } from '../types/instance';

/** Rodzina bazowa - raportowana bez sufiksu */
export const BASE_LATENCY_FAMILY = 'latency';

/** Znane rodziny i ich sufiksy w raporcie; pozostałe dostają `_<rodzina>` */
const FAMILY_SUFFIXES: Record<string, string> = {
  latency: '',
  latency_ca: '_CA',
  latency_text_w_time: ' (Time in ms)',
};

const FAMILY_ORDER = Object.keys(FAMILY_SUFFIXES);

export function familySuffix(family: string): string {
  return FAMILY_SUFFIXES[family] ?? `_${family}`;
}

/**
 * Część wspólna rodzin metryk wszystkich instancji (w stałej kolejności:
 * znane rodziny, potem pozostałe alfabetycznie)
 */
export function commonMetricFamilies(instances: Instance[]): string[] {
  if (instances.length === 0) return [];

  let common = new Set(Object.keys(instances[0].metrics));
  for (const instance of instances.slice(1)) {
    const keys = new Set(Object.keys(instance.metrics));
    common = new Set([...common].filter(k => keys.has(k)));
  }

  const known = FAMILY_ORDER.filter(f => common.has(f));
  const others = [...common].filter(f => !(f in FAMILY_SUFFIXES)).sort();
  return [...known, ...others];
}

export function aggregateTextLatency(instances: Instance[]): TextLatencyReport {
  const families = commonMetricFamilies(instances);
  const report: TextLatencyReport = {};

  for (const metric of LATENCY_METRICS) {
    for (const family of families) {
      const values = instances.map(i => i.metrics[family][metric]);
      // rodzina bez tej metryki w którejś instancji - pomijamy tak samo jak brak rodziny
      if (values.some(v => v === undefined)) continue;
      report[metric + familySuffix(family)] = mean(values);
    }
  }

  return report;
}
