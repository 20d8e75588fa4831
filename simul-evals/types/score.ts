/**
 * Typy raportu wyników
 */

export type BoundaryConvention = 'BOW' | 'EOW' | 'COW';

export const BOUNDARY_CONVENTIONS: readonly BoundaryConvention[] = ['BOW', 'EOW', 'COW'];

export type LatencyMetricName = 'AL' | 'AP' | 'DAL';

export const LATENCY_METRICS: readonly LatencyMetricName[] = ['AL', 'AP', 'DAL'];

export type LatencyMetrics = Record<LatencyMetricName, number>;

export interface QualityScore {
  BLEU: number;
}

/** Ścieżka tekstowa: AL, AP, DAL + warianty z sufiksem rodziny (AL_CA, ...) */
export type TextLatencyReport = Record<string, number>;

/** Ścieżka mowy: jeden pod-raport na konwencję granicy słowa */
export type SpeechLatencyReport = Partial<Record<BoundaryConvention, LatencyMetrics>>;

export interface ScoreReport<L = TextLatencyReport | SpeechLatencyReport> {
  Quality: QualityScore;
  Latency: L;
}

export type ScoringMode = 'text' | 'speech';

/** Przedział [startIndex, endIndex) korpusu */
export interface Shard {
  startIndex: number;
  endIndex: number;
}

/** Przedział interwału słowa z alignera (sekundy) */
export interface WordInterval {
  label: string;
  minTime: number;
  maxTime: number;
}
