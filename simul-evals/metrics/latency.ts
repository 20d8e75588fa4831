/**
 * Metryki opóźnienia dla tłumaczenia symultanicznego
 *
 * - AP  (Average Proportion) - średnia część źródła odczytana przed emisją
 * - AL  (Average Lagging) - średnie opóźnienie względem idealnego tłumacza
 * - DAL (Differentiable Average Lagging) - AL z wymuszoną minimalną przerwą 1/gamma
 *
 * `delays[i]` to ilość źródła (tokeny albo ms) odczytana przed emisją i-tej jednostki.
 * Ta sama funkcja obsługuje ścieżkę tekstową i realignment mowy.
 */

import type { LatencyMetrics } from '../types/score';

export function averageProportion(delays: number[], sourceLength: number): number {
  const total = delays.reduce((a, b) => a + b, 0);
  return total / (sourceLength * delays.length);
}

/**
 * @param targetLength - długość celu użyta do gamma; max(emisje, referencja)
 */
export function averageLagging(delays: number[], sourceLength: number, targetLength: number): number {
  if (delays[0] > sourceLength) {
    return delays[0];
  }

  const gamma = targetLength / sourceLength;
  let lagging = 0;
  let tau = 0;

  for (let t = 0; t < delays.length; t++) {
    const d = delays[t];
    lagging += d - t / gamma;
    tau = t + 1;
    if (d >= sourceLength) break;
  }

  return lagging / tau;
}

export function differentiableAverageLagging(delays: number[], sourceLength: number): number {
  const gamma = delays.length / sourceLength;
  let lagging = 0;
  let previous = 0;

  for (let i = 0; i < delays.length; i++) {
    const adjusted = i === 0 ? delays[i] : Math.max(delays[i], previous + 1 / gamma);
    lagging += adjusted - i / gamma;
    previous = adjusted;
  }

  return lagging / delays.length;
}

/**
 * Oblicza AL, AP i DAL dla jednej instancji.
 *
 * Pusta sekwencja opóźnień liczona jest jak jedna emisja po odczytaniu
 * całego źródła. Zerowa długość źródła jest podnoszona do 1.
 */
export function evalAllLatency(
  delays: number[],
  sourceLength: number,
  referenceLength?: number
): LatencyMetrics {
  const source = sourceLength > 0 ? sourceLength : 1;
  const effective = delays.length > 0 ? delays : [source];
  const targetLength = Math.max(effective.length, referenceLength ?? 0);

  return {
    AL: averageLagging(effective, source, targetLength),
    AP: averageProportion(effective, source),
    DAL: differentiableAverageLagging(effective, source),
  };
}

/** Średnia arytmetyczna (nieważona) */
export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Liczba słów referencji (podział po białych znakach) */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}
