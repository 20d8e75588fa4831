/**
 * Parser TextGrid (format długi, taki jak zapisuje Montreal Forced Aligner)
 *
 * Zwraca interwały pierwszej warstwy (u MFA: słowa).
 */

import type { WordInterval } from '../types/score';

const NUMBER_FIELD = /^(xmin|xmax)\s*=\s*([-+0-9.eE]+)\s*$/;
const TEXT_FIELD = /^(?:text|mark)\s*=\s*"(.*)"\s*$/;

export function parseTextGrid(content: string): WordInterval[] {
  const lines = content.split(/\r?\n/).map(l => l.trim());
  const intervals: WordInterval[] = [];

  let inFirstTier = false;
  let current: Partial<WordInterval> | null = null;

  for (const line of lines) {
    if (/^item\s*\[\d+\]\s*:/.test(line)) {
      if (inFirstTier) break; // druga warstwa - koniec
      inFirstTier = /^item\s*\[1\]/.test(line);
      continue;
    }
    if (!inFirstTier) continue;

    if (/^intervals\s*\[\d+\]\s*:/.test(line)) {
      current = {};
      continue;
    }
    if (!current) continue;

    const numberMatch = NUMBER_FIELD.exec(line);
    if (numberMatch) {
      const value = parseFloat(numberMatch[2]);
      if (numberMatch[1] === 'xmin') current.minTime = value;
      else current.maxTime = value;
      continue;
    }

    const textMatch = TEXT_FIELD.exec(line);
    if (textMatch && current.minTime !== undefined && current.maxTime !== undefined) {
      intervals.push({
        label: textMatch[1].replace(/""/g, '"').trim(),
        minTime: current.minTime,
        maxTime: current.maxTime,
      });
      current = null;
    }
  }

  return intervals;
}
