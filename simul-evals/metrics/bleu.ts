/**
 * Corpus BLEU (zgodny z sacreBLEU: tokenizer 13a, wygładzanie 'exp', 4-gramy)
 *
 * Domyślna implementacja QualityScorer. Puste hipotezy są liczone jak najgorszy
 * przypadek (brak dopasowań), nie przerywają obliczeń.
 */

export type QualityScorer = (hypotheses: string[], references: string[]) => number;

const MAX_NGRAM_ORDER = 4;

// ============================================================================
// TOKENIZER 13a
// ============================================================================

const TOKENIZE_RULES: Array<[RegExp, string]> = [
  // interpunkcja i symbole
  [/([\{-\~\[-\` -\&\(-\+\:-\@\/])/g, ' $1 '],
  // kropka i przecinek, chyba że poprzedza je cyfra
  [/([^0-9])([\.,])/g, '$1 $2 '],
  // kropka i przecinek, chyba że następuje po nich cyfra
  [/([\.,])([^0-9])/g, ' $1 $2'],
  // myślnik po cyfrze
  [/([0-9])(-)/g, '$1 $2 '],
];

export function tokenize13a(line: string): string[] {
  let text = line.replace(/<skipped>/g, '').replace(/-\n/g, '').replace(/\n/g, ' ');

  if (text.includes('&')) {
    text = text
      .replace(/&quot;/g, '"')
      .replace(/&amp;/g, '&')
      .replace(/&lt;/g, '<')
      .replace(/&gt;/g, '>');
  }

  text = ` ${text} `;
  for (const [pattern, replacement] of TOKENIZE_RULES) {
    text = text.replace(pattern, replacement);
  }

  return text.split(/\s+/).filter(token => token.length > 0);
}

// ============================================================================
// STATYSTYKI
// ============================================================================

interface BleuStats {
  correct: number[];
  total: number[];
  sysLen: number;
  refLen: number;
}

function countNgrams(tokens: string[], order: number): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i + order <= tokens.length; i++) {
    const key = tokens.slice(i, i + order).join(' ');
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

function sentenceStats(hypothesis: string[], reference: string[]): BleuStats {
  const correct: number[] = [];
  const total: number[] = [];

  for (let n = 1; n <= MAX_NGRAM_ORDER; n++) {
    const hypNgrams = countNgrams(hypothesis, n);
    const refNgrams = countNgrams(reference, n);
    let matches = 0;
    for (const [ngram, count] of hypNgrams) {
      matches += Math.min(count, refNgrams.get(ngram) ?? 0);
    }
    correct.push(matches);
    total.push(Math.max(0, hypothesis.length - n + 1));
  }

  return { correct, total, sysLen: hypothesis.length, refLen: reference.length };
}

function scoreFromStats(stats: BleuStats): number {
  if (!stats.correct.some(c => c > 0)) {
    return 0;
  }

  const precisions = new Array<number>(MAX_NGRAM_ORDER).fill(0);
  let smooth = 1;

  for (let n = 0; n < MAX_NGRAM_ORDER; n++) {
    if (stats.total[n] === 0) break;
    if (stats.correct[n] === 0) {
      smooth *= 2;
      precisions[n] = 100 / (smooth * stats.total[n]);
    } else {
      precisions[n] = (100 * stats.correct[n]) / stats.total[n];
    }
  }

  if (precisions.some(p => p === 0)) {
    return 0;
  }

  let brevityPenalty = 1;
  if (stats.sysLen < stats.refLen) {
    brevityPenalty = stats.sysLen > 0 ? Math.exp(1 - stats.refLen / stats.sysLen) : 0;
  }

  const logSum = precisions.reduce((sum, p) => sum + Math.log(p), 0);
  return brevityPenalty * Math.exp(logSum / MAX_NGRAM_ORDER);
}

// ============================================================================
// CORPUS BLEU
// ============================================================================

export const corpusBleu: QualityScorer = (hypotheses, references) => {
  if (hypotheses.length !== references.length) {
    throw new Error(`BLEU: ${hypotheses.length} hypotheses but ${references.length} references`);
  }

  const stats: BleuStats = {
    correct: new Array<number>(MAX_NGRAM_ORDER).fill(0),
    total: new Array<number>(MAX_NGRAM_ORDER).fill(0),
    sysLen: 0,
    refLen: 0,
  };

  for (let i = 0; i < hypotheses.length; i++) {
    const s = sentenceStats(tokenize13a(hypotheses[i]), tokenize13a(references[i]));
    for (let n = 0; n < MAX_NGRAM_ORDER; n++) {
      stats.correct[n] += s.correct[n];
      stats.total[n] += s.total[n];
    }
    stats.sysLen += s.sysLen;
    stats.refLen += s.refLen;
  }

  return scoreFromStats(stats);
};
