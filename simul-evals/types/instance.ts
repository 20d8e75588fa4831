/**
 * Typy instancji - pojedynczy przykład (zdanie / wypowiedź) symulacji strumieniowej
 *
 * Instancja jest jedynym miejscem, które zna różnicę między wyjściem tekstowym
 * a mowy. Agregatory operują wyłącznie na interfejsie `Instance`.
 */

// ============================================================================
// WARIANTY
// ============================================================================

export type SourceType = 'text' | 'speech';
export type TargetType = 'text' | 'speech';

/** Rodzina metryk → nazwa metryki → wartość (np. latency → AL → 3.5) */
export type MetricsMap = Record<string, Record<string, number>>;

/** Znacznik końca predykcji w wyjściu tekstowym */
export const END_OF_SENTENCE = '</s>';

// ============================================================================
// ŹRÓDŁO
// ============================================================================

export interface TextSource {
  kind: 'text';
  tokens: string[];
}

export interface SpeechSource {
  kind: 'speech';
  samples: number[];
  sampleRate: number;
}

export type SourceContent = TextSource | SpeechSource;

/** Segment źródła odsłonięty przez `sendSource` */
export interface SourceSegment {
  segmentId: number;
  /** Tokeny (źródło tekstowe) albo próbki audio (źródło mowy) */
  content: string[] | number[];
  /** Dla źródła mowy - częstotliwość próbkowania */
  sampleRate?: number;
  /** Czy źródło zostało odsłonięte w całości */
  finished: boolean;
}

export interface SendSourceResult extends SourceSegment {
  instanceId: number;
}

// ============================================================================
// PREDYKCJA
// ============================================================================

export interface TextOutput {
  kind: 'text';
  /** Jeden lub więcej tokenów rozdzielonych spacjami; `</s>` kończy predykcję */
  text: string;
}

export interface SpeechOutput {
  kind: 'speech';
  samples: number[];
  sampleRate: number;
}

export type PredictionOutput = TextOutput | SpeechOutput;

export interface ReceiveOptions {
  /** Czas obliczeń agenta (ms) od poprzedniego zapisu */
  computeMs?: number;
  /** Agent zakończył predykcję wraz z tym zapisem */
  finished?: boolean;
}

// ============================================================================
// PODSUMOWANIE I LOG
// ============================================================================

export interface DelayEntry {
  /** Token (wyjście tekstowe) albo długość segmentu audio w ms (wyjście mowy) */
  unit: string | number;
  /** Opóźnienie emisji - w jednostkach źródła (tokeny albo ms) */
  offset: number;
}

export interface InstanceSummary {
  index: number;
  prediction: string;
  reference: string;
  sourceLength: number;
  delays: DelayEntry[];
  elapsed: number[];
  metrics: MetricsMap;
}

/** Jedna linia `instances.log` */
export interface InstanceRecord {
  index: number;
  sourceType: SourceType;
  targetType: TargetType;
  reference: string;
  prediction: string;
  predictionLength: number;
  delays: number[];
  elapsed: number[];
  durations: number[];
  sourceLength: number;
  finished: boolean;
  metrics: MetricsMap;
}

// ============================================================================
// INTERFEJS INSTANCJI
// ============================================================================

export interface Instance {
  readonly index: number;
  readonly sourceType: SourceType;
  readonly targetType: TargetType;
  readonly reference: string;
  readonly prediction: string;
  readonly finishPrediction: boolean;
  readonly sourceLength: number;
  readonly metrics: MetricsMap;
  /** Czy całe źródło zostało już odsłonięte */
  readonly sourceFinished: boolean;

  sendSource(segmentSize: number): SourceSegment;
  receivePrediction(output: PredictionOutput, options?: ReceiveOptions): void;
  /** Wymusza zakończenie i ocenę bieżącej (być może niepełnej) predykcji */
  sentenceLevelEval(): void;
  summarize(): InstanceSummary;
  toRecord(): InstanceRecord;
}
