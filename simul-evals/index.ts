/**
 * Simul Evals - główny eksport
 *
 * Ocena systemów tłumaczenia symultanicznego (tekst i mowa): instancje,
 * shardy, jakość (BLEU), opóźnienie (AP/AL/DAL), replay i scalanie logów.
 */

// Types
export * from './types/instance';
export * from './types/score';

// Harness
export * from './harness/errors';
export * from './harness/logger';
export { MemoryLogger, type RecordedLog } from './harness/memory-logger';
export * from './harness/corpus';
export * from './harness/simulation-runner';
export { writeFileAtomic } from './harness/atomic-write';

// Metrics
export * from './metrics/latency';
export * from './metrics/bleu';

// Instances
export { BaseInstance, measureSource, type InstanceState } from './instances/base-instance';
export { TextOutputInstance } from './instances/text-instance';
export { SpeechOutputInstance } from './instances/speech-instance';
export * from './instances/instance-table';

// Store & log
export * from './store/instance-store';
export * from './log/instance-log';

// Speech
export * from './speech/artifacts';
export * from './speech/textgrid';
export * from './speech/forced-aligner';
export * from './speech/asr-transcriber';
export * from './speech/speech-realignment';
export { encodeWav, writeWav } from './speech/wav';
export type { ToolAvailability } from './speech/external-tool';

// Scorer
export * from './scorer/quality-aggregator';
export * from './scorer/latency-aggregator';
export * from './scorer/sentence-level-scorer';
export * from './scorer/compute-score';
