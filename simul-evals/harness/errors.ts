/**
 * Błędy silnika ewaluacji
 *
 * Błędy fatalne (naruszenie kontraktu sharda, duplikaty indeksów, brak narzędzi
 * zewnętrznych dla ścieżki mowy) są rzucane. Warunki odzyskiwalne (niezakończona
 * instancja, pusta hipoteza) są tylko logowane.
 */

export type SimulEvalErrorCode =
  | 'SHARD_RANGE'
  | 'DUPLICATE_INSTANCE'
  | 'INSTANCE_LOG'
  | 'EXTERNAL_TOOL'
  | 'ALIGNMENT_MISSING'
  | 'INVALID_PREDICTION';

export class SimulEvalError extends Error {
  readonly code: SimulEvalErrorCode;

  constructor(code: SimulEvalErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Indeks spoza [startIndex, endIndex) albo niepoprawny zakres sharda */
export class ShardRangeError extends SimulEvalError {
  constructor(message: string) {
    super('SHARD_RANGE', message);
  }
}

/** Ten sam indeks w scalanych logach - shardy nie były rozłączne */
export class DuplicateInstanceError extends SimulEvalError {
  readonly indices: number[];

  constructor(indices: number[], source?: string) {
    super(
      'DUPLICATE_INSTANCE',
      `Duplicate instance indices${source ? ` in ${source}` : ''}: ${indices.join(', ')} (overlapping shards?)`
    );
    this.indices = indices;
  }
}

export class InstanceLogError extends SimulEvalError {
  readonly logPath: string;
  readonly line?: number;

  constructor(logPath: string, message: string, line?: number) {
    super('INSTANCE_LOG', line !== undefined ? `${logPath}:${line}: ${message}` : `${logPath}: ${message}`);
    this.logPath = logPath;
    this.line = line;
  }
}

export class ExternalToolError extends SimulEvalError {
  readonly tool: string;

  constructor(tool: string, message: string) {
    super('EXTERNAL_TOOL', `${tool}: ${message}`);
    this.tool = tool;
  }
}

export class AlignmentMissingError extends SimulEvalError {
  readonly indices: number[];

  constructor(indices: number[], alignDir: string) {
    super(
      'ALIGNMENT_MISSING',
      `No alignment artifact in ${alignDir} for instances: ${indices.join(', ')}. Speech latency cannot be computed.`
    );
    this.indices = indices;
  }
}

export class InvalidPredictionError extends SimulEvalError {
  constructor(message: string) {
    super('INVALID_PREDICTION', message);
  }
}
