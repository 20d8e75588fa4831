/**
 * Logger silnika ewaluacji
 *
 * Ten sam kształt co logger agentów: (source, message, data?).
 * Domyślnie konsola z prefiksem `[Source]`; w testach MemoryLogger.
 */

export type LogLevel = 'info' | 'error' | 'debug' | 'warn';

export interface ScorerLogger {
  info(source: string, message: string, data?: unknown): void;
  error(source: string, message: string, data?: unknown): void;
  debug(source: string, message: string, data?: unknown): void;
  warn(source: string, message: string, data?: unknown): void;
}

export class ConsoleLogger implements ScorerLogger {
  constructor(private readonly verbose = false) {}

  info(source: string, message: string, data?: unknown): void {
    console.log(`[${source}] ${message}`, ...(data !== undefined ? [data] : []));
  }

  error(source: string, message: string, data?: unknown): void {
    console.error(`[${source}] ${message}`, ...(data !== undefined ? [data] : []));
  }

  debug(source: string, message: string, data?: unknown): void {
    if (!this.verbose) return;
    console.log(`[${source}] ${message}`, ...(data !== undefined ? [data] : []));
  }

  warn(source: string, message: string, data?: unknown): void {
    console.warn(`[${source}] ${message}`, ...(data !== undefined ? [data] : []));
  }
}

export const defaultLogger: ScorerLogger = new ConsoleLogger(process.env.SIMUL_EVAL_VERBOSE === '1');
