/**
 * Logger zapamiętujący diagnostyki scorera zamiast drukować je na konsolę.
 * Testy sprawdzają przez niego ostrzeżenia o wymuszonych i pustych instancjach.
 */

import type { LogLevel, ScorerLogger } from './logger';

export interface RecordedLog {
  level: LogLevel;
  source: string;
  message: string;
  data?: unknown;
}

export class MemoryLogger implements ScorerLogger {
  private recorded: RecordedLog[] = [];

  info(source: string, message: string, data?: unknown): void {
    this.record('info', source, message, data);
  }

  error(source: string, message: string, data?: unknown): void {
    this.record('error', source, message, data);
  }

  debug(source: string, message: string, data?: unknown): void {
    this.record('debug', source, message, data);
  }

  warn(source: string, message: string, data?: unknown): void {
    this.record('warn', source, message, data);
  }

  /** Ostrzeżenia w kolejności zgłoszenia */
  getWarnings(): RecordedLog[] {
    return this.recorded.filter(entry => entry.level === 'warn');
  }

  clear(): void {
    this.recorded = [];
  }

  private record(level: LogLevel, source: string, message: string, data: unknown): void {
    this.recorded.push(data === undefined ? { level, source, message } : { level, source, message, data });
  }
}
