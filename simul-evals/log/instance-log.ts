/**
 * Instance Log - zapis i odczyt instances.log
 *
 * Jedna linia JSON na instancję, dopisywana po zakończeniu instancji.
 * Każda linia zawiera swój indeks, więc scalanie shardów to suma linii,
 * a nie konkatenacja pozycyjna. Duplikat indeksu = nakładające się shardy (błąd fatalny).
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DuplicateInstanceError, InstanceLogError } from '../harness/errors';
import { defaultLogger, type ScorerLogger } from '../harness/logger';
import { INSTANCES_LOG, WAVS_DIR } from '../speech/artifacts';
import type { Instance, InstanceRecord } from '../types/instance';

const LOG_SOURCE = 'InstanceLog';

// ============================================================================
// SCHEMA
// ============================================================================

const metricsSchema = z.record(z.string(), z.record(z.string(), z.number()));

export const instanceRecordSchema = z.object({
  index: z.number().int().nonnegative(),
  sourceType: z.enum(['text', 'speech']),
  targetType: z.enum(['text', 'speech']),
  reference: z.string(),
  prediction: z.string(),
  predictionLength: z.number().int().nonnegative(),
  delays: z.array(z.number()),
  elapsed: z.array(z.number()).default([]),
  durations: z.array(z.number()).default([]),
  sourceLength: z.number(),
  finished: z.boolean(),
  metrics: metricsSchema.default({}),
});

export function serializeRecord(record: InstanceRecord): string {
  return JSON.stringify(record);
}

export function parseRecord(line: string, logPath: string, lineNumber: number): InstanceRecord {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    throw new InstanceLogError(logPath, `invalid JSON (${error instanceof Error ? error.message : String(error)})`, lineNumber);
  }

  const parsed = instanceRecordSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InstanceLogError(logPath, `invalid record: ${issue.path.join('.') || '(root)'} ${issue.message}`, lineNumber);
  }
  return parsed.data;
}

// ============================================================================
// ZAPIS
// ============================================================================

/** Dopisuje jedną zakończoną instancję do logu */
export function appendInstanceRecord(logPath: string, instance: Instance): void {
  fs.mkdirSync(path.dirname(logPath), { recursive: true });
  fs.appendFileSync(logPath, serializeRecord(instance.toRecord()) + '\n', 'utf-8');
}

/** Zapisuje cały log od nowa (instancje w kolejności indeksów) */
export function writeInstanceLog(logPath: string, records: InstanceRecord[]): void {
  fs.mkdirSync(path.dirname(logPath), { recursive: true });
  const sorted = [...records].sort((a, b) => a.index - b.index);
  fs.writeFileSync(logPath, sorted.map(r => serializeRecord(r) + '\n').join(''), 'utf-8');
}

// ============================================================================
// ODCZYT
// ============================================================================

export function readInstanceLog(logPath: string): InstanceRecord[] {
  if (!fs.existsSync(logPath)) {
    throw new InstanceLogError(logPath, 'log file not found');
  }

  const lines = fs.readFileSync(logPath, 'utf-8').split('\n');
  const records: InstanceRecord[] = [];

  lines.forEach((raw, i) => {
    const line = raw.trim();
    if (line.length === 0) return;
    records.push(parseRecord(line, logPath, i + 1));
  });

  return records;
}

/**
 * Scala logi wielu shardów. Każdy powtórzony indeks (w jednym pliku albo
 * między plikami) kończy się DuplicateInstanceError.
 */
export function readInstanceLogs(logPaths: string[]): InstanceRecord[] {
  const byIndex = new Map<number, InstanceRecord>();
  const duplicates = new Set<number>();

  for (const logPath of logPaths) {
    for (const record of readInstanceLog(logPath)) {
      if (byIndex.has(record.index)) {
        duplicates.add(record.index);
        continue;
      }
      byIndex.set(record.index, record);
    }
  }

  if (duplicates.size > 0) {
    throw new DuplicateInstanceError(
      [...duplicates].sort((a, b) => a - b),
      logPaths.length > 1 ? `${logPaths.length} merged logs` : logPaths[0]
    );
  }

  return [...byIndex.values()].sort((a, b) => a.index - b.index);
}

export function logPathFor(logdir: string): string {
  return path.join(logdir, INSTANCES_LOG);
}

// ============================================================================
// SCALANIE KATALOGÓW
// ============================================================================

export interface MergeResult {
  output: string;
  instances: number;
  copiedArtifacts: number;
}

/**
 * Scala katalogi logów shardów do jednego katalogu: instances.log (suma linii)
 * oraz artefakty wavs/ (nazwy zawierają indeks, więc nie kolidują).
 */
export function mergeLogdirs(
  logdirs: string[],
  outputDir: string,
  logger: ScorerLogger = defaultLogger
): MergeResult {
  const records = readInstanceLogs(logdirs.map(logPathFor));

  fs.mkdirSync(outputDir, { recursive: true });
  writeInstanceLog(logPathFor(outputDir), records);

  let copiedArtifacts = 0;
  for (const logdir of logdirs) {
    const wavsDir = path.join(logdir, WAVS_DIR);
    if (!fs.existsSync(wavsDir)) continue;

    const targetDir = path.join(outputDir, WAVS_DIR);
    fs.mkdirSync(targetDir, { recursive: true });
    for (const entry of fs.readdirSync(wavsDir)) {
      fs.copyFileSync(path.join(wavsDir, entry), path.join(targetDir, entry));
      copiedArtifacts++;
    }
  }

  logger.info(LOG_SOURCE, `Merged ${logdirs.length} logs into ${outputDir} (${records.length} instances)`);

  return { output: outputDir, instances: records.length, copiedArtifacts };
}
