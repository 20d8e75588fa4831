/**
 * Score History Store - SQLite persistence
 *
 * Przechowuje wyniki computeScore (raport jako JSON) z etykietą i trybem.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { ScoreReport, ScoringMode } from '../../simul-evals';

// ============================================================================
// SCHEMA
// ============================================================================

const SCHEMA = `
CREATE TABLE IF NOT EXISTS score_runs (
  id TEXT PRIMARY KEY,
  logdir TEXT NOT NULL,
  mode TEXT NOT NULL,
  label TEXT,
  report TEXT NOT NULL,
  createdDate TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_score_runs_created ON score_runs(createdDate);
CREATE INDEX IF NOT EXISTS idx_score_runs_logdir ON score_runs(logdir);
`;

const latencyMetricsSchema = z.object({ AL: z.number(), AP: z.number(), DAL: z.number() });

const reportSchema = z.object({
  Quality: z.object({ BLEU: z.number() }),
  Latency: z.union([
    z.record(z.string(), z.number()),
    z.object({ BOW: latencyMetricsSchema, EOW: latencyMetricsSchema, COW: latencyMetricsSchema }).partial(),
  ]),
});

const rowSchema = z.object({
  id: z.string(),
  logdir: z.string(),
  mode: z.enum(['text', 'speech']),
  label: z.string().nullable(),
  report: z.string(),
  createdDate: z.string(),
});

export interface ScoreRun {
  id: string;
  logdir: string;
  mode: ScoringMode;
  label: string | null;
  report: ScoreReport;
  createdDate: string;
}

export interface ScoreRunInput {
  logdir: string;
  mode: ScoringMode;
  label?: string;
  report: ScoreReport;
}

function toRun(raw: unknown): ScoreRun {
  const row = rowSchema.parse(raw);
  const report = reportSchema.parse(JSON.parse(row.report));
  return { ...row, report };
}

// ============================================================================
// STORE
// ============================================================================

export class ScoreHistoryStore {
  private db: Database.Database;

  /**
   * @param dbPath - plik bazy albo ':memory:'
   */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }

    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(SCHEMA);
  }

  saveRun(input: ScoreRunInput): ScoreRun {
    const run: ScoreRun = {
      id: uuidv4(),
      logdir: input.logdir,
      mode: input.mode,
      label: input.label ?? null,
      report: input.report,
      createdDate: new Date().toISOString(),
    };

    this.db.prepare(`
      INSERT INTO score_runs (id, logdir, mode, label, report, createdDate)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(run.id, run.logdir, run.mode, run.label, JSON.stringify(run.report), run.createdDate);

    return run;
  }

  getRun(id: string): ScoreRun | undefined {
    const row: unknown = this.db.prepare('SELECT * FROM score_runs WHERE id = ?').get(id);
    return row === undefined ? undefined : toRun(row);
  }

  listRuns(limit = 50): ScoreRun[] {
    const rows: unknown[] = this.db
      .prepare('SELECT * FROM score_runs ORDER BY createdDate DESC, rowid DESC LIMIT ?')
      .all(limit);
    return rows.map(toRun);
  }

  deleteRun(id: string): boolean {
    const result = this.db.prepare('DELETE FROM score_runs WHERE id = ?').run(id);
    return result.changes > 0;
  }

  close(): void {
    this.db.close();
  }
}
