#!/usr/bin/env node
/**
 * CLI do oceny katalogów logów symulacji
 *
 * Użycie:
 *   npx tsx cli/score.ts score results/run-1
 *   npx tsx cli/score.ts score results/run-1 --label baseline --save
 *   npx tsx cli/score.ts merge results/merged results/shard-0 results/shard-1
 *   npx tsx cli/score.ts history --limit 10
 */

import { computeScore, formatReport, mergeLogdirs, ConsoleLogger } from '../simul-evals';
import { createSpeechTools, loadScoringConfig } from '../api/config/scoring';
import { ScoreHistoryStore } from '../api/services/score-history-store';
import { parseArgs, type CliArgs } from './args';

function printHelp(): void {
  console.log(`
Simul Evals CLI - ocena tłumaczenia symultanicznego

Użycie:
  npx tsx cli/score.ts <komenda> [opcje]

Komendy:
  score <logdir>               Oceń katalog logów, zapisz <logdir>/scores
  merge <output> <logdir...>   Scal logi shardów do jednego katalogu
  history                      Pokaż zapisane oceny

Opcje:
  --label <etykieta>   Etykieta oceny (score)
  --save               Zapisz ocenę w historii (score)
  --limit <n>          Liczba wyników (history, domyślnie 20)
  --verbose, -v        Szczegółowe logi
  --help, -h           Pokaż pomoc

Przykłady:
  npx tsx cli/score.ts score results/run-1 --label baseline --save
  npx tsx cli/score.ts merge results/merged results/shard-0 results/shard-1
`);
}

// ============================================================================
// COMMANDS
// ============================================================================

async function runScore(args: CliArgs): Promise<number> {
  const [logdir] = args.positional;
  if (!logdir) {
    console.error('Missing <logdir>');
    return 1;
  }

  const config = loadScoringConfig();
  const logger = new ConsoleLogger(args.verbose === true);
  const result = await computeScore(logdir, { ...createSpeechTools(config, logger), logger });

  console.log(formatReport(result.report));
  console.log(`\n[Score] ${result.mode} scores written to ${result.scoresPath}`);

  if (args.save) {
    const store = new ScoreHistoryStore(config.SCORE_HISTORY_DB);
    try {
      const run = store.saveRun({ logdir, mode: result.mode, label: args.label, report: result.report });
      console.log(`[Score] Saved run ${run.id}`);
    } finally {
      store.close();
    }
  }

  return 0;
}

function runMerge(args: CliArgs): number {
  const [output, ...logdirs] = args.positional;
  if (!output || logdirs.length === 0) {
    console.error('Usage: merge <output> <logdir...>');
    return 1;
  }

  const result = mergeLogdirs(logdirs, output, new ConsoleLogger(args.verbose === true));
  console.log(`[Merge] ${result.instances} instances, ${result.copiedArtifacts} artifacts → ${result.output}`);
  return 0;
}

function runHistory(args: CliArgs): number {
  const limit = args.limit !== undefined && Number.isInteger(args.limit) && args.limit > 0 ? args.limit : 20;
  const store = new ScoreHistoryStore(loadScoringConfig().SCORE_HISTORY_DB);

  try {
    const runs = store.listRuns(limit);
    if (runs.length === 0) {
      console.log('No saved scores');
      return 0;
    }
    for (const run of runs) {
      console.log(
        `${run.createdDate}  ${run.id}  ${run.mode.padEnd(6)}  BLEU ${run.report.Quality.BLEU.toFixed(2).padStart(6)}  ${run.label ?? '-'}  ${run.logdir}`
      );
    }
    return 0;
  } finally {
    store.close();
  }
}

// ============================================================================
// MAIN
// ============================================================================

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help || !args.command) {
    printHelp();
    return args.help ? 0 : 1;
  }

  switch (args.command) {
    case 'score':
      return runScore(args);
    case 'merge':
      return runMerge(args);
    case 'history':
      return runHistory(args);
  }
}

main()
  .then(code => process.exit(code))
  .catch((err) => {
    console.error('[CLI] Error:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
