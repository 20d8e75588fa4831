/**
 * Zastępniki ASR i alignera działające w procesie testów
 */

import fs from 'fs';
import path from 'path';
import { formatAsrManifest, type AsrManifestEntry, type AsrTranscriber, type TranscriptionRequest } from '../../speech/asr-transcriber';
import { ASR_MANIFEST } from '../../speech/artifacts';
import type { AlignmentRequest, ForcedAligner } from '../../speech/forced-aligner';
import type { ToolAvailability } from '../../speech/external-tool';
import type { InstanceRecord } from '../../types/instance';
import type { WordInterval } from '../../types/score';

export class FakeTranscriber implements AsrTranscriber {
  readonly name = 'fake-asr';
  calls: TranscriptionRequest[] = [];

  constructor(
    private readonly entries: AsrManifestEntry[],
    private readonly availability: ToolAvailability = { available: true }
  ) {}

  async checkAvailability(): Promise<ToolAvailability> {
    return this.availability;
  }

  async transcribe(request: TranscriptionRequest): Promise<string> {
    this.calls.push(request);
    const manifestPath = path.join(request.outputDir, ASR_MANIFEST);
    fs.writeFileSync(manifestPath, formatAsrManifest(this.entries));
    return manifestPath;
  }
}

export function textGrid(intervals: WordInterval[]): string {
  const xmax = intervals.length > 0 ? intervals[intervals.length - 1].maxTime : 0;
  const lines = [
    'File type = "ooTextFile"',
    'Object class = "TextGrid"',
    '',
    'xmin = 0',
    `xmax = ${xmax}`,
    'tiers? <exists>',
    'size = 2',
    'item []:',
    '    item [1]:',
    '        class = "IntervalTier"',
    '        name = "words"',
    '        xmin = 0',
    `        xmax = ${xmax}`,
    `        intervals: size = ${intervals.length}`,
  ];
  intervals.forEach((interval, i) => {
    lines.push(
      `        intervals [${i + 1}]:`,
      `            xmin = ${interval.minTime}`,
      `            xmax = ${interval.maxTime}`,
      `            text = "${interval.label}"`
    );
  });
  lines.push(
    '    item [2]:',
    '        class = "IntervalTier"',
    '        name = "phones"',
    '        xmin = 0',
    `        xmax = ${xmax}`,
    '        intervals: size = 1',
    '        intervals [1]:',
    '            xmin = 0',
    `            xmax = ${xmax}`,
    '            text = "AH0"'
  );
  return lines.join('\n') + '\n';
}

/**
 * Aligner zapisujący gotowe TextGridy dla podanych indeksów
 */
export class FakeAligner implements ForcedAligner {
  readonly name = 'fake-mfa';
  calls: AlignmentRequest[] = [];
  transcriptsSeen: Record<string, string> = {};

  constructor(
    private readonly grids: Record<number, WordInterval[]>,
    private readonly availability: ToolAvailability = { available: true },
    private readonly failure?: Error
  ) {}

  async checkAvailability(): Promise<ToolAvailability> {
    return this.availability;
  }

  async align(request: AlignmentRequest): Promise<void> {
    this.calls.push(request);
    for (const file of fs.readdirSync(request.audioDir).filter(f => f.endsWith('.txt'))) {
      this.transcriptsSeen[file] = fs.readFileSync(path.join(request.audioDir, file), 'utf-8').trim();
    }

    fs.mkdirSync(request.scratchDir, { recursive: true });
    for (const [index, intervals] of Object.entries(this.grids)) {
      fs.writeFileSync(path.join(request.outputDir, `${index}_pred.TextGrid`), textGrid(intervals));
    }

    if (this.failure) throw this.failure;
  }
}

export function speechRecord(index: number, overrides: Partial<InstanceRecord> = {}): InstanceRecord {
  return {
    index,
    sourceType: 'speech',
    targetType: 'speech',
    reference: 'hello world',
    prediction: '',
    predictionLength: 1,
    delays: [1000],
    elapsed: [],
    durations: [800],
    sourceLength: 2000,
    finished: true,
    metrics: { latency: { AL: 1000, AP: 0.5, DAL: 1000 } },
    ...overrides,
  };
}
