/**
 * ASR Transcriber - transkrypcja syntetyzowanej mowy do oceny jakości
 *
 * Wynik: manifest TSV (asr_out/eval_asr_predictions.tsv) z kolumnami
 * `id` i `transcription`. Domyślny backend: whisper-cli (whisper.cpp).
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { checkExecutable, runTool, type ToolAvailability } from './external-tool';
import { ASR_MANIFEST } from './artifacts';
import { ExternalToolError } from '../harness/errors';
import { defaultLogger, type ScorerLogger } from '../harness/logger';

export interface TranscriptionRequest {
  audioDir: string;
  /** Pliki pośrednie (asr_prep_data/) */
  prepDir: string;
  /** Katalog manifestu (asr_out/) */
  outputDir: string;
}

export interface AsrTranscriber {
  readonly name: string;
  checkAvailability(): Promise<ToolAvailability>;
  /** Zwraca ścieżkę manifestu TSV */
  transcribe(request: TranscriptionRequest): Promise<string>;
}

export interface AsrManifestEntry {
  id: string;
  transcription: string;
}

// ============================================================================
// MANIFEST
// ============================================================================

export function formatAsrManifest(entries: AsrManifestEntry[]): string {
  const clean = (text: string): string => text.replace(/[\t\r\n]+/g, ' ').trim();
  return ['id\ttranscription', ...entries.map(e => `${e.id}\t${clean(e.transcription)}`)].join('\n') + '\n';
}

export function parseAsrManifest(content: string): AsrManifestEntry[] {
  const lines = content.split(/\r?\n/).filter(l => l.trim().length > 0);
  if (lines.length === 0) return [];

  const header = lines[0].split('\t');
  const idColumn = header.indexOf('id');
  const textColumn = header.indexOf('transcription');
  if (idColumn < 0 || textColumn < 0) {
    throw new Error(`ASR manifest header must contain "id" and "transcription" columns, got: ${lines[0]}`);
  }

  return lines.slice(1).map(line => {
    const columns = line.split('\t');
    return {
      id: columns[idColumn] ?? '',
      transcription: (columns[textColumn] ?? '').toLowerCase(),
    };
  });
}

// ============================================================================
// WHISPER-CPP BACKEND
// ============================================================================

export interface WhisperTranscriberOptions {
  executable?: string;
  modelsDir?: string;
  model?: string;
  language?: string;
  logger?: ScorerLogger;
}

export class WhisperCppTranscriber implements AsrTranscriber {
  readonly name = 'whisper-cpp';

  private readonly executable: string;
  private readonly modelPath: string;
  private readonly language: string;
  private readonly logger: ScorerLogger;

  constructor(options: WhisperTranscriberOptions = {}) {
    const modelsDir = options.modelsDir ?? path.join(os.homedir(), '.whisper-cpp-models');
    this.executable = options.executable ?? 'whisper-cli';
    this.modelPath = path.join(modelsDir, `ggml-${options.model ?? 'medium'}.bin`);
    this.language = options.language ?? 'en';
    this.logger = options.logger ?? defaultLogger;
  }

  async checkAvailability(): Promise<ToolAvailability> {
    if (!fs.existsSync(this.modelPath)) {
      return { available: false, error: `Whisper model not found: ${this.modelPath}` };
    }
    return checkExecutable(this.executable, ['--help'], 'Install: brew install whisper-cpp');
  }

  async transcribe(request: TranscriptionRequest): Promise<string> {
    if (!fs.existsSync(request.audioDir)) {
      throw new ExternalToolError(this.name, `audio directory not found: ${request.audioDir}`);
    }

    fs.mkdirSync(request.prepDir, { recursive: true });
    fs.mkdirSync(request.outputDir, { recursive: true });

    const wavs = fs.readdirSync(request.audioDir).filter(f => f.endsWith('.wav')).sort();
    const entries: AsrManifestEntry[] = [];

    this.logger.info('WhisperCpp', `Transcribing ${wavs.length} files (lang: ${this.language})`);

    for (const wav of wavs) {
      const id = wav.replace(/\.wav$/, '');
      const outputBase = path.join(request.prepDir, id);

      await runTool(this.executable, [
        '-m', this.modelPath,
        '-l', this.language,
        '-otxt',
        '-of', outputBase,
        '-f', path.join(request.audioDir, wav),
      ]);

      const txtFile = `${outputBase}.txt`;
      const text = fs.existsSync(txtFile) ? fs.readFileSync(txtFile, 'utf-8') : '';
      entries.push({ id, transcription: text.replace(/\s+/g, ' ').trim().toLowerCase() });
    }

    const manifestPath = path.join(request.outputDir, ASR_MANIFEST);
    fs.writeFileSync(manifestPath, formatAsrManifest(entries), 'utf-8');
    return manifestPath;
  }
}
