/**
 * Forced Aligner - interfejs i implementacja Montreal Forced Aligner (mfa)
 *
 * Dla każdego wavs/<index>_pred.wav (+ transkrypcja <index>_pred.txt) aligner
 * zapisuje align/<index>_pred.TextGrid z interwałami słów.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { checkExecutable, runTool, type ToolAvailability } from './external-tool';
import { withScopedDirectory } from './scoped-dir';
import { ExternalToolError } from '../harness/errors';
import { defaultLogger, type ScorerLogger } from '../harness/logger';

export interface AlignmentRequest {
  /** Katalog z audio i transkrypcjami */
  audioDir: string;
  /** Katalog wynikowy TextGrid */
  outputDir: string;
  /** Katalog roboczy - własność jednego wywołania */
  scratchDir: string;
}

export interface ForcedAligner {
  readonly name: string;
  checkAvailability(): Promise<ToolAvailability>;
  align(request: AlignmentRequest): Promise<void>;
}

export interface MfaAlignerOptions {
  executable?: string;
  /** Katalog pretrained_models MFA */
  modelsDir?: string;
  acousticModel?: string;
  dictionary?: string;
  logger?: ScorerLogger;
}

export class MfaForcedAligner implements ForcedAligner {
  readonly name = 'mfa';

  private readonly executable: string;
  private readonly modelsDir: string;
  private readonly acousticModel: string;
  private readonly dictionary: string;
  private readonly logger: ScorerLogger;

  constructor(options: MfaAlignerOptions = {}) {
    this.executable = options.executable ?? 'mfa';
    this.modelsDir = options.modelsDir ?? path.join(os.homedir(), 'Documents', 'MFA', 'pretrained_models');
    this.acousticModel = options.acousticModel ?? 'english_mfa';
    this.dictionary = options.dictionary ?? 'english_mfa';
    this.logger = options.logger ?? defaultLogger;
  }

  checkAvailability(): Promise<ToolAvailability> {
    return checkExecutable(this.executable, ['version'], 'Install Montreal Forced Aligner: conda install -c conda-forge montreal-forced-aligner');
  }

  async align(request: AlignmentRequest): Promise<void> {
    const acousticSource = path.join(this.modelsDir, 'acoustic', `${this.acousticModel}.zip`);
    const dictionarySource = path.join(this.modelsDir, 'dictionary', `${this.dictionary}.dict`);

    for (const file of [acousticSource, dictionarySource]) {
      if (!fs.existsSync(file)) {
        throw new ExternalToolError(this.name, `model file not found: ${file}. Run: mfa model download`);
      }
    }

    await withScopedDirectory(request.scratchDir, async scratch => {
      const acousticPath = path.join(scratch, 'acoustic.zip');
      const dictionaryPath = path.join(scratch, 'dict');
      fs.symlinkSync(acousticSource, acousticPath);
      fs.symlinkSync(dictionarySource, dictionaryPath);

      const args = [
        'align',
        request.audioDir,
        dictionaryPath,
        acousticPath,
        request.outputDir,
        '--clean',
        '--overwrite',
        '--temporary_directory', scratch,
      ];

      this.logger.info('MFA', `${this.executable} ${args.join(' ')}`);
      await runTool(this.executable, args);
    });
  }
}
