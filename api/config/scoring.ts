/**
 * Scoring Configuration - zmienne środowiskowe API i narzędzi mowy
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import { MfaForcedAligner, WhisperCppTranscriber, type ScorerLogger } from '../../simul-evals';

const expandHome = (value: string): string =>
  value.startsWith('~/') ? path.join(os.homedir(), value.slice(2)) : value;

const envSchema = z.object({
  SCORE_API_PORT: z.coerce.number().int().min(0).max(65535).default(3200),
  SCORE_API_HOST: z.string().min(1).default('0.0.0.0'),
  SCORE_HISTORY_DB: z.string().min(1).default('results/score-history.db'),
  MFA_MODELS_DIR: z.string().min(1).default('~/Documents/MFA/pretrained_models').transform(expandHome),
  MFA_ACOUSTIC_MODEL: z.string().min(1).default('english_mfa'),
  MFA_DICTIONARY: z.string().min(1).default('english_mfa'),
  WHISPER_MODELS_DIR: z.string().min(1).default('~/.whisper-cpp-models').transform(expandHome),
  WHISPER_MODEL: z.string().min(1).default('medium'),
  ASR_LANGUAGE: z.string().min(1).default('en'),
});

export type ScoringConfig = z.infer<typeof envSchema>;

/**
 * Parsuje środowisko; niepoprawna wartość → Error z listą pól
 */
export function loadScoringConfig(env: NodeJS.ProcessEnv = process.env): ScoringConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid scoring configuration: ${details}`);
  }
  return parsed.data;
}

export function createSpeechTools(config: ScoringConfig, logger?: ScorerLogger): {
  aligner: MfaForcedAligner;
  transcriber: WhisperCppTranscriber;
} {
  return {
    aligner: new MfaForcedAligner({
      modelsDir: config.MFA_MODELS_DIR,
      acousticModel: config.MFA_ACOUSTIC_MODEL,
      dictionary: config.MFA_DICTIONARY,
      logger,
    }),
    transcriber: new WhisperCppTranscriber({
      modelsDir: config.WHISPER_MODELS_DIR,
      model: config.WHISPER_MODEL,
      language: config.ASR_LANGUAGE,
      logger,
    }),
  };
}
