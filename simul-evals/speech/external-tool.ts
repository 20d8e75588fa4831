/**
 * Uruchamianie narzędzi zewnętrznych (aligner, ASR) jako procesów potomnych
 */

import { spawn, execFile } from 'child_process';
import { promisify } from 'util';
import { ExternalToolError } from '../harness/errors';

const execFileAsync = promisify(execFile);

export interface ToolAvailability {
  available: boolean;
  error?: string;
}

/**
 * Sprawdza, czy narzędzie da się uruchomić (np. `mfa version`)
 */
export async function checkExecutable(
  executable: string,
  args: string[],
  installHint: string
): Promise<ToolAvailability> {
  try {
    await execFileAsync(executable, args, { timeout: 10000 });
    return { available: true };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { available: false, error: `${executable} not available (${reason}). ${installHint}` };
  }
}

/**
 * Uruchamia narzędzie i czeka na zakończenie. Niezerowy kod wyjścia albo brak
 * pliku wykonywalnego → ExternalToolError z końcówką stderr.
 */
export async function runTool(executable: string, args: string[]): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const proc = spawn(executable, args, { stdio: 'pipe' });
    let stderr = '';

    proc.stderr.on('data', (data: Buffer) => {
      stderr = (stderr + data.toString()).slice(-4000);
    });

    proc.on('close', (code: number | null) => {
      if (code === 0) resolve();
      else reject(new ExternalToolError(executable, `exited with code ${code}\n${stderr.trim()}`));
    });

    proc.on('error', (err: Error) => {
      reject(new ExternalToolError(executable, `failed to start: ${err.message}`));
    });
  });
}
