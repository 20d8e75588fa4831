/**
 * Zapis atomowy: plik tymczasowy w tym samym katalogu + rename
 */

import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';

export function writeFileAtomic(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });

  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${uuidv4()}.tmp`);
  try {
    fs.writeFileSync(tmpPath, content, 'utf-8');
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    fs.rmSync(tmpPath, { force: true });
    throw error;
  }
}
