/**
 * Katalog roboczy o zasięgu jednego wywołania narzędzia
 *
 * Czyszczony i tworzony od nowa na starcie, usuwany na każdej ścieżce wyjścia.
 */

import fs from 'fs';

export function resetDirectory(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
  fs.mkdirSync(dir, { recursive: true });
}

export async function withScopedDirectory<T>(dir: string, fn: (dir: string) => Promise<T>): Promise<T> {
  resetDirectory(dir);
  try {
    return await fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
