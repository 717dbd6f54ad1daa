/**
 * Data file location
 * Finds the bundled symbol table regardless of working directory
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';

export const DEFAULT_TABLE_FILENAME = 'ipa-symbols.csv';

/**
 * Get the data directory path
 * Uses import.meta.url to find package root, regardless of working directory
 */
export function getDataDir(customPath?: string): string {
  if (customPath) return customPath;
  if (process.env.IPASEG_DATA_DIR) return process.env.IPASEG_DATA_DIR;

  const __filename = fileURLToPath(import.meta.url);
  const __dirname = dirname(__filename);

  // Assumes structure: packages/data/src/data/paths.ts
  return path.join(__dirname, '../../data');
}

/**
 * Resolve which symbol table file to read: an explicit path, then
 * IPASEG_SYMBOL_TABLE, then the bundled table.
 */
export function resolveTablePath(explicitPath?: string): string {
  const chosen = explicitPath || process.env.IPASEG_SYMBOL_TABLE || path.join(getDataDir(), DEFAULT_TABLE_FILENAME);
  return path.resolve(chosen);
}
