/**
 * Symbol table loading - CSV parsing and the per-path table cache
 *
 * The CSV has a header row. Columns Symbol, Description, Symbol-Display,
 * Name, Unicode, Type and Role fill the record; every other non-empty cell
 * becomes a feature keyed by its column name (Voice, Place, Manner, ...).
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { LRUCache } from 'lru-cache';
import {
  createSymbolTable,
  setSymbolTable,
  dp,
  SymbolTableError,
  type SymbolRecord,
  type SymbolTable
} from '@ipaseg/core';
import { resolveTablePath } from './paths.js';

export const REQUIRED_COLUMNS = ['Symbol', 'Type', 'Role'] as const;

const RECORD_COLUMNS = new Set([
  'Symbol', 'Description', 'Symbol-Display', 'Name', 'Unicode', 'Type', 'Role'
]);

type CsvRow = Record<string, string>;

function isCsvRow(value: unknown): value is CsvRow {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(cell => typeof cell === 'string');
}

function rowToRecord(row: CsvRow, line: number): SymbolRecord {
  const symbol = row['Symbol'] ?? '';
  if (!symbol) {
    throw new SymbolTableError(`Row ${line}: empty Symbol`);
  }

  const features: Record<string, string> = {};
  for (const [column, value] of Object.entries(row)) {
    if (!RECORD_COLUMNS.has(column) && value !== '') {
      features[column] = value;
    }
  }

  return {
    symbol,
    description: row['Description'] ?? '',
    display: row['Symbol-Display'] || symbol,
    name: row['Name'] ?? '',
    unicode: (row['Unicode'] ?? '').split(/\s+/).filter(Boolean),
    type: row['Type'] ?? '',
    role: row['Role'] ?? '',
    features
  };
}

/**
 * Parse symbol table CSV text into records
 */
export function parseSymbolRecords(content: string): SymbolRecord[] {
  const rows: unknown = parse(content, {
    columns: true,
    bom: true,
    skip_empty_lines: true
  });

  if (!Array.isArray(rows)) {
    throw new SymbolTableError('Symbol table CSV did not parse into rows');
  }
  if (rows.length === 0) {
    return [];
  }

  const records: SymbolRecord[] = [];
  rows.forEach((row: unknown, i: number) => {
    // Line 1 is the header
    const line = i + 2;
    if (!isCsvRow(row)) {
      throw new SymbolTableError(`Row ${line}: unexpected cell values`);
    }
    if (i === 0) {
      const missing = REQUIRED_COLUMNS.filter(column => !(column in row));
      if (missing.length > 0) {
        throw new SymbolTableError(`Symbol table is missing column(s): ${missing.join(', ')}`);
      }
    }
    records.push(rowToRecord(row, line));
  });
  return records;
}

/**
 * Parse symbol table CSV text into a SymbolTable
 */
export function parseSymbolTable(content: string): SymbolTable {
  return createSymbolTable(parseSymbolRecords(content));
}

let tableCache = new LRUCache<string, SymbolTable>({ max: 8 });

/**
 * Load the symbol table at `filePath` (see resolveTablePath for the
 * fallbacks). Tables are cached by resolved path.
 */
export function loadSymbolTable(filePath?: string): SymbolTable {
  const resolved = resolveTablePath(filePath);
  const cached = tableCache.get(resolved);
  if (cached) return cached;

  if (!fs.existsSync(resolved)) {
    throw new SymbolTableError(`Symbol table not found at ${resolved}`);
  }
  const content = fs.readFileSync(resolved, 'utf-8');
  const table = parseSymbolTable(content);
  dp(`Loaded ${table.size} symbols from ${resolved}`);

  tableCache.set(resolved, table);
  return table;
}

/**
 * Load a table and register it as the process-wide symbol table.
 */
export function initSymbolTable(filePath?: string): SymbolTable {
  const table = loadSymbolTable(filePath);
  setSymbolTable(table);
  return table;
}

/**
 * Clear the table cache. Useful for tests or when a table file changes on disk.
 */
export function clearSymbolTableCache(): void {
  tableCache.clear();
}

/**
 * Set the number of tables kept in the cache.
 */
export function setSymbolTableCacheCapacity(capacity: number): void {
  if (Number.isFinite(capacity) && capacity > 0) {
    tableCache = new LRUCache<string, SymbolTable>({ max: Math.floor(capacity) });
  }
}

export { resolveTablePath, getDataDir, DEFAULT_TABLE_FILENAME } from './paths.js';
