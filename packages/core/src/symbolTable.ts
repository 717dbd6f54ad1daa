// ipaseg/symbolTable - Immutable grapheme -> record lookup and the process-wide table

import { SymbolTableError } from './errors.js';
import type { SymbolRecord, SymbolTable } from './types.js';

export function isSingleCharacter(value: string): boolean {
  return Array.from(value).length === 1;
}

class MapSymbolTable implements SymbolTable {
  private readonly records: ReadonlyMap<string, SymbolRecord>;

  constructor(records: ReadonlyMap<string, SymbolRecord>) {
    this.records = records;
  }

  get size(): number {
    return this.records.size;
  }

  lookup(grapheme: string): SymbolRecord | undefined {
    return this.records.get(grapheme);
  }

  has(grapheme: string): boolean {
    return this.records.has(grapheme);
  }

  [Symbol.iterator](): Iterator<SymbolRecord> {
    return this.records.values();
  }
}

/**
 * Build a symbol table from records.
 *
 * Every key must be a single character and appear once; the records are
 * frozen so that the table can be shared across callers.
 */
export function createSymbolTable(records: Iterable<SymbolRecord>): SymbolTable {
  const map = new Map<string, SymbolRecord>();
  for (const record of records) {
    if (!isSingleCharacter(record.symbol)) {
      throw new SymbolTableError(`Symbol "${record.symbol}" must be a single character`);
    }
    if (map.has(record.symbol)) {
      throw new SymbolTableError(`Duplicate symbol "${record.symbol}" in symbol table`);
    }
    map.set(record.symbol, Object.freeze({
      ...record,
      unicode: Object.freeze([...record.unicode]),
      features: Object.freeze({ ...record.features }),
    }));
  }
  return new MapSymbolTable(map);
}

// Process-wide table, registered once at startup

let activeTable: SymbolTable | null = null;

export function setSymbolTable(table: SymbolTable): void {
  activeTable = table;
}

export function getSymbolTable(): SymbolTable {
  if (!activeTable) {
    throw new SymbolTableError('No symbol table registered. Call setSymbolTable() or pass a table explicitly.');
  }
  return activeTable;
}

export function hasSymbolTable(): boolean {
  return activeTable !== null;
}

/**
 * Forget the registered table (primarily for testing)
 */
export function resetSymbolTable(): void {
  activeTable = null;
}
