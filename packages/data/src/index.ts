#!/usr/bin/env node
/**
 * CLI for symbol table inspection
 */

import { Command } from 'commander';
import { codePoint, isWhitespace, setDebug, type SymbolRecord, type SymbolTable } from '@ipaseg/core';
import { config } from 'dotenv';
import { loadSymbolTable, resolveTablePath } from './data/load-symbols.js';

// Parse environment variables
config();

export interface TableStats {
  total: number;
  byRole: Record<string, number>;
  byType: Record<string, number>;
}

export function tableStats(table: SymbolTable): TableStats {
  const byRole: Record<string, number> = {};
  const byType: Record<string, number> = {};
  for (const record of table) {
    byRole[record.role] = (byRole[record.role] ?? 0) + 1;
    byType[record.type] = (byType[record.type] ?? 0) + 1;
  }
  return { total: table.size, byRole, byType };
}

export function formatRecord(record: SymbolRecord): string {
  const features = Object.entries(record.features)
    .map(([column, value]) => `${column}=${value}`)
    .join(' ');
  const head = `${record.display}\t${record.unicode.join(' ')}\t${record.role}\t${record.type}\t${record.name}`;
  return features ? `${head}\t${features}` : head;
}

/**
 * One line per character of `chars`; whitespace is skipped.
 */
export function lookupLines(table: SymbolTable, chars: string): string[] {
  const lines: string[] = [];
  for (const char of chars) {
    if (isWhitespace(char)) continue;
    const record = table.lookup(char);
    lines.push(record ? formatRecord(record) : `${char}\t${codePoint(char)}\tnot found`);
  }
  return lines;
}

function printCounts(title: string, counts: Record<string, number>): void {
  console.log(title);
  for (const [key, count] of Object.entries(counts).sort((a, b) => b[1] - a[1])) {
    console.log(`  ${(key || '(empty)').padEnd(20)} ${count}`);
  }
}

function openTable(tablePath: string | undefined): SymbolTable {
  const table = loadSymbolTable(tablePath);
  console.log(`✓ ${table.size} symbols loaded from ${resolveTablePath(tablePath)}`);
  return table;
}

const program = new Command();

program
  .name('ipaseg-data')
  .description('IPA symbol table inspection')
  .version('0.1.0')
  .option('-t, --table <path>', 'symbol table CSV (default: IPASEG_SYMBOL_TABLE or the bundled table)')
  .option('-v, --verbose', 'print debug output');

program
  .command('stats')
  .description('Count symbols per role and per type')
  .action(() => {
    try {
      const { table: tablePath, verbose } = program.opts<{ table?: string; verbose?: boolean }>();
      setDebug(Boolean(verbose));
      const stats = tableStats(openTable(tablePath));
      printCounts('Roles:', stats.byRole);
      printCounts('Types:', stats.byType);
    } catch (error) {
      console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(2);
    }
  });

program
  .command('lookup')
  .description('Print the symbol table row of every character given')
  .argument('<chars...>', 'characters to look up')
  .action((chars: string[]) => {
    try {
      const { table: tablePath, verbose } = program.opts<{ table?: string; verbose?: boolean }>();
      setDebug(Boolean(verbose));
      const table = loadSymbolTable(tablePath);
      for (const line of lookupLines(table, chars.join(''))) {
        console.log(line);
      }
    } catch (error) {
      console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(2);
    }
  });

program
  .command('validate')
  .description('Load a symbol table and report whether it is well formed')
  .argument('[path]', 'CSV file to check')
  .action((filePath: string | undefined) => {
    try {
      openTable(filePath ?? program.opts<{ table?: string }>().table);
    } catch (error) {
      console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

// Run main if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  program.parse(process.argv);
}
