#!/usr/bin/env node

/**
 * CLI interface for the IPA tokenizer
 */

import { Command } from 'commander';
import {
  tokenize,
  segmentsOf,
  getBasesString,
  entrySymbols,
  setDebug,
  printPerfCountersAndReset,
  type SymbolTable,
  type Transcript
} from '@ipaseg/core';
import { loadSymbolTable } from '@ipaseg/data';
import { config } from 'dotenv';

// Parse environment variables
config();

export interface CliOptions {
  segments?: boolean;
  bases?: boolean;
  json?: boolean;
  table?: string;
}

/**
 * Render a transcript on one line: each entry's symbols joined by spaces,
 * inside brackets.
 */
export function formatTranscript(transcript: Transcript): string {
  return entrySymbols(transcript)
    .map(symbols => `[${symbols.join(' ')}]`)
    .join(' ');
}

/**
 * Programmatic interface for CLI operations
 * Returns the output string that would be printed to stdout
 */
export function runCli(input: string, options: CliOptions = {}, table?: SymbolTable): string {
  const symbols = table ?? loadSymbolTable(options.table);

  if (options.bases) {
    return getBasesString(input, symbols);
  }

  const transcript = tokenize(input, symbols);
  if (options.segments) {
    const strings = [...segmentsOf(transcript)].map(segment => segment.string);
    return options.json ? JSON.stringify(strings) : strings.join(' ');
  }
  return options.json ? JSON.stringify(entrySymbols(transcript)) : formatTranscript(transcript);
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('ipaseg')
    .description('Split an IPA transcription into segments, boundaries and stress markers')
    .usage('[options] <input...>')
    .version('0.1.0')
    .argument('<input...>', 'IPA transcription (several arguments are joined by spaces)')
    .option('-s, --segments', 'print only well-formed segments')
    .option('-b, --bases', 'print the base characters with diacritics and suprasegmentals stripped')
    .option('-j, --json', 'print JSON instead of text')
    .option('-t, --table <path>', 'symbol table CSV (default: IPASEG_SYMBOL_TABLE or the bundled table)')
    .option('-v, --verbose', 'print debug output')
    .helpOption('-h, --help', 'print this help text');

  program.parse(process.argv);
  const options = program.opts<CliOptions & { verbose?: boolean }>();
  const input = program.args.join(' ');

  if (options.verbose) {
    setDebug(true);
  }

  try {
    const output = runCli(input, options);
    process.stdout.write(output);
    process.stdout.write('\n');

    // Print performance counters if profiling is enabled
    printPerfCountersAndReset();
  } catch (error) {
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    if (options.verbose && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(2);
  }
}

// Run main if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
