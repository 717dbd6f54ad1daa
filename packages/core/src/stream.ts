// ipaseg/stream - Well-formed segments out of a transcript

import { ValidationError } from './errors.js';
import { Segment } from './segment.js';
import { getSymbolTable } from './symbolTable.js';
import { tokenize } from './tokenizer.js';
import type { PhoElement, SymbolTable, Transcript } from './types.js';

/**
 * Lazily build a Segment from every entry that validates. Boundaries, stress
 * markers, empty entries and entries without a base are skipped; any other
 * error propagates.
 */
export function* segmentsOf(transcript: Transcript): Generator<Segment, void, undefined> {
  for (const entry of transcript) {
    let segment: Segment;
    try {
      segment = new Segment(entry);
    } catch (error) {
      if (error instanceof ValidationError) continue;
      throw error;
    }
    yield segment;
  }
}

/**
 * Tokenize `input` and yield its well-formed segments.
 *
 * Tokenization errors are raised on the first `next()` call.
 */
export function* segments(input: string, table: SymbolTable = getSymbolTable()): Generator<Segment, void, undefined> {
  yield* segmentsOf(tokenize(input, table));
}

/**
 * First base of every segment in `input`.
 */
export function getBases(input: string, table: SymbolTable = getSymbolTable()): PhoElement[] {
  const bases: PhoElement[] = [];
  for (const segment of segments(input, table)) {
    // Only the first base of a compound phone is kept
    bases.push(segment.base[0]);
  }
  return bases;
}

/**
 * Base characters of `input` with diacritics and suprasegmentals stripped.
 */
export function getBasesString(input: string, table: SymbolTable = getSymbolTable()): string {
  return getBases(input, table).map(b => b.char).join('');
}

export function entrySymbols(transcript: Transcript): string[][] {
  return transcript.map(entry => entry.map(el => el.symbol));
}
