// ipaseg/classify - Single character -> typed phonetic element

import { UnknownSymbolError } from './errors.js';
import { dp, warn } from './log.js';
import { startTimer } from './profiling.js';
import { getSymbolTable, isSingleCharacter } from './symbolTable.js';
import {
  CONSONANT_TYPES,
  VOWEL_TYPE,
  type BoundaryElement,
  type ConsonantFeatures,
  type ElementCommon,
  type PhoElement,
  type SymbolRecord,
  type SymbolTable,
  type VowelFeatures,
} from './types.js';

const WHITESPACE_REGEX = /^\s$/u;

export function isWhitespace(char: string): boolean {
  return WHITESPACE_REGEX.test(char);
}

/**
 * Synthetic element for a word boundary. Built from whitespace without a
 * symbol table lookup.
 */
export function wordBoundary(): BoundaryElement {
  return {
    kind: 'boundary',
    char: ' ',
    symbol: ' ',
    role: 'boundary',
    type: 'Suprasegmental',
    display: ' ',
    description: 'Word boundary',
    name: 'Whitespace',
    unicode: ['U+0020'],
    wordBoundary: true,
  };
}

function feature(record: SymbolRecord, column: string): string | null {
  const value = record.features[column];
  return value === undefined || value === '' ? null : value;
}

function numericFeature(record: SymbolRecord, column: string): number | null {
  const value = feature(record, column);
  if (value === null) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function consonantFeatures(record: SymbolRecord): ConsonantFeatures {
  return {
    voice: feature(record, 'Voice'),
    place: feature(record, 'Place'),
    manner: feature(record, 'Manner'),
    sonority: numericFeature(record, 'Sonority'),
    eml: feature(record, 'EML'),
  };
}

export function vowelFeatures(record: SymbolRecord): VowelFeatures {
  return {
    voice: feature(record, 'Voice'),
    sonority: numericFeature(record, 'Sonority'),
    back: feature(record, 'Back'),
    central: feature(record, 'Central'),
    front: feature(record, 'Front'),
    close: feature(record, 'Close'),
    mid: feature(record, 'Mid'),
    open: feature(record, 'Open'),
    round: feature(record, 'Round'),
    rhotic: feature(record, 'Rhotic'),
  };
}

/**
 * Map a symbol table record to its element variant.
 *
 * Role decides the variant; for `base` the phonetic type picks consonant or
 * vowel. Any other combination is logged and returned unclassified.
 */
export function classifyRecord(char: string, record: SymbolRecord): PhoElement {
  const common: ElementCommon = {
    char,
    symbol: record.symbol,
    role: record.role,
    type: record.type,
    display: record.display,
    description: record.description,
    name: record.name,
    unicode: record.unicode,
  };

  switch (record.role) {
    case 'base':
      // TODO: compound bases (two glyphs joined by a tie bar) still classify as two bases
      if (CONSONANT_TYPES.includes(record.type)) {
        return { ...common, kind: 'consonant', role: 'base', features: consonantFeatures(record) };
      }
      if (record.type === VOWEL_TYPE) {
        return { ...common, kind: 'vowel', role: 'base', features: vowelFeatures(record) };
      }
      break;
    case 'diacritic_left':
      return { ...common, kind: 'diacritic', role: 'diacritic_left', attach: 'left' };
    case 'diacritic_right':
      return { ...common, kind: 'diacritic', role: 'diacritic_right', attach: 'right' };
    case 'compound_right':
      return { ...common, kind: 'ligature', role: 'compound_right' };
    case 'boundary':
      return { ...common, kind: 'boundary', role: 'boundary', wordBoundary: false };
    case 'stress':
      return { ...common, kind: 'stress', role: 'stress' };
  }

  warn(`"${char}" (role: ${record.role}, type: ${record.type}) could not be classified`);
  return { ...common, kind: 'unclassified' };
}

/**
 * Classify one character against the symbol table.
 *
 * @throws UnknownSymbolError when the character has no row in the table
 * @throws RangeError when `char` is not exactly one character
 */
export function classify(char: string, table: SymbolTable = getSymbolTable()): PhoElement {
  if (!isSingleCharacter(char)) {
    throw new RangeError(`classify() expects a single character, got "${char}"`);
  }
  if (isWhitespace(char)) {
    return wordBoundary();
  }

  const stop = startTimer('classify');
  try {
    const record = table.lookup(char);
    if (!record) {
      throw new UnknownSymbolError(char);
    }
    const element = classifyRecord(char, record);
    dp(`classified "${char}" as ${element.kind}`);
    return element;
  } finally {
    stop();
  }
}
