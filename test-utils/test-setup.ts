// Shared test setup utilities
import { afterAll, beforeAll } from 'vitest';
import {
  codePoint,
  createSymbolTable,
  resetSymbolTable,
  setSymbolTable,
  type PhoElement,
  type SymbolRecord,
  type SymbolTable
} from '@ipaseg/core';

// Small synthetic table; tests must not depend on the bundled CSV
type Row = [symbol: string, type: string, role: string, description: string, features?: Record<string, string>];

const ROWS: Row[] = [
  ['p', 'Consonant', 'base', 'Voiceless bilabial plosive', { Voice: 'Voiceless', Place: 'bilabial', Manner: 'plosive', Sonority: '1', EML: 'Early' }],
  ['t', 'Consonant', 'base', 'Voiceless alveolar plosive', { Voice: 'Voiceless', Place: 'alveolar', Manner: 'plosive', Sonority: '1', EML: 'Middle' }],
  ['k', 'Consonant', 'base', 'Voiceless velar plosive', { Voice: 'Voiceless', Place: 'velar', Manner: 'plosive', Sonority: '1', EML: 'Middle' }],
  ['s', 'Consonant', 'base', 'Voiceless alveolar fricative', { Voice: 'Voiceless', Place: 'alveolar', Manner: 'fricative', Sonority: '3', EML: 'Late' }],
  ['ʃ', 'Consonant', 'base', 'Voiceless postalveolar fricative', { Voice: 'Voiceless', Place: 'postalveolar', Manner: 'fricative', Sonority: '3', EML: 'Late' }],
  ['h', 'Consonant', 'base', 'Voiceless glottal fricative', { Voice: 'Voiceless', Place: 'glottal', Manner: 'fricative', Sonority: '3' }],
  ['ʧ', 'Consonant', 'base', 'Voiceless postalveolar affricate', { Voice: 'Voiceless', Place: 'postalveolar', Manner: 'affricate', Sonority: '2', EML: 'Middle' }],
  ['ɓ', 'Implosive', 'base', 'Voiced bilabial implosive', { Voice: 'Voiced', Place: 'bilabial', Manner: 'implosive', Sonority: '1' }],
  ['ǃ', 'Click', 'base', 'Postalveolar click', { Voice: 'Voiceless', Place: 'postalveolar', Manner: 'click', Sonority: '1' }],
  ['A', 'Vowel', 'base', 'Open front unrounded vowel (test)', { Voice: 'Voiced', Sonority: '7', Front: '+', Open: '+', Round: '-' }],
  ['a', 'Vowel', 'base', 'Open front unrounded vowel', { Voice: 'Voiced', Sonority: '7', Back: '-', Central: '-', Front: '+', Close: '-', Mid: '-', Open: '+', Round: '-', Rhotic: '-' }],
  ['æ', 'Vowel', 'base', 'Near-open front unrounded vowel', { Voice: 'Voiced', Sonority: '7', Front: '+', Open: '+', Round: '-' }],
  ['i', 'Vowel', 'base', 'Close front unrounded vowel', { Voice: 'Voiced', Sonority: '7', Front: '+', Close: '+', Round: '-' }],
  ['o', 'Vowel', 'base', 'Close-mid back rounded vowel', { Voice: 'Voiced', Sonority: '7', Back: '+', Mid: '+', Round: '+' }],
  ['u', 'Vowel', 'base', 'Close back rounded vowel', { Voice: 'Voiced', Sonority: '7', Back: '+', Close: '+', Round: '+' }],
  ['ə', 'Vowel', 'base', 'Mid central vowel', { Voice: 'Voiced', Sonority: '7', Central: '+', Mid: '+', Round: '-' }],
  ['ʰ', 'Diacritic', 'diacritic_right', 'Aspirated'],
  ['\u0325', 'Diacritic', 'diacritic_right', 'Voiceless'],
  ['\u0303', 'Diacritic', 'diacritic_right', 'Nasalized'],
  ['ː', 'Diacritic', 'diacritic_right', 'Long'],
  ['ˡ', 'Diacritic', 'diacritic_right', 'Lateral release'],
  ['ⁿ', 'Diacritic', 'diacritic_left', 'Prenasalized'],
  ['ᵐ', 'Diacritic', 'diacritic_left', 'Prenasalized (bilabial)'],
  ['\u0361', 'Diacritic', 'compound_right', 'Affricate or double articulation'],
  ['.', 'Suprasegmental', 'boundary', 'Syllable boundary'],
  ['|', 'Suprasegmental', 'boundary', 'Minor (foot) group'],
  ['‖', 'Suprasegmental', 'boundary', 'Major (intonation) group'],
  ['ˈ', 'Suprasegmental', 'stress', 'Primary stress'],
  ['ˌ', 'Suprasegmental', 'stress', 'Secondary stress'],
  ['↗', 'Suprasegmental', 'intonation', 'Global rise'],
  ['∅', 'Null', 'base', 'Null segment'],
];

function isCombining(symbol: string): boolean {
  return /\p{M}/u.test(symbol);
}

export function testRecords(): SymbolRecord[] {
  return ROWS.map(([symbol, type, role, description, features = {}]) => ({
    symbol,
    description,
    display: isCombining(symbol) ? `◌${symbol}` : symbol,
    name: description.toUpperCase(),
    unicode: [...symbol].map(ch => codePoint(ch)),
    type,
    role,
    features
  }));
}

export function createTestTable(): SymbolTable {
  return createSymbolTable(testRecords());
}

export const testTable = createTestTable();

// Register the synthetic table as the process-wide table for a test file
export function setupTests(): void {
  beforeAll(() => {
    setSymbolTable(testTable);
  });
  afterAll(() => {
    resetSymbolTable();
  });
}

export function chars(elements: readonly PhoElement[]): string[] {
  return elements.map(el => el.char);
}
