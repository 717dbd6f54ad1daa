// Shared type definitions for the IPA tokenizer
// Symbol table records, classified elements and transcripts

// ============================================================================
// SYMBOL TABLE
// ============================================================================

export const SYMBOL_ROLES = [
  'base',
  'diacritic_left',
  'diacritic_right',
  'compound_right',
  'boundary',
  'stress',
] as const;

export type SymbolRole = typeof SYMBOL_ROLES[number];

export function isSymbolRole(value: string): value is SymbolRole {
  const roles: readonly string[] = SYMBOL_ROLES;
  return roles.includes(value);
}

// Phonetic types the classifier maps to consonants
export const CONSONANT_TYPES: readonly string[] = ['Consonant', 'Implosive', 'Click'];
export const VOWEL_TYPE = 'Vowel';

/**
 * One row of the symbol table, keyed by its single-character `symbol`.
 *
 * `role` is kept as the raw string from the table: a value outside
 * {@link SYMBOL_ROLES} is legal data and produces an unclassified element.
 * `features` holds the type-specific columns (Voice, Place, Manner, ...) by
 * column name; empty cells are left out.
 */
export interface SymbolRecord {
  readonly symbol: string;
  readonly description: string;
  readonly display: string;
  readonly name: string;
  readonly unicode: readonly string[];
  readonly type: string;
  readonly role: string;
  readonly features: Readonly<Record<string, string>>;
}

export interface SymbolTable extends Iterable<SymbolRecord> {
  readonly size: number;
  lookup(grapheme: string): SymbolRecord | undefined;
  has(grapheme: string): boolean;
}

// ============================================================================
// ELEMENTS
// ============================================================================

export type ElementKind =
  | 'consonant'
  | 'vowel'
  | 'diacritic'
  | 'ligature'
  | 'boundary'
  | 'stress'
  | 'unclassified';

// Fields every classified character carries
export interface ElementCommon {
  /** Source character as it appeared in the input */
  char: string;
  /** Key of the resolved symbol table row */
  symbol: string;
  role: string;
  type: string;
  display: string;
  description: string;
  name: string;
  unicode: readonly string[];
}

export interface ConsonantFeatures {
  voice: string | null;
  place: string | null;
  manner: string | null;
  sonority: number | null;
  eml: string | null;
}

export interface VowelFeatures {
  voice: string | null;
  sonority: number | null;
  back: string | null;
  central: string | null;
  front: string | null;
  close: string | null;
  mid: string | null;
  open: string | null;
  round: string | null;
  rhotic: string | null;
}

export interface ConsonantElement extends ElementCommon {
  kind: 'consonant';
  role: 'base';
  features: ConsonantFeatures;
}

export interface VowelElement extends ElementCommon {
  kind: 'vowel';
  role: 'base';
  features: VowelFeatures;
}

export interface DiacriticElement extends ElementCommon {
  kind: 'diacritic';
  role: 'diacritic_left' | 'diacritic_right';
  attach: 'left' | 'right';
}

export interface LigatureElement extends ElementCommon {
  kind: 'ligature';
  role: 'compound_right';
}

export interface BoundaryElement extends ElementCommon {
  kind: 'boundary';
  role: 'boundary';
  /** True for the synthetic element produced from whitespace */
  wordBoundary: boolean;
}

export interface StressElement extends ElementCommon {
  kind: 'stress';
  role: 'stress';
}

export interface UnclassifiedElement extends ElementCommon {
  kind: 'unclassified';
}

export type BaseElement = ConsonantElement | VowelElement;

export type PhoElement =
  | ConsonantElement
  | VowelElement
  | DiacriticElement
  | LigatureElement
  | BoundaryElement
  | StressElement
  | UnclassifiedElement;

export function isBaseElement(element: PhoElement): element is BaseElement {
  return element.kind === 'consonant' || element.kind === 'vowel';
}

/**
 * Element equality: source character, resolved symbol, type and role.
 */
export function elementsEqual(a: PhoElement, b: PhoElement): boolean {
  return a.char === b.char && a.symbol === b.symbol && a.type === b.type && a.role === b.role;
}

// ============================================================================
// TRANSCRIPTS
// ============================================================================

export type TranscriptEntry = readonly PhoElement[];

export type Transcript = readonly TranscriptEntry[];
