// @ipaseg/core - Symbol table contract, element classifier, tokenizer and segments

// Shared types
export type * from './types.js';
export {
  SYMBOL_ROLES,
  CONSONANT_TYPES,
  VOWEL_TYPE,
  isSymbolRole,
  isBaseElement,
  elementsEqual
} from './types.js';

// Errors
export {
  UnknownSymbolError,
  UnsupportedFeatureError,
  ValidationError,
  SymbolTableError,
  codePoint
} from './errors.js';

// Symbol table
export {
  createSymbolTable,
  setSymbolTable,
  getSymbolTable,
  hasSymbolTable,
  resetSymbolTable,
  isSingleCharacter
} from './symbolTable.js';

// Classification
export {
  classify,
  classifyRecord,
  consonantFeatures,
  vowelFeatures,
  isWhitespace,
  wordBoundary
} from './classify.js';

// Tokenizer
export {
  tokenize,
  preprocess,
  transition,
  type ScanState,
  type ScanAction,
  type Transition,
  DELIMITER_REGEX,
  ROLE_SWITCHER,
  SEGMENT_ENDERS
} from './tokenizer.js';

// Segments
export { Segment, LIGATURE_JOINER, type BaseOutput } from './segment.js';
export { segments, segmentsOf, getBases, getBasesString, entrySymbols } from './stream.js';

// Logging and profiling
export { setDebug, dp, warn, DEBUG } from './log.js';
export {
  PERF_COUNTERS,
  startTimer,
  resetPerfCounters,
  printPerfCountersAndReset,
  isProfilingEnabled
} from './profiling.js';
