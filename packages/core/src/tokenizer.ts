// ipaseg/tokenizer - Split an IPA transcription into segments, boundaries and stress markers
//
// Single pass over the input. Elements collect in a buffer until a
// segment-ending role arrives; boundary and stress markers always become
// entries of their own. Entries are not validated here: an entry without a
// base (leading diacritics, a stray diacritic) only fails when a Segment is
// built from it.

import { classify, isWhitespace, wordBoundary } from './classify.js';
import { UnknownSymbolError, UnsupportedFeatureError, codePoint } from './errors.js';
import { DEBUG, dp } from './log.js';
import { startTimer } from './profiling.js';
import { getSymbolTable } from './symbolTable.js';
import type { PhoElement, SymbolTable, Transcript, TranscriptEntry } from './types.js';

/** Transcription delimiters, replaced by whitespace before scanning */
export const DELIMITER_REGEX = /[[\]\\\/]/g;

/** COMBINING SHORT STROKE OVERLAY, marks a diacritic whose attachment is switched */
export const ROLE_SWITCHER = '\u0335';

/** Roles that close a segment that already has its base */
export const SEGMENT_ENDERS: ReadonlySet<string> = new Set(['base', 'diacritic_left', 'boundary', 'stress']);

const MARKER_ROLES: ReadonlySet<string> = new Set(['boundary', 'stress']);

export type ScanState = 'awaiting-base' | 'in-segment';

export type ScanAction =
  /** Push the element onto the open buffer */
  | 'append'
  /** Emit the buffer, then open a new one holding the element */
  | 'flush-then-start'
  /** No base yet: emit the buffer as it is, then the marker on its own */
  | 'emit-marker'
  /** Emit the finished segment, then the marker on its own */
  | 'flush-then-marker';

export interface Transition {
  action: ScanAction;
  next: ScanState;
}

/**
 * Accumulator transition for an element with the given role.
 */
export function transition(state: ScanState, role: string): Transition {
  if (MARKER_ROLES.has(role)) {
    return {
      action: state === 'awaiting-base' ? 'emit-marker' : 'flush-then-marker',
      next: 'awaiting-base',
    };
  }

  const next: ScanState = role === 'base' ? 'in-segment' : 'awaiting-base';

  if (state === 'awaiting-base') {
    return { action: 'append', next };
  }
  if (SEGMENT_ENDERS.has(role)) {
    return { action: 'flush-then-start', next };
  }
  return { action: 'append', next: 'in-segment' };
}

/**
 * Replace delimiters with whitespace and trim. Rejects role-switched
 * diacritics, which are not supported.
 */
export function preprocess(input: string): string {
  if (input.includes(ROLE_SWITCHER)) {
    throw new UnsupportedFeatureError(
      'Role switcher',
      `"${input}" contains ${codePoint(ROLE_SWITCHER)}`
    );
  }
  return input.replace(DELIMITER_REGEX, ' ').trim();
}

function freezeEntry(elements: PhoElement[]): TranscriptEntry {
  return Object.freeze(elements);
}

/**
 * Tokenize an IPA transcription.
 *
 * Returns one entry per segment, plus a singleton entry for every boundary
 * (whitespace included) and stress marker. The last buffer is always
 * flushed, so `tokenize("")` gives `[[]]`.
 *
 * @throws UnsupportedFeatureError when the input contains the role switcher
 * @throws UnknownSymbolError for the first character missing from the table
 */
export function tokenize(input: string, table: SymbolTable = getSymbolTable()): Transcript {
  const stop = startTimer('tokenize');
  try {
    return scan(preprocess(input), table);
  } finally {
    stop();
  }
}

function scan(text: string, table: SymbolTable): Transcript {
  const transcript: TranscriptEntry[] = [];
  let buffer: PhoElement[] = [];
  let state: ScanState = 'awaiting-base';
  let lastWasSpace = false;

  const flush = () => {
    transcript.push(freezeEntry(buffer));
    buffer = [];
  };

  let index = 0;
  for (const char of text) {
    const position = index;
    index += char.length;

    if (isWhitespace(char)) {
      if (lastWasSpace) continue;
      flush();
      state = 'awaiting-base';
      transcript.push(freezeEntry([wordBoundary()]));
      lastWasSpace = true;
      dp(`[${position}] whitespace: word boundary`);
      continue;
    }
    lastWasSpace = false;

    if (!table.has(char)) {
      throw new UnknownSymbolError(char, position);
    }
    const element = classify(char, table);
    const { action, next } = transition(state, element.role);
    dp(`[${position}] "${char}" ${element.kind} (${element.role}): ${state} -> ${next}, ${action}`);

    switch (action) {
      case 'append':
        buffer.push(element);
        break;
      case 'flush-then-start':
        flush();
        buffer.push(element);
        break;
      case 'emit-marker':
      case 'flush-then-marker':
        flush();
        transcript.push(freezeEntry([element]));
        break;
    }
    state = next;
  }

  flush();

  if (DEBUG) {
    dp('Transcript dump:', JSON.stringify(transcript.map(entry => entry.map(el => el.symbol))));
  }
  return Object.freeze(transcript);
}
