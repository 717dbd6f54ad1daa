// Tokenizer tests - entry splitting, markers, whitespace and delimiters
import { describe, test, expect, vi, afterEach } from 'vitest';
import {
  tokenize,
  transition,
  preprocess,
  entrySymbols,
  setDebug,
  UnknownSymbolError,
  UnsupportedFeatureError,
  type ScanAction,
  type ScanState
} from '@ipaseg/core';
import { setupTests } from '@ipaseg/testing';

setupTests();

describe('Transition table', () => {
  const rows: [ScanState, string, ScanAction, ScanState][] = [
    ['awaiting-base', 'base', 'append', 'in-segment'],
    ['awaiting-base', 'diacritic_left', 'append', 'awaiting-base'],
    ['awaiting-base', 'diacritic_right', 'append', 'awaiting-base'],
    ['awaiting-base', 'compound_right', 'append', 'awaiting-base'],
    ['awaiting-base', 'boundary', 'emit-marker', 'awaiting-base'],
    ['awaiting-base', 'stress', 'emit-marker', 'awaiting-base'],
    ['in-segment', 'base', 'flush-then-start', 'in-segment'],
    ['in-segment', 'diacritic_left', 'flush-then-start', 'awaiting-base'],
    ['in-segment', 'diacritic_right', 'append', 'in-segment'],
    ['in-segment', 'compound_right', 'append', 'in-segment'],
    ['in-segment', 'boundary', 'flush-then-marker', 'awaiting-base'],
    ['in-segment', 'stress', 'flush-then-marker', 'awaiting-base'],
    ['in-segment', 'intonation', 'append', 'in-segment'],
  ];

  test.each(rows)('%s + %s -> %s, %s', (state, role, action, next) => {
    expect(transition(state, role)).toEqual({ action, next });
  });
});

describe('Tokenizer', () => {
  test('splits words into segments and word boundaries', () => {
    expect(entrySymbols(tokenize('pʰæt kʰaʧ suto'))).toEqual([
      ['p', 'ʰ'], ['æ'], ['t'], [' '],
      ['k', 'ʰ'], ['a'], ['ʧ'], [' '],
      ['s'], ['u'], ['t'], ['o'],
    ]);
  });

  test('empty input gives one empty entry', () => {
    expect(entrySymbols(tokenize(''))).toEqual([[]]);
  });

  test('whitespace is trimmed and runs collapse to one boundary', () => {
    expect(entrySymbols(tokenize(' \tpʰæt kːaʧ\n suto \r\n  '))).toEqual([
      ['p', 'ʰ'], ['æ'], ['t'], [' '],
      ['k', 'ː'], ['a'], ['ʧ'], [' '],
      ['s'], ['u'], ['t'], ['o'],
    ]);
    expect(tokenize('a  t')).toEqual(tokenize('a t'));
  });

  test('word boundary entries are flagged', () => {
    const [, boundary] = tokenize('a t');
    expect(boundary).toHaveLength(1);
    expect(boundary[0]).toMatchObject({ kind: 'boundary', wordBoundary: true });
  });

  test('left diacritics open the next segment', () => {
    expect(entrySymbols(tokenize('tⁿo'))).toEqual([['t'], ['ⁿ', 'o']]);
    expect(entrySymbols(tokenize('ⁿaˈʧ\u0325ukʰⁿaˈʧ\u0325'))).toEqual([
      ['ⁿ', 'a'], ['ˈ'], ['ʧ', '\u0325'], ['u'],
      ['k', 'ʰ'], ['ⁿ', 'a'], ['ˈ'], ['ʧ', '\u0325'],
    ]);
  });

  test('markers before a base emit the open buffer first', () => {
    expect(entrySymbols(tokenize('ˈta'))).toEqual([[], ['ˈ'], ['t'], ['a']]);
    expect(entrySymbols(tokenize('ʰˈpa'))).toEqual([['ʰ'], ['ˈ'], ['p'], ['a']]);
  });

  test('markers after a base close the segment', () => {
    expect(entrySymbols(tokenize('ˌ‖|ᵐhi.toˡˈ|ᵐtə\u0303'))).toEqual([
      [], ['ˌ'], [], ['‖'], [], ['|'],
      ['ᵐ', 'h'], ['i'], ['.'], ['t'], ['o', 'ˡ'], ['ˈ'],
      [], ['|'], ['ᵐ', 't'], ['ə', '\u0303'],
    ]);
  });

  test('diacritics before the first base join its entry', () => {
    expect(entrySymbols(tokenize('ʰp'))).toEqual([['ʰ', 'p']]);
  });

  test('a tie bar stays with the base before it', () => {
    expect(entrySymbols(tokenize('t\u0361ʃa'))).toEqual([['t', '\u0361'], ['ʃ'], ['a']]);
  });

  test('transcription delimiters are treated as whitespace', () => {
    expect(entrySymbols(tokenize('[pʰa]'))).toEqual([['p', 'ʰ'], ['a']]);
    expect(entrySymbols(tokenize('/ta/ /su/'))).toEqual([['t'], ['a'], [' '], ['s'], ['u']]);
    expect(preprocess('\\ta\\')).toBe('ta');
  });

  test('concatenated symbols give back the trimmed input', () => {
    const input = 'kʰⁿaˈʧ\u0325u suto.ta';
    const joined = entrySymbols(tokenize(input)).map(symbols => symbols.join('')).join('');
    expect(joined).toBe(input);
  });

  test('output is frozen', () => {
    const transcript = tokenize('pʰa');
    expect(Object.isFrozen(transcript)).toBe(true);
    expect(transcript.every(entry => Object.isFrozen(entry))).toBe(true);
  });

  test('unknown characters throw with their position', () => {
    expect(() => tokenize('A€')).toThrow(UnknownSymbolError);
    expect(() => tokenize('A€')).toThrow('"€" (U+20AC) at index 1 not found in symbol table');

    try {
      tokenize('pa tx');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownSymbolError);
      if (error instanceof UnknownSymbolError) {
        expect(error.char).toBe('x');
        expect(error.index).toBe(4);
      }
    }
  });

  test('role switcher is rejected', () => {
    expect(() => tokenize('ʰ\u0335to')).toThrow(UnsupportedFeatureError);
    expect(() => tokenize('ʰ\u0335to')).toThrow('Role switcher not supported: "ʰ\u0335to" contains U+0335');
  });

  test('unclassified elements stay in the open segment', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const transcript = tokenize('a↗');
    expect(entrySymbols(transcript)).toEqual([['a', '↗']]);
    expect(transcript[0][1].kind).toBe('unclassified');
    expect(warnSpy).toHaveBeenCalledTimes(1);
    warnSpy.mockRestore();
  });
});

describe('Debug output', () => {
  afterEach(() => {
    setDebug(false);
    vi.restoreAllMocks();
  });

  test('silent unless debug is on', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    setDebug(false);
    tokenize('pa');
    expect(logSpy).not.toHaveBeenCalled();
  });

  test('traces every character and dumps the transcript', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    setDebug(true);
    tokenize('pa');
    expect(logSpy).toHaveBeenCalledWith('[DEBUG]', '[0] "p" consonant (base): awaiting-base -> in-segment, append');
    expect(logSpy).toHaveBeenCalledWith('[DEBUG]', 'Transcript dump:', '[["p"],["a"]]');
  });
});
