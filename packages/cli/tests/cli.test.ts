// CLI output formats
import { describe, test, expect } from 'vitest';
import { tokenize, UnknownSymbolError, UnsupportedFeatureError } from '@ipaseg/core';
import { testTable } from '@ipaseg/testing';
import { formatTranscript, runCli } from '../src/index.js';

describe('formatTranscript', () => {
  test('brackets every entry', () => {
    expect(formatTranscript(tokenize('pʰæt', testTable))).toBe('[p ʰ] [æ] [t]');
  });

  test('word boundaries and empty entries', () => {
    expect(formatTranscript(tokenize('a t', testTable))).toBe('[a] [ ] [t]');
    expect(formatTranscript(tokenize('ˈpa', testTable))).toBe('[] [ˈ] [p] [a]');
    expect(formatTranscript(tokenize('', testTable))).toBe('[]');
  });
});

describe('runCli', () => {
  test('default output is the transcript', () => {
    expect(runCli('pʰæt ta', {}, testTable)).toBe('[p ʰ] [æ] [t] [ ] [t] [a]');
  });

  test('--segments', () => {
    expect(runCli('pʰæt ta', { segments: true }, testTable)).toBe('pʰ æ t t a');
    expect(runCli('pʰæt', { segments: true, json: true }, testTable)).toBe('["pʰ","æ","t"]');
  });

  test('--bases', () => {
    expect(runCli('ⁿaˈkʰu', { bases: true }, testTable)).toBe('aku');
  });

  test('--json', () => {
    expect(runCli('pʰæt', { json: true }, testTable)).toBe('[["p","ʰ"],["æ"],["t"]]');
  });

  test('errors propagate', () => {
    expect(() => runCli('pa€', {}, testTable)).toThrow(UnknownSymbolError);
    expect(() => runCli('p\u0335a', {}, testTable)).toThrow(UnsupportedFeatureError);
  });

  test('falls back to the bundled table', () => {
    expect(runCli('pʰæt')).toBe('[p ʰ] [æ] [t]');
  });
});
