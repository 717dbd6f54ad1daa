// Error types raised by the tokenizer and segment validation

import type { PhoElement } from './types.js';

export function codePoint(char: string): string {
  const cp = char.codePointAt(0);
  if (cp === undefined) return 'U+????';
  return `U+${cp.toString(16).toUpperCase().padStart(4, '0')}`;
}

export class UnknownSymbolError extends Error {
  constructor(public readonly char: string, public readonly index?: number) {
    const where = index === undefined ? '' : ` at index ${index}`;
    super(`"${char}" (${codePoint(char)})${where} not found in symbol table`);
    this.name = 'UnknownSymbolError';
  }
}

export class UnsupportedFeatureError extends Error {
  constructor(public readonly feature: string, detail: string) {
    super(`${feature} not supported: ${detail}`);
    this.name = 'UnsupportedFeatureError';
  }
}

export class ValidationError extends Error {
  constructor(public readonly components: readonly PhoElement[], reason: string) {
    const symbols = components.map(c => c.symbol).join('');
    super(`Invalid segment "${symbols}": ${reason}`);
    this.name = 'ValidationError';
  }
}

export class SymbolTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SymbolTableError';
  }
}
