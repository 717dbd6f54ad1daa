// ipaseg/segment - One base glyph with its attached diacritics

import { UnsupportedFeatureError, ValidationError } from './errors.js';
import { startTimer } from './profiling.js';
import { elementsEqual, type PhoElement } from './types.js';

/** COMBINING DOUBLE INVERTED BREVE (tie bar), joins the bases of a compound phone */
export const LIGATURE_JOINER = '\u0361';

export type BaseOutput = 'string' | 'element';

function quoted(elements: readonly PhoElement[]): string {
  return `[${elements.map(el => `'${el.display}'`).join(', ')}]`;
}

/**
 * A validated transcript entry: at least one component with role `base`.
 *
 * Diacritics are sorted by role rather than position, so a `diacritic_left`
 * written after the base still lands in `leftDiacritics`.
 */
export class Segment implements Iterable<PhoElement> {
  readonly components: readonly PhoElement[];
  readonly string: string;
  readonly base: readonly PhoElement[];
  readonly leftDiacritics: readonly PhoElement[];
  readonly rightDiacritics: readonly PhoElement[];

  constructor(components: readonly PhoElement[]) {
    const stop = startTimer('buildSegment');
    const base = components.filter(c => c.role === 'base');
    if (base.length === 0) {
      stop();
      throw new ValidationError(components, 'a segment needs at least one base component');
    }

    this.components = Object.freeze([...components]);
    this.string = components.map(c => c.symbol).join('');
    this.base = Object.freeze(base);
    this.leftDiacritics = Object.freeze(components.filter(c => c.role === 'diacritic_left'));
    this.rightDiacritics = Object.freeze(components.filter(c => c.role === 'diacritic_right'));
    stop();
  }

  get length(): number {
    return this.components.length;
  }

  at(index: number): PhoElement | undefined {
    return this.components.at(index);
  }

  [Symbol.iterator](): Iterator<PhoElement> {
    return this.components[Symbol.iterator]();
  }

  /**
   * A string tests for a substring of {@link string}; an element tests for
   * an equal component.
   */
  includes(item: string | PhoElement): boolean {
    if (typeof item === 'string') {
      return this.string.includes(item);
    }
    return this.components.some(c => elementsEqual(c, item));
  }

  equals(other: Segment): boolean {
    return this.components.length === other.components.length
      && this.components.every((c, i) => elementsEqual(c, other.components[i]));
  }

  hashKey(): string {
    return this.string;
  }

  /**
   * Base of the segment. A compound base (two bases tied together) is
   * available as a string, joined with {@link LIGATURE_JOINER}, but not as an
   * element.
   */
  getBase(output?: 'string'): string;
  getBase(output: 'element'): PhoElement;
  getBase(output: BaseOutput = 'string'): string | PhoElement {
    if (this.base.length > 1) {
      if (output === 'string') {
        return this.base.map(b => b.char).join(LIGATURE_JOINER);
      }
      throw new UnsupportedFeatureError(
        'Compound base',
        `segment "${this.string}" has ${this.base.length} bases`
      );
    }
    const [base] = this.base;
    return output === 'string' ? base.char : base;
  }

  toString(): string {
    return this.string;
  }

  describe(): string {
    const diacritics = [...this.rightDiacritics, ...this.leftDiacritics];
    return `Segment(string='${this.string}', base=${quoted(this.base)}, diacritics=${quoted(diacritics)})`;
  }
}
