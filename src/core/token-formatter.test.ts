/**
 * Tests for the Token Formatter
 */

import { describe, it, expect } from 'vitest';
import {
  splitTokens,
  capitalizeWord,
  toIdentifierForm,
  renderPair,
  renderPairs,
  formatAttributeLine,
  formatVariantLine,
  pairLines,
  renderLines,
  rustEnumValues,
} from './token-formatter';
import { MemoryOutputWriter } from '../io/memory-output-writer';

describe('splitTokens', () => {
  it('should split on commas and trim each part', () => {
    expect(splitTokens('foo_bar, baz_qux')).toEqual(['foo_bar', 'baz_qux']);
  });

  it('should trim tabs and newlines', () => {
    expect(splitTokens(' a ,\tb\n')).toEqual(['a', 'b']);
  });

  it('should return the empty string as a single token', () => {
    expect(splitTokens('')).toEqual(['']);
  });

  it('should keep empty tokens between consecutive commas', () => {
    expect(splitTokens('a,,b')).toEqual(['a', '', 'b']);
  });

  it('should keep duplicates in order', () => {
    expect(splitTokens('x, y, x')).toEqual(['x', 'y', 'x']);
  });

  it('should always yield one more token than there are commas', () => {
    for (const input of ['', ',', 'a', 'a,b', ' , , ', 'a,b,c,d']) {
      const commas = input.split('').filter((c) => c === ',').length;
      expect(splitTokens(input)).toHaveLength(commas + 1);
    }
  });

  it('should be stable under re-trimming', () => {
    for (const token of splitTokens('  padded ,\tother\t')) {
      expect(token.trim()).toBe(token);
    }
  });
});

describe('capitalizeWord', () => {
  it('should upper-case a leading lower-case letter', () => {
    expect(capitalizeWord('foo')).toBe('Foo');
  });

  it('should leave the rest of the word unchanged', () => {
    expect(capitalizeWord('fooBAR')).toBe('FooBAR');
  });

  it('should not promote a letter that follows a digit', () => {
    expect(capitalizeWord('2fa')).toBe('2fa');
  });

  it('should leave non-ASCII letters alone', () => {
    expect(capitalizeWord('état')).toBe('état');
  });

  it('should handle the empty string', () => {
    expect(capitalizeWord('')).toBe('');
  });
});

describe('toIdentifierForm', () => {
  it('should convert snake_case to PascalCase', () => {
    expect(toIdentifierForm('foo_bar')).toBe('FooBar');
  });

  it('should handle long names', () => {
    expect(toIdentifierForm('already_snake_case_long_name')).toBe('AlreadySnakeCaseLongName');
  });

  it('should keep the case of letters after the first', () => {
    expect(toIdentifierForm('HTTP_code')).toBe('HTTPCode');
    expect(toIdentifierForm('fooBar_baz')).toBe('FooBarBaz');
  });

  it('should collapse repeated and leading underscores', () => {
    expect(toIdentifierForm('foo__bar')).toBe('FooBar');
    expect(toIdentifierForm('_private')).toBe('Private');
  });

  it('should treat embedded spaces as word breaks', () => {
    expect(toIdentifierForm('foo bar')).toBe('FooBar');
  });

  it('should leave words starting with a digit as they are', () => {
    expect(toIdentifierForm('2fa_enabled')).toBe('2faEnabled');
  });

  it('should return the empty string for an empty token', () => {
    expect(toIdentifierForm('')).toBe('');
  });

  it('should produce no underscores or spaces for alphanumeric snake_case', () => {
    for (const token of ['a_b_c', 'order_2_items', 'x1_y2']) {
      const identifier = toIdentifierForm(token);
      expect(identifier).not.toMatch(/[_ ]/);
    }
    expect(toIdentifierForm('order_2_items')).toBe('Order2Items');
  });
});

describe('line formatting', () => {
  it('should format the attribute line verbatim', () => {
    expect(formatAttributeLine('foo_bar')).toBe('#[serde(rename = "foo_bar")]');
  });

  it('should not escape embedded quotes', () => {
    expect(formatAttributeLine('say "hi"')).toBe('#[serde(rename = "say "hi"")]');
  });

  it('should append a comma to the variant line', () => {
    expect(formatVariantLine('FooBar')).toBe('FooBar,');
  });

  it('should render a pair from a token', () => {
    expect(renderPair('baz_qux')).toEqual({ raw: 'baz_qux', identifier: 'BazQux' });
  });

  it('should render pairs in input order', () => {
    expect(renderPairs('b_one, a_two')).toEqual([
      { raw: 'b_one', identifier: 'BOne' },
      { raw: 'a_two', identifier: 'ATwo' },
    ]);
  });
});

describe('renderLines', () => {
  it('should render a single token as two lines', () => {
    expect(renderLines('foo_bar')).toEqual(['#[serde(rename = "foo_bar")]', 'FooBar,']);
  });

  it('should render the empty input as an empty rename and a bare comma', () => {
    expect(renderLines('')).toEqual(['#[serde(rename = "")]', ',']);
  });

  it('should prefix every line with the indent', () => {
    expect(renderLines('a', { indent: '    ' })).toEqual(['    #[serde(rename = "a")]', '    A,']);
  });

  it('should keep syntactically broken lines for quoted tokens', () => {
    expect(renderLines('say "hi"')).toEqual(['#[serde(rename = "say "hi"")]', 'Say"hi",']);
  });
});

describe('pairLines', () => {
  it('should emit the attribute line before the variant line for each pair', () => {
    const pairs = [
      { raw: 'on_hold', identifier: 'OnHold' },
      { raw: 'x', identifier: 'X' },
    ];
    expect(pairLines(pairs, { indent: ' ' })).toEqual([
      ' #[serde(rename = "on_hold")]',
      ' OnHold,',
      ' #[serde(rename = "x")]',
      ' X,',
    ]);
  });

  it('should emit nothing for no pairs', () => {
    expect(pairLines([])).toEqual([]);
  });
});

describe('rustEnumValues', () => {
  it('should write two lines per token in order', () => {
    const writer = new MemoryOutputWriter();
    rustEnumValues('foo_bar, baz_qux', writer);
    expect(writer.getLines()).toEqual([
      '#[serde(rename = "foo_bar")]',
      'FooBar,',
      '#[serde(rename = "baz_qux")]',
      'BazQux,',
    ]);
  });

  it('should return the rendered pairs', () => {
    const writer = new MemoryOutputWriter();
    const pairs = rustEnumValues('x,x', writer);
    expect(pairs).toEqual([
      { raw: 'x', identifier: 'X' },
      { raw: 'x', identifier: 'X' },
    ]);
  });

  it('should write exactly what renderLines returns', () => {
    const writer = new MemoryOutputWriter();
    rustEnumValues('one, two_three,', writer, { indent: '  ' });
    expect(writer.getLines()).toEqual(renderLines('one, two_three,', { indent: '  ' }));
    expect(writer.getLines()).toHaveLength(6);
  });

  it('should terminate each line with a newline', () => {
    const writer = new MemoryOutputWriter();
    rustEnumValues('foo_bar', writer);
    expect(writer.getOutput()).toBe('#[serde(rename = "foo_bar")]\nFooBar,\n');
  });
});
