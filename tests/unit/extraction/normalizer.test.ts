/**
 * Unit tests for text normalization.
 */

import { describe, it, expect } from 'vitest';
import { normalizeText } from '../../../src/domains/extraction/runtime/index.js';

describe('normalizeText', () => {
  it('lower-cases and replaces separators with single spaces', () => {
    expect(normalizeText('Hello_World-Foo: bar;baz,qux.\n\tEnd')).toBe('hello world foo bar baz qux end');
  });

  it('collapses whitespace runs without trimming', () => {
    expect(normalizeText('  Leading and trailing  ')).toBe(' leading and trailing ');
  });

  it('treats carriage returns as separators', () => {
    expect(normalizeText('Status:\r\nOngoing')).toBe('status ongoing');
  });

  it('returns an empty string for empty input', () => {
    expect(normalizeText('')).toBe('');
  });

  it('is stable when applied twice', () => {
    const once = normalizeText('INC-2025-001: Payment_Gateway; DOWN.');
    expect(normalizeText(once)).toBe(once);
  });
});
