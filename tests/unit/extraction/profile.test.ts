/**
 * Unit tests for extraction profile validation.
 */

import { describe, it, expect } from 'vitest';
import { buildExtractionProfile } from '../../../src/domains/extraction/runtime/index.js';
import { ConfigurationError } from '../../../src/utils/errors.js';

function captureError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('buildExtractionProfile', () => {
  it('sorts companies longest first and drops blank entries', () => {
    const profile = buildExtractionProfile({ companies: ['ABC', '', 'ABC Corporation'] });
    expect(profile.companies).toEqual(['ABC Corporation', 'ABC']);
  });

  it('builds keyword catalogs in catalog order', () => {
    const profile = buildExtractionProfile({ keywords: { Status: ['resolved'], Priority: ['high'] } });
    expect([...(profile.keywords?.keys() ?? [])]).toEqual(['Status', 'Priority']);
  });

  it('leaves companies and keywords unset when not supplied', () => {
    const profile = buildExtractionProfile({});
    expect(profile.companies).toBeUndefined();
    expect(profile.keywords).toBeUndefined();
    expect(profile.fields).toEqual([]);
    expect(profile.labels).toEqual([]);
  });

  it('compiles pattern and label rules into tagged rules', () => {
    const profile = buildExtractionProfile({
      fields: {
        host: ['Host:\\s*(\\S+)'],
        status: { label: 'Status' },
      },
    });

    expect(profile.fields).toHaveLength(2);
    expect(profile.fields[0]).toMatchObject({ kind: 'pattern', field: 'host' });
    expect(profile.fields[1]).toEqual({ kind: 'label', field: 'status', label: 'Status' });
  });

  it('accepts non-capturing and named groups next to one capture', () => {
    expect(() =>
      buildExtractionProfile({ fields: { a: ['(?:Host|Server):\\s*(\\S+)'], b: ['id=(?<id>\\d+)'] } })
    ).not.toThrow();
  });

  it('rejects patterns without exactly one capture group', () => {
    const error = captureError(() =>
      buildExtractionProfile({ fields: { none: ['Host: \\S+'], two: ['(a)(b)'] } })
    );

    expect(error.code).toBe('INVALID_FIELD_PATTERN');
    expect(error.problems).toEqual([
      { field: 'fields.none[0]', message: 'pattern must contain exactly one capture group, found 0' },
      { field: 'fields.two[0]', message: 'pattern must contain exactly one capture group, found 2' },
    ]);
  });

  it('rejects patterns that do not compile', () => {
    const error = captureError(() => buildExtractionProfile({ fields: { broken: ['Host: ([a-z'] } }));
    expect(error.problems).toHaveLength(1);
    expect(error.problems[0].field).toBe('fields.broken[0]');
    expect(error.problems[0].message).toMatch(/^invalid regular expression: /);
  });

  it('rejects empty pattern lists and blank labels', () => {
    const error = captureError(() => buildExtractionProfile({ fields: { empty: [], blank: { label: ' ' } } }));
    expect(error.problems).toEqual([
      { field: 'fields.empty', message: 'at least one pattern is required' },
      { field: 'fields.blank.label', message: 'label must be a non-empty string' },
    ]);
  });

  it('drops blank labels from the flat label list', () => {
    expect(buildExtractionProfile({ labels: ['Status', ' '] }).labels).toEqual(['Status']);
  });
});
