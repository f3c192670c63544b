/**
 * Unit tests for labeled value extraction and flat label matching.
 */

import { describe, it, expect } from 'vitest';
import { extractLabeledValue, matchLabels } from '../../../src/domains/extraction/runtime/index.js';

describe('extractLabeledValue', () => {
  it('reads "Label: value" up to the end of the line', () => {
    const text = 'Status: Ongoing\nPriority: High';
    expect(extractLabeledValue(text, 'Status')).toBe('Ongoing');
    expect(extractLabeledValue(text, 'Priority')).toBe('High');
  });

  it('matches the label case-insensitively', () => {
    expect(extractLabeledValue('STATUS: Resolved', 'status')).toBe('Resolved');
  });

  it('reads "Label=value"', () => {
    expect(extractLabeledValue('Severity=Sev2\n', 'Severity')).toBe('Sev2');
  });

  it('reads "Label-value"', () => {
    expect(extractLabeledValue('Owner-Network Team', 'Owner')).toBe('Network Team');
  });

  it('prefers the colon form over later forms', () => {
    expect(extractLabeledValue('Status=Closed\nStatus: Open', 'Status')).toBe('Open');
  });

  it('reads "value for Label" as a last resort', () => {
    expect(extractLabeledValue('Escalation pending for Billing', 'Billing')).toBe('Escalation pending');
  });

  it('treats regex metacharacters in the label literally', () => {
    expect(extractLabeledValue('Cost (USD): 1200', 'Cost (USD)')).toBe('1200');
  });

  it('returns undefined when the label is not present', () => {
    expect(extractLabeledValue('Nothing to see here', 'Status')).toBeUndefined();
  });

  it('returns undefined when the captured value is blank', () => {
    expect(extractLabeledValue('Status:   ', 'Status')).toBeUndefined();
  });
});

describe('matchLabels', () => {
  const text = [
    'Incident Reference: INC-2025-001',
    'Company: Example Corp',
    'Status: Ongoing',
    'Priority: High',
  ].join('\n');

  it('matches every label present and extracts its value', () => {
    const result = matchLabels(text, ['Incident Reference', 'Company', 'Status', 'Priority']);

    expect(result.matchedKeywords).toEqual(['Incident Reference', 'Company', 'Status', 'Priority']);
    expect(result.extractedData).toEqual({
      'Incident Reference': 'INC-2025-001',
      Company: 'Example Corp',
      Status: 'Ongoing',
      Priority: 'High',
    });
  });

  it('skips labels that do not occur in the text', () => {
    const result = matchLabels(text, ['Owner', 'Status']);
    expect(result.matchedKeywords).toEqual(['Status']);
    expect(result.extractedData).toEqual({ Status: 'Ongoing' });
  });

  it('records a matched label without a value when no cascade step applies', () => {
    const result = matchLabels('please check the outage', ['outage']);
    expect(result.matchedKeywords).toEqual(['outage']);
    expect(result.extractedData).toEqual({});
  });

  it('ignores blank labels', () => {
    expect(matchLabels(text, ['', '  ']).matchedKeywords).toEqual([]);
  });
});
