/**
 * Unit tests for structured extraction.
 */

import { describe, it, expect } from 'vitest';
import { buildExtractionProfile, extractStructured } from '../../../src/domains/extraction/runtime/index.js';

const EMAIL = [
  'Incident Reference: INC-2025-001',
  'Company: Example Corp',
  'Date: 2025-03-15 14:30',
  'Status: Ongoing',
  'Priority: High',
  'Affected System: payments-api',
  '',
  'We are seeing an outage on the checkout flow.',
].join('\n');

const profile = buildExtractionProfile({
  companies: ['Example', 'Example Corp', 'Fabrikam'],
  keywords: {
    'Incident Type': ['outage', 'breach'],
    Priority: ['high', 'low'],
    Status: ['resolved'],
  },
  fields: {
    affected_system: ['Affected System:\\s*(\\S+)'],
    owner: ['Owner:\\s*(\\S+)'],
    status: { label: 'Status' },
  },
  labels: ['Incident Reference', 'Company', 'Status', 'Priority'],
});

describe('extractStructured', () => {
  it('combines every extractor into one record', () => {
    const result = extractStructured(EMAIL, profile);

    expect(result).toEqual({
      matchedKeywords: ['Incident Reference', 'Company', 'Status', 'Priority'],
      extractedData: {
        'Incident Reference': 'INC-2025-001',
        Company: 'Example Corp',
        Status: 'Ongoing',
        Priority: 'High',
      },
      company: 'Example Corp',
      reference: 'INC-2025-001',
      datetime: new Date(2025, 2, 15, 14, 30),
      keywordsByCategory: {
        'Incident Type': ['outage'],
        Priority: ['high'],
      },
      fields: {
        affected_system: 'payments-api',
        status: 'Ongoing',
      },
    });
  });

  it('is idempotent', () => {
    expect(extractStructured(EMAIL, profile)).toEqual(extractStructured(EMAIL, profile));
  });

  it('omits absent sub-results instead of failing', () => {
    const result = extractStructured('Thanks, all good here.', profile);

    expect(result).toEqual({
      matchedKeywords: [],
      extractedData: {},
      keywordsByCategory: {},
      fields: {},
    });
    expect('company' in result).toBe(false);
    expect('reference' in result).toBe(false);
    expect('datetime' in result).toBe(false);
  });

  it('skips company and keyword matching when the profile has no catalogs', () => {
    const result = extractStructured(EMAIL, buildExtractionProfile({}));

    expect(result.company).toBeUndefined();
    expect(result.keywordsByCategory).toEqual({});
    expect(result.reference).toBe('INC-2025-001');
    expect(result.datetime).toEqual(new Date(2025, 2, 15, 14, 30));
  });

  it('tries field patterns in order until one captures a value', () => {
    const fallbackProfile = buildExtractionProfile({
      fields: { host: ['Server:\\s*(\\S+)', 'Host:\\s*(\\S+)'] },
    });
    expect(extractStructured('Host: db-01', fallbackProfile).fields).toEqual({ host: 'db-01' });
  });

  it('keeps the first matching pattern even when its capture is blank', () => {
    const ownerProfile = buildExtractionProfile({
      fields: { owner: ['Owner:[ \\t]*([^\\n]*)', 'Assignee:\\s*(\\S+)'] },
    });
    expect(extractStructured('Owner:\nAssignee: bob', ownerProfile).fields).toEqual({ owner: '' });
  });
});
