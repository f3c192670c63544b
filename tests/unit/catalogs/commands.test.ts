/**
 * Unit tests for catalog CLI commands.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import {
  CatalogEditor,
  FileCatalogStore,
  runCatalogCommand,
} from '../../../src/domains/catalogs/runtime/index.js';
import { AppError, ConfigurationError } from '../../../src/utils/errors.js';

describe('runCatalogCommand', () => {
  let store: FileCatalogStore;
  let editor: CatalogEditor;

  beforeEach(() => {
    store = new FileCatalogStore(fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-commands-')));
    editor = new CatalogEditor(store);
  });

  it('adds a company and reports repeats', () => {
    expect(runCatalogCommand(editor, ['company', 'add', 'Example Corp'])).toBe('add company "Example Corp": done');
    expect(runCatalogCommand(editor, ['company', 'add', 'Example Corp'])).toBe(
      'add company "Example Corp": nothing to change'
    );
    expect(store.read('companies').companies).toEqual(['Example Corp']);
  });

  it('adds reference codes with an optional description', () => {
    runCatalogCommand(editor, ['code', 'add', 'INC', 'Incident']);
    runCatalogCommand(editor, ['code', 'add', 'CHG']);
    expect(store.read('referenceCodes').incident_codes).toEqual({ INC: 'Incident', CHG: '' });
  });

  it('adds keywords to a category', () => {
    expect(runCatalogCommand(editor, ['keyword', 'add', 'Region', 'emea'])).toBe(
      'add keyword "emea" to "Region": done'
    );
    expect(store.read('keywords').categories.Region).toEqual(['emea']);
  });

  it('sets pattern and label field rules', () => {
    runCatalogCommand(editor, ['field', 'pattern', 'host', 'Host:\\s*(\\S+)', 'Server:\\s*(\\S+)']);
    runCatalogCommand(editor, ['field', 'label', 'owner', 'Owner']);

    expect(store.read('fieldPatterns').fields).toEqual({
      host: ['Host:\\s*(\\S+)', 'Server:\\s*(\\S+)'],
      owner: { label: 'Owner' },
    });
  });

  it('passes invalid field patterns through as configuration errors', () => {
    expect(() => runCatalogCommand(editor, ['field', 'pattern', 'host', 'Host: \\S+'])).toThrow(ConfigurationError);
  });

  it('sets a report mapping from key=Header pairs', () => {
    runCatalogCommand(editor, ['mapping', 'set', 'weekly', 'Weekly', 'date=Date', 'company=Company']);
    expect(store.read('reportMapping').weekly).toEqual({
      sheet_name: 'Weekly',
      columns: { date: 'Date', company: 'Company' },
    });
  });

  it('rejects malformed column pairs', () => {
    expect(() => runCatalogCommand(editor, ['mapping', 'set', 'weekly', 'Weekly', 'date'])).toThrow(
      'Column "date" must look like key=Header'
    );
  });

  it('rejects unknown commands and missing arguments', () => {
    expect(() => runCatalogCommand(editor, ['company', 'rename'])).toThrow('Unknown command "company rename"');
    expect(() => runCatalogCommand(editor, [])).toThrow('No command given');

    try {
      runCatalogCommand(editor, ['keyword', 'add', 'Region']);
      expect.unreachable('command should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      if (error instanceof AppError) {
        expect(error.code).toBe('INVALID_COMMAND');
        expect(error.message).toBe('"keyword add" needs 2 argument(s), got 1');
      }
    }
  });
});
