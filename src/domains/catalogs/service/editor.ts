/**
 * @fileoverview Catalog editing operations.
 *
 * Each operation reads the current file, applies one change and saves it.
 * Operations return false when there was nothing to change (unknown entry
 * on remove, existing entry on add) so callers can report it.
 */

import { buildExtractionProfile } from '../../extraction/runtime/index.js';
import type { CatalogStore, ReportMapping } from '../types.js';

const has = (record: object, key: string): boolean => Object.hasOwn(record, key);

export class CatalogEditor {
  constructor(private readonly store: CatalogStore) {}

  // -- companies ------------------------------------------------------------

  addCompany(name: string): boolean {
    const catalog = this.store.read('companies');
    if (catalog.companies.includes(name)) return false;
    this.store.write('companies', { companies: [...catalog.companies, name] });
    return true;
  }

  removeCompany(name: string): boolean {
    const catalog = this.store.read('companies');
    if (!catalog.companies.includes(name)) return false;
    this.store.write('companies', { companies: catalog.companies.filter((c) => c !== name) });
    return true;
  }

  // -- reference codes -------------------------------------------------------

  addReferenceCode(code: string, description = ''): boolean {
    const catalog = this.store.read('referenceCodes');
    if (has(catalog.incident_codes, code)) return false;
    this.store.write('referenceCodes', {
      incident_codes: { ...catalog.incident_codes, [code]: description },
    });
    return true;
  }

  updateReferenceCode(code: string, description: string): boolean {
    const catalog = this.store.read('referenceCodes');
    if (!has(catalog.incident_codes, code)) return false;
    this.store.write('referenceCodes', {
      incident_codes: { ...catalog.incident_codes, [code]: description },
    });
    return true;
  }

  removeReferenceCode(code: string): boolean {
    const catalog = this.store.read('referenceCodes');
    if (!has(catalog.incident_codes, code)) return false;
    const { [code]: _removed, ...rest } = catalog.incident_codes;
    this.store.write('referenceCodes', { incident_codes: rest });
    return true;
  }

  // -- keywords -------------------------------------------------------------

  addKeywordCategory(category: string): boolean {
    const catalog = this.store.read('keywords');
    if (has(catalog.categories, category)) return false;
    this.store.write('keywords', { categories: { ...catalog.categories, [category]: [] } });
    return true;
  }

  removeKeywordCategory(category: string): boolean {
    const catalog = this.store.read('keywords');
    if (!has(catalog.categories, category)) return false;
    const { [category]: _removed, ...rest } = catalog.categories;
    this.store.write('keywords', { categories: rest });
    return true;
  }

  /** Add a keyword, creating its category when needed. */
  addKeyword(category: string, keyword: string): boolean {
    const catalog = this.store.read('keywords');
    const existing = has(catalog.categories, category) ? catalog.categories[category] : [];
    if (existing.includes(keyword)) return false;
    this.store.write('keywords', {
      categories: { ...catalog.categories, [category]: [...existing, keyword] },
    });
    return true;
  }

  /** Remove a keyword; a category left empty is removed with it. */
  removeKeyword(category: string, keyword: string): boolean {
    const catalog = this.store.read('keywords');
    if (!has(catalog.categories, category)) return false;
    const existing = catalog.categories[category];
    if (!existing.includes(keyword)) return false;

    const remaining = existing.filter((k) => k !== keyword);
    const { [category]: _removed, ...rest } = catalog.categories;
    this.store.write('keywords', {
      categories: remaining.length > 0 ? { ...catalog.categories, [category]: remaining } : rest,
    });
    return true;
  }

  // -- field rules ----------------------------------------------------------

  /**
   * Set the rule for an output field.
   *
   * @throws ConfigurationError when a pattern does not compile or lacks
   *   exactly one capture group; nothing is saved in that case
   */
  setFieldRule(field: string, rule: string[] | { label: string }): void {
    buildExtractionProfile({ fields: { [field]: rule } });
    const catalog = this.store.read('fieldPatterns');
    this.store.write('fieldPatterns', { fields: { ...catalog.fields, [field]: rule } });
  }

  removeFieldRule(field: string): boolean {
    const catalog = this.store.read('fieldPatterns');
    if (!has(catalog.fields, field)) return false;
    const { [field]: _removed, ...rest } = catalog.fields;
    this.store.write('fieldPatterns', { fields: rest });
    return true;
  }

  // -- report mapping -------------------------------------------------------

  setReportMapping(dataType: string, mapping: ReportMapping): void {
    const catalog = this.store.read('reportMapping');
    this.store.write('reportMapping', { ...catalog, [dataType]: mapping });
  }

  removeReportMapping(dataType: string): boolean {
    const catalog = this.store.read('reportMapping');
    if (!has(catalog, dataType)) return false;
    const { [dataType]: _removed, ...rest } = catalog;
    this.store.write('reportMapping', rest);
    return true;
  }
}
