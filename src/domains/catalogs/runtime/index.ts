/**
 * @fileoverview Catalog domain public API.
 *
 * Owns the process-wide catalog store and the mapping from catalog files
 * to an extraction profile.
 */

import config from '../../../config.js';
import {
  buildExtractionProfile,
  type ExtractionProfile,
  type ExtractionProfileInput,
} from '../../extraction/runtime/index.js';
import { FileCatalogStore } from '../repo/filesystem.js';
import type { CatalogFiles, CatalogStore } from '../types.js';

export { FileCatalogStore } from '../repo/filesystem.js';
export { CatalogEditor } from '../service/editor.js';
export { runCatalogCommand, CATALOG_COMMAND_USAGE } from '../service/commands.js';
export { parseCatalog, validateCatalog, defaultCatalog } from '../service/validator.js';
export { CATALOG_KINDS, CATALOG_FILE_NAMES, INCIDENT_REPORT_TYPE } from '../types.js';
export type * from '../types.js';

let instance: CatalogStore | null = null;

export function getCatalogStore(): CatalogStore {
  if (!instance) {
    instance = new FileCatalogStore(config.catalogDir);
  }
  return instance;
}

export function resetCatalogStore(): void {
  instance = null;
}

/**
 * Map catalog files to profile input. The flat label list holds every
 * category keyword followed by every label-based field rule's label.
 */
export function toProfileInput(catalogs: CatalogFiles): ExtractionProfileInput {
  const labels: string[] = Object.values(catalogs.keywords.categories).flat();
  for (const rule of Object.values(catalogs.fieldPatterns.fields)) {
    if ('label' in rule) labels.push(rule.label);
  }

  return {
    companies: catalogs.companies.companies,
    keywords: catalogs.keywords.categories,
    fields: catalogs.fieldPatterns.fields,
    labels,
  };
}

/**
 * Read every catalog and compile it.
 *
 * @throws ConfigurationError when a catalog file or field pattern is invalid
 */
export function loadExtractionProfile(store: CatalogStore = getCatalogStore()): ExtractionProfile {
  return buildExtractionProfile(toProfileInput(store.loadAll()));
}
