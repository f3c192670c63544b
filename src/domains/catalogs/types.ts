/**
 * @fileoverview Catalog file type definitions.
 *
 * Each catalog kind is stored as one JSON file in the catalog directory.
 * Key names inside the files (snake_case) match what existing deployments
 * already have on disk.
 */

export type CompaniesCatalog = { companies: string[] };

export type ReferenceCodesCatalog = { incident_codes: Record<string, string> };

export type KeywordsCatalog = { categories: Record<string, string[]> };

/** A field is either an ordered pattern list or `{ "label": "..." }`. */
export type FieldPatternsCatalog = { fields: Record<string, string[] | { label: string }> };

export type ReportMapping = {
  sheet_name: string;
  /** Report record key → spreadsheet column header, in column order */
  columns: Record<string, string>;
};

export type ReportMappingCatalog = Record<string, ReportMapping>;

export type CatalogFiles = {
  companies: CompaniesCatalog;
  referenceCodes: ReferenceCodesCatalog;
  keywords: KeywordsCatalog;
  fieldPatterns: FieldPatternsCatalog;
  reportMapping: ReportMappingCatalog;
};

export type CatalogKind = keyof CatalogFiles;

export const CATALOG_KINDS: readonly CatalogKind[] = [
  'companies',
  'referenceCodes',
  'keywords',
  'fieldPatterns',
  'reportMapping',
];

export const CATALOG_FILE_NAMES: Record<CatalogKind, string> = {
  companies: 'company_name.json',
  referenceCodes: 'incident_ref_code.json',
  keywords: 'pre_defined_keywords.json',
  fieldPatterns: 'field_patterns.json',
  reportMapping: 'excel_sheet_mapping.json',
};

/** Report mapping key used by the inbox watcher. */
export const INCIDENT_REPORT_TYPE = 'incidents';

/**
 * Storage for catalog files.
 * Implementations validate on both read and write.
 */
export interface CatalogStore {
  read<K extends CatalogKind>(kind: K): CatalogFiles[K];
  write<K extends CatalogKind>(kind: K, value: CatalogFiles[K]): void;
  loadAll(): CatalogFiles;
}
