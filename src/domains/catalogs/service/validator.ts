/**
 * Catalog file validation.
 *
 * Parses untrusted JSON into typed catalogs. Every problem found is
 * reported, not just the first one.
 */
import type { ValidationError } from '../../../utils/errors.js';
import type {
  CatalogFiles,
  CatalogKind,
  CompaniesCatalog,
  FieldPatternsCatalog,
  KeywordsCatalog,
  ReferenceCodesCatalog,
  ReportMappingCatalog,
} from '../types.js';

export type ParseOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; errors: ValidationError[] };

type Parser<T> = (raw: unknown, errors: ValidationError[]) => T;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, field: string, errors: ValidationError[]): string[] {
  if (!Array.isArray(value)) {
    errors.push({ field, message: 'must be an array of strings' });
    return [];
  }
  const strings: string[] = [];
  value.forEach((item, index) => {
    if (typeof item === 'string') {
      strings.push(item);
    } else {
      errors.push({ field: `${field}[${index}]`, message: 'must be a string' });
    }
  });
  return strings;
}

function stringMap(value: unknown, field: string, errors: ValidationError[]): Record<string, string> {
  if (!isRecord(value)) {
    errors.push({ field, message: 'must be an object of strings' });
    return {};
  }
  const result: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item === 'string') {
      result[key] = item;
    } else {
      errors.push({ field: `${field}.${key}`, message: 'must be a string' });
    }
  }
  return result;
}

function objectField(raw: unknown, key: string, errors: ValidationError[]): unknown {
  if (!isRecord(raw)) {
    errors.push({ field: '(root)', message: 'must be a JSON object' });
    return undefined;
  }
  if (!(key in raw)) {
    errors.push({ field: key, message: 'is required' });
    return undefined;
  }
  return raw[key];
}

const parseCompanies: Parser<CompaniesCatalog> = (raw, errors) => {
  const value = objectField(raw, 'companies', errors);
  return { companies: value === undefined ? [] : stringList(value, 'companies', errors) };
};

const parseReferenceCodes: Parser<ReferenceCodesCatalog> = (raw, errors) => {
  const value = objectField(raw, 'incident_codes', errors);
  return { incident_codes: value === undefined ? {} : stringMap(value, 'incident_codes', errors) };
};

const parseKeywords: Parser<KeywordsCatalog> = (raw, errors) => {
  const value = objectField(raw, 'categories', errors);
  const categories: Record<string, string[]> = {};
  if (value === undefined) return { categories };
  if (!isRecord(value)) {
    errors.push({ field: 'categories', message: 'must be an object of keyword arrays' });
    return { categories };
  }
  for (const [category, keywords] of Object.entries(value)) {
    categories[category] = stringList(keywords, `categories.${category}`, errors);
  }
  return { categories };
};

const parseFieldPatterns: Parser<FieldPatternsCatalog> = (raw, errors) => {
  const value = objectField(raw, 'fields', errors);
  const fields: FieldPatternsCatalog['fields'] = {};
  if (value === undefined) return { fields };
  if (!isRecord(value)) {
    errors.push({ field: 'fields', message: 'must be an object' });
    return { fields };
  }
  for (const [field, rule] of Object.entries(value)) {
    if (isRecord(rule)) {
      if (typeof rule.label === 'string') {
        fields[field] = { label: rule.label };
      } else {
        errors.push({ field: `fields.${field}.label`, message: 'must be a string' });
      }
    } else {
      fields[field] = stringList(rule, `fields.${field}`, errors);
    }
  }
  return { fields };
};

const parseReportMapping: Parser<ReportMappingCatalog> = (raw, errors) => {
  const mappings: ReportMappingCatalog = {};
  if (!isRecord(raw)) {
    errors.push({ field: '(root)', message: 'must be a JSON object' });
    return mappings;
  }
  if (Object.keys(raw).length === 0) {
    errors.push({ field: '(root)', message: 'at least one mapping is required' });
  }
  for (const [dataType, mapping] of Object.entries(raw)) {
    if (!isRecord(mapping)) {
      errors.push({ field: dataType, message: 'must be an object' });
      continue;
    }
    if (typeof mapping.sheet_name !== 'string' || !mapping.sheet_name.trim()) {
      errors.push({ field: `${dataType}.sheet_name`, message: 'must be a non-empty string' });
      continue;
    }
    if (!isRecord(mapping.columns)) {
      errors.push({ field: `${dataType}.columns`, message: 'must be an object' });
      continue;
    }
    mappings[dataType] = {
      sheet_name: mapping.sheet_name,
      columns: stringMap(mapping.columns, `${dataType}.columns`, errors),
    };
  }
  return mappings;
};

const PARSERS: { [K in CatalogKind]: Parser<CatalogFiles[K]> } = {
  companies: parseCompanies,
  referenceCodes: parseReferenceCodes,
  keywords: parseKeywords,
  fieldPatterns: parseFieldPatterns,
  reportMapping: parseReportMapping,
};

/**
 * Validate raw JSON for a catalog kind.
 */
export function parseCatalog<K extends CatalogKind>(kind: K, raw: unknown): ParseOutcome<CatalogFiles[K]> {
  const errors: ValidationError[] = [];
  const parser: Parser<CatalogFiles[K]> = PARSERS[kind];
  const value = parser(raw, errors);
  return errors.length === 0 ? { ok: true, value } : { ok: false, errors };
}

/**
 * Validate raw JSON for a catalog kind. Returns an array of errors (empty = valid).
 */
export function validateCatalog(kind: CatalogKind, raw: unknown): ValidationError[] {
  const outcome = parseCatalog(kind, raw);
  return outcome.ok ? [] : outcome.errors;
}

const DEFAULTS: { [K in CatalogKind]: () => CatalogFiles[K] } = {
  companies: () => ({ companies: [] }),
  referenceCodes: () => ({ incident_codes: {} }),
  keywords: () => ({
    categories: {
      'Incident Type': ['outage', 'breach', 'failure', 'error'],
      Priority: ['high', 'medium', 'low', 'critical', 'urgent'],
      Status: ['resolved', 'ongoing', 'investigating', 'mitigated'],
    },
  }),
  fieldPatterns: () => ({ fields: {} }),
  reportMapping: () => ({
    incidents: {
      sheet_name: 'Incidents',
      columns: {
        date: 'Date',
        company: 'Company',
        reference: 'Reference',
        description: 'Description',
        status: 'Status',
        priority: 'Priority',
      },
    },
  }),
};

/** Fresh default content for a catalog kind, written when its file is missing. */
export function defaultCatalog<K extends CatalogKind>(kind: K): CatalogFiles[K] {
  const create: () => CatalogFiles[K] = DEFAULTS[kind];
  return create();
}
