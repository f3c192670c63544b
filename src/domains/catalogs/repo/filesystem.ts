/**
 * Filesystem repository for catalog JSON files.
 * Missing files are created with defaults; invalid files are rejected.
 */
import fs from 'fs';
import path from 'path';
import { DateTime } from 'luxon';
import { ConfigurationError, errorMessage } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import { defaultCatalog, parseCatalog } from '../service/validator.js';
import {
  CATALOG_FILE_NAMES,
  type CatalogFiles,
  type CatalogKind,
  type CatalogStore,
} from '../types.js';

const log = createLogger({ domain: 'catalog-store' });

export class FileCatalogStore implements CatalogStore {
  constructor(private readonly rootDir: string) {}

  filePath(kind: CatalogKind): string {
    return path.join(this.rootDir, CATALOG_FILE_NAMES[kind]);
  }

  read<K extends CatalogKind>(kind: K): CatalogFiles[K] {
    const filePath = this.filePath(kind);

    if (!fs.existsSync(filePath)) {
      const fallback = defaultCatalog(kind);
      log.warn('catalog_missing_using_default', { kind, path: filePath });
      this.writeFile(filePath, fallback);
      return fallback;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Catalog ${CATALOG_FILE_NAMES[kind]} is not valid JSON: ${errorMessage(error)}`,
        'INVALID_CATALOG'
      );
    }

    const outcome = parseCatalog(kind, raw);
    if (!outcome.ok) {
      throw new ConfigurationError(
        `Catalog ${CATALOG_FILE_NAMES[kind]} is invalid`,
        'INVALID_CATALOG',
        outcome.errors
      );
    }

    log.debug('catalog_loaded', { kind });
    return outcome.value;
  }

  write<K extends CatalogKind>(kind: K, value: CatalogFiles[K]): void {
    const outcome = parseCatalog(kind, value);
    if (!outcome.ok) {
      throw new ConfigurationError(
        `Refusing to save invalid catalog ${CATALOG_FILE_NAMES[kind]}`,
        'INVALID_CATALOG',
        outcome.errors
      );
    }

    const filePath = this.filePath(kind);
    if (fs.existsSync(filePath)) {
      this.backup(filePath);
    }
    this.writeFile(filePath, outcome.value);
    log.info('catalog_saved', { kind });
  }

  loadAll(): CatalogFiles {
    return {
      companies: this.read('companies'),
      referenceCodes: this.read('referenceCodes'),
      keywords: this.read('keywords'),
      fieldPatterns: this.read('fieldPatterns'),
      reportMapping: this.read('reportMapping'),
    };
  }

  /** Copy a catalog file to backups/<name>_<timestamp>.json beside it. */
  private backup(filePath: string): void {
    const backupDir = path.join(this.rootDir, 'backups');
    fs.mkdirSync(backupDir, { recursive: true });

    const { name, ext } = path.parse(filePath);
    const stamp = DateTime.now().toFormat('yyyyMMdd_HHmmssSSS');
    let backupPath = path.join(backupDir, `${name}_${stamp}${ext}`);
    for (let n = 1; fs.existsSync(backupPath); n++) {
      backupPath = path.join(backupDir, `${name}_${stamp}_${n}${ext}`);
    }
    fs.copyFileSync(filePath, backupPath);
    log.debug('catalog_backup_created', { path: backupPath });
  }

  private writeFile(filePath: string, value: unknown): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
  }
}
