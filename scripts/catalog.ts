#!/usr/bin/env npx tsx
/**
 * Catalog editing CLI.
 *
 * Edits the JSON catalogs in place; every save backs up the previous file.
 *
 * Usage:
 *   npm run catalog -- company add "Example Corp"
 *   npm run catalog -- --catalogs ./config keyword add Priority p1
 */

import config from '../src/config.js';
import {
  CATALOG_COMMAND_USAGE,
  CatalogEditor,
  FileCatalogStore,
  runCatalogCommand,
} from '../src/domains/catalogs/runtime/index.js';
import { errorMessage } from '../src/utils/errors.js';

function printHelp(): void {
  console.log(`
Catalog CLI

Usage:
  npm run catalog -- [--catalogs <dir>] <command>

Commands:${CATALOG_COMMAND_USAGE}
Options:
  -c, --catalogs <dir>  Catalog directory (default: CATALOG_DIR)
  -h, --help            Show this help
`);
}

function main(): void {
  const args = process.argv.slice(2);
  let catalogDir = config.catalogDir;

  if (args[0] === '--help' || args[0] === '-h' || args.length === 0) {
    printHelp();
    process.exit(args.length === 0 ? 1 : 0);
  }

  if (args[0] === '--catalogs' || args[0] === '-c') {
    catalogDir = args[1] || catalogDir;
    args.splice(0, 2);
  }

  try {
    const editor = new CatalogEditor(new FileCatalogStore(catalogDir));
    console.log(runCatalogCommand(editor, args));
  } catch (error) {
    console.error(`Catalog command failed: ${errorMessage(error)}`);
    process.exit(1);
  }
}

main();
