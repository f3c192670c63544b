#!/usr/bin/env npx tsx
/**
 * Local extraction CLI.
 *
 * Runs the extraction engine over a saved message and prints the result
 * as JSON. Useful for checking catalog edits against real mail.
 *
 * Usage:
 *   npm run extract -- message.txt
 *   npm run extract -- --catalogs ./config message.txt
 */

import fs from 'fs';
import config from '../src/config.js';
import { FileCatalogStore, loadExtractionProfile } from '../src/domains/catalogs/runtime/index.js';
import { extractStructured } from '../src/domains/extraction/runtime/index.js';
import { errorMessage } from '../src/utils/errors.js';

interface Options {
  catalogDir: string;
  file: string;
}

function parseArgs(args: string[]): Options {
  const options: Options = {
    catalogDir: config.catalogDir,
    file: '',
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--catalogs' || arg === '-c') {
      options.catalogDir = args[++i] || options.catalogDir;
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else if (!arg.startsWith('-')) {
      options.file = arg;
    }
  }

  return options;
}

function printHelp(): void {
  console.log(`
Local Extraction CLI

Usage:
  npm run extract -- <file>
  npm run extract -- --catalogs ./config <file>

Options:
  -c, --catalogs <dir>  Catalog directory (default: CATALOG_DIR)
  -h, --help            Show this help
`);
}

function main(): void {
  const options = parseArgs(process.argv.slice(2));

  if (!options.file) {
    printHelp();
    process.exit(1);
  }

  try {
    const text = fs.readFileSync(options.file, 'utf-8');
    const profile = loadExtractionProfile(new FileCatalogStore(options.catalogDir));
    console.log(JSON.stringify(extractStructured(text, profile), null, 2));
  } catch (error) {
    console.error(`Extraction failed: ${errorMessage(error)}`);
    process.exit(1);
  }
}

main();
