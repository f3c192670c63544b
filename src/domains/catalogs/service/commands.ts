/**
 * @fileoverview Text commands over the catalog editor, used by the catalog CLI.
 *
 * Each command is `<target> <action> ...args`, e.g.
 * `keyword add "Incident Type" outage`. The result is a one-line message;
 * bad usage raises an AppError with code `INVALID_COMMAND`.
 */

import { AppError } from '../../../utils/errors.js';
import type { CatalogEditor } from './editor.js';

export const CATALOG_COMMAND_USAGE = `
  company add|remove <name>
  code add <code> [description]
  code update <code> <description>
  code remove <code>
  category add|remove <category>
  keyword add|remove <category> <keyword>
  field pattern <field> <pattern> [pattern...]
  field label <field> <label>
  field remove <field>
  mapping set <dataType> <sheetName> <key=Header> [key=Header...]
  mapping remove <dataType>
`;

function usage(message: string): AppError {
  return new AppError(message, 'INVALID_COMMAND');
}

function need(args: string[], count: number, command: string): void {
  if (args.length < count) {
    throw usage(`"${command}" needs ${count} argument(s), got ${args.length}`);
  }
}

function changed(done: boolean, what: string): string {
  return done ? `${what}: done` : `${what}: nothing to change`;
}

/** key=Header pairs → column map, in argument order. */
function parseColumns(pairs: string[]): Record<string, string> {
  const columns: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0 || separator === pair.length - 1) {
      throw usage(`Column "${pair}" must look like key=Header`);
    }
    columns[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return columns;
}

export function runCatalogCommand(editor: CatalogEditor, argv: string[]): string {
  const [target = '', action = '', ...args] = argv;
  const command = `${target} ${action}`.trim();

  switch (command) {
    case 'company add':
      need(args, 1, command);
      return changed(editor.addCompany(args[0]), `add company "${args[0]}"`);
    case 'company remove':
      need(args, 1, command);
      return changed(editor.removeCompany(args[0]), `remove company "${args[0]}"`);

    case 'code add':
      need(args, 1, command);
      return changed(editor.addReferenceCode(args[0], args[1] ?? ''), `add code "${args[0]}"`);
    case 'code update':
      need(args, 2, command);
      return changed(editor.updateReferenceCode(args[0], args[1]), `update code "${args[0]}"`);
    case 'code remove':
      need(args, 1, command);
      return changed(editor.removeReferenceCode(args[0]), `remove code "${args[0]}"`);

    case 'category add':
      need(args, 1, command);
      return changed(editor.addKeywordCategory(args[0]), `add category "${args[0]}"`);
    case 'category remove':
      need(args, 1, command);
      return changed(editor.removeKeywordCategory(args[0]), `remove category "${args[0]}"`);

    case 'keyword add':
      need(args, 2, command);
      return changed(editor.addKeyword(args[0], args[1]), `add keyword "${args[1]}" to "${args[0]}"`);
    case 'keyword remove':
      need(args, 2, command);
      return changed(editor.removeKeyword(args[0], args[1]), `remove keyword "${args[1]}" from "${args[0]}"`);

    case 'field pattern':
      need(args, 2, command);
      editor.setFieldRule(args[0], args.slice(1));
      return `set field "${args[0]}": done`;
    case 'field label':
      need(args, 2, command);
      editor.setFieldRule(args[0], { label: args[1] });
      return `set field "${args[0]}": done`;
    case 'field remove':
      need(args, 1, command);
      return changed(editor.removeFieldRule(args[0]), `remove field "${args[0]}"`);

    case 'mapping set':
      need(args, 3, command);
      editor.setReportMapping(args[0], { sheet_name: args[1], columns: parseColumns(args.slice(2)) });
      return `set mapping "${args[0]}": done`;
    case 'mapping remove':
      need(args, 1, command);
      return changed(editor.removeReportMapping(args[0]), `remove mapping "${args[0]}"`);

    default:
      throw usage(command ? `Unknown command "${command}"` : 'No command given');
  }
}
