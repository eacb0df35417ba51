import path from 'node:path';
import { Command } from 'commander';
import type { ImportRequest } from './services/import-runner.js';

export type CliOptions = {
  contacts?: string;
  orders?: string;
  dryRun?: boolean;
  all?: string;
};

/** File names of a full year's exports under the data directory. */
export function standardPaths(dataDir: string, year: string): { contactsPath: string; ordersPath: string } {
  return {
    contactsPath: path.join(dataDir, `contacts-${year}.csv`),
    ordersPath: path.join(dataDir, year, `orders-from-${year}-01-01-to-${year}-12-31.csv`),
  };
}

export function buildProgram(): Command {
  return new Command()
    .name('studio-import')
    .description('Import gallery platform contact and order exports into the studio database')
    .option('--contacts <path>', 'path to the contacts CSV export')
    .option('--orders <path>', 'path to the orders CSV export')
    .option('--dry-run', 'preview without making changes', false)
    .option('--all <year>', 'import both exports for a year from the data directory');
}

/** True when at least one input file is named, before any configuration is needed. */
export function hasInputSelection(options: CliOptions): boolean {
  return Boolean(options.contacts || options.orders || options.all);
}

export function resolveRequest(options: CliOptions, dataDir: string): ImportRequest | null {
  let contactsPath = options.contacts;
  let ordersPath = options.orders;

  if (options.all) {
    ({ contactsPath, ordersPath } = standardPaths(dataDir, options.all));
  }

  if (!contactsPath && !ordersPath) {
    return null;
  }
  return { contactsPath, ordersPath, dryRun: Boolean(options.dryRun) };
}
