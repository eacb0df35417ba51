import type { Logger } from 'pino';
import { withConnection } from '../db.js';
import type { DbConfig } from '../config.js';
import { ContactReconciler, type ContactImportSummary } from './contact-reconciler.js';
import { readCsvRows, type CsvRow } from './csv-source.js';
import { DryRunLedger } from './dry-run-ledger.js';
import { OrderReconciler, type OrderImportSummary } from './order-reconciler.js';
import { PgStoreGateway } from './pg-store-gateway.js';
import type { Reporter } from './reporter.js';
import type { StoreGateway } from './store-gateway.js';

export type ImportRequest = {
  contactsPath?: string;
  ordersPath?: string;
  dryRun: boolean;
};

export type ImportResult = {
  contacts: ContactImportSummary | null;
  orders: OrderImportSummary | null;
};

export type ImportDependencies = {
  reporter: Reporter;
  logger: Logger;
  readRows?: (filePath: string) => AsyncIterable<CsvRow>;
};

/** Runs the contacts pass, then the orders pass, against an already open store. */
export async function runImport(
  store: StoreGateway,
  request: ImportRequest,
  { reporter, logger, readRows = readCsvRows }: ImportDependencies
): Promise<ImportResult> {
  const prefix = request.dryRun ? '[DRY RUN] ' : '';
  const result: ImportResult = { contacts: null, orders: null };
  const options = { dryRun: request.dryRun, ledger: new DryRunLedger() };

  if (request.contactsPath) {
    reporter.line('');
    reporter.line(`${prefix}Importing contacts from: ${request.contactsPath}`);
    const reconciler = new ContactReconciler(store, reporter, logger.child({ pass: 'contacts' }));
    result.contacts = await reconciler.importContacts(readRows(request.contactsPath), options);
  }

  if (request.ordersPath) {
    reporter.line('');
    reporter.line(`${prefix}Importing orders from: ${request.ordersPath}`);
    const reconciler = new OrderReconciler(store, reporter, logger.child({ pass: 'orders' }));
    result.orders = await reconciler.importOrders(readRows(request.ordersPath), options);
  }

  reporter.line('');
  reporter.line('Import complete!');
  return result;
}

/** Opens one PostgreSQL connection for the whole run and closes it on every exit path. */
export async function runImportWithDatabase(
  database: DbConfig,
  request: ImportRequest,
  dependencies: ImportDependencies
): Promise<ImportResult> {
  const { logger } = dependencies;
  return withConnection(database, async (client) => {
    logger.info({ host: database.host, database: database.database }, 'connected to store');
    try {
      const store = new PgStoreGateway(client);
      await store.ensureSchema();
      return await runImport(store, request, dependencies);
    } finally {
      logger.info('closing store connection');
    }
  });
}
