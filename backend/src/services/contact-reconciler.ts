import type { Logger } from 'pino';
import { z } from 'zod';
import { DryRunLedger } from './dry-run-ledger.js';
import { deriveFamilyKey } from './family-key.js';
import { normalizeContactId, splitGalleries } from './normalize.js';
import { csvCell, type CsvRow } from './csv-source.js';
import type { Reporter } from './reporter.js';
import type { FamilyFields, StoreGateway } from './store-gateway.js';

export type ContactImportSummary = {
  created: number;
  updated: number;
  skipped: number;
};

export type ImportOptions = {
  dryRun?: boolean;
  /** Shared between the passes of one dry run; a fresh one is used when omitted. */
  ledger?: DryRunLedger;
};

export const contactRowSchema = z
  .object({
    'Contact ID': csvCell,
    'First Name': csvCell,
    'Last Name': csvCell,
    Email: csvCell,
    Phone: csvCell,
    Galleries: csvCell,
    Created: csvCell,
  })
  .transform((row) => ({
    contactId: row['Contact ID'],
    firstName: row['First Name'],
    lastName: row['Last Name'],
    email: row.Email,
    phone: row.Phone,
    galleries: row.Galleries,
    createdAt: row.Created,
  }));

export type ContactRow = z.infer<typeof contactRowSchema>;

/** Sparse field set: optional columns are left out when the export has no value for them. */
export function buildFamilyFields(contact: ContactRow): FamilyFields {
  const fields: FamilyFields = {
    name: contact.firstName ? `${contact.firstName} ${contact.lastName}` : contact.lastName,
    lastName: contact.lastName,
    externalContactId: normalizeContactId(contact.contactId),
  };
  if (contact.email) fields.deliveryEmail = contact.email;
  if (contact.phone) fields.phone = contact.phone;
  if (contact.galleries) fields.galleries = splitGalleries(contact.galleries);
  return fields;
}

export class ContactReconciler {
  constructor(
    private readonly store: StoreGateway,
    private readonly reporter: Reporter,
    private readonly logger: Logger
  ) {}

  async importContacts(
    rows: AsyncIterable<CsvRow> | Iterable<CsvRow>,
    { dryRun = false, ledger = new DryRunLedger() }: ImportOptions = {}
  ): Promise<ContactImportSummary> {
    const summary: ContactImportSummary = { created: 0, updated: 0, skipped: 0 };
    let rowNumber = 0;

    for await (const raw of rows) {
      rowNumber += 1;
      const contact = contactRowSchema.parse(raw);

      if (!contact.lastName) {
        this.logger.debug({ rowNumber, contactId: contact.contactId }, 'contact without last name skipped');
        summary.skipped += 1;
        continue;
      }

      const familyKey = deriveFamilyKey(contact.lastName);
      const existing = await this.store.findFamilyByKey(familyKey);
      const exists = existing !== null || (dryRun && ledger.hasFamily(familyKey));
      const fields = buildFamilyFields(contact);

      this.logger.debug(
        { rowNumber, familyKey, exists, contactCreatedAt: contact.createdAt || null },
        'contact reconciled'
      );

      if (exists) {
        if (!dryRun) {
          await this.store.mergeFamily(familyKey, fields);
        }
        summary.updated += 1;
        this.reporter.line(`  Updated: ${contact.lastName}`);
      } else {
        if (dryRun) {
          ledger.addFamily(familyKey);
        } else {
          await this.store.createFamily(familyKey, fields);
        }
        summary.created += 1;
        this.reporter.line(`  Created: ${contact.lastName}`);
      }
    }

    this.reporter.line('');
    this.reporter.line(
      `Contacts summary: ${summary.created} created, ${summary.updated} updated, ${summary.skipped} skipped`
    );
    return summary;
  }
}
