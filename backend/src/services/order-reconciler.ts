import type { Logger } from 'pino';
import { z } from 'zod';
import { invalidOrderId } from '../errors.js';
import type { ImportOptions } from './contact-reconciler.js';
import { csvCell, type CsvRow } from './csv-source.js';
import { DryRunLedger } from './dry-run-ledger.js';
import { deriveFamilyKey, surnameFromGallery } from './family-key.js';
import { countItems, normalizeAmount, normalizeOrderDate, parseOrderId, truncateItems } from './normalize.js';
import type { Reporter } from './reporter.js';
import type { OrderFields, StoreGateway } from './store-gateway.js';

export type OrderImportSummary = {
  created: number;
  skipped: number;
  /** Surnames whose family did not exist when their first order was seen, sorted. */
  familiesNotFound: string[];
};

const NEW_FAMILY_PREVIEW_LIMIT = 10;

export const orderRowSchema = z
  .object({
    'Order ID': csvCell,
    'Order Date': csvCell,
    Gallery: csvCell,
    'Customer Name': csvCell,
    'Customer Email': csvCell,
    'Total Sales': csvCell,
    Profit: csvCell,
    'Items Ordered': csvCell,
  })
  .transform((row) => ({
    orderId: row['Order ID'],
    orderDate: row['Order Date'],
    gallery: row.Gallery,
    customerName: row['Customer Name'],
    customerEmail: row['Customer Email'],
    totalSales: row['Total Sales'],
    profit: row.Profit,
    itemsOrdered: row['Items Ordered'],
  }));

export type OrderRow = z.infer<typeof orderRowSchema>;

export function buildOrderFields(order: OrderRow, externalOrderId: number): OrderFields {
  const totalSales = normalizeAmount(order.totalSales);
  return {
    externalOrderId,
    orderDate: normalizeOrderDate(order.orderDate),
    galleryName: order.gallery,
    customerName: order.customerName,
    customerEmail: order.customerEmail,
    totalSales,
    profit: normalizeAmount(order.profit),
    isComp: totalSales === 0,
    itemCount: countItems(order.itemsOrdered),
    itemsRaw: truncateItems(order.itemsOrdered),
  };
}

export function formatOrderLine(orderId: string, fields: OrderFields): string {
  const amount = fields.totalSales > 0 ? `$${fields.totalSales.toFixed(2)}` : '$0 (comp)';
  return `  Order #${orderId}: ${fields.galleryName} - ${amount}`;
}

export function formatNewFamilies(surnames: string[]): string {
  const preview = surnames.slice(0, NEW_FAMILY_PREVIEW_LIMIT).join(', ');
  const more = surnames.length > NEW_FAMILY_PREVIEW_LIMIT ? '...' : '';
  return `Created ${surnames.length} new families from orders: ${preview}${more}`;
}

export class OrderReconciler {
  constructor(
    private readonly store: StoreGateway,
    private readonly reporter: Reporter,
    private readonly logger: Logger
  ) {}

  async importOrders(
    rows: AsyncIterable<CsvRow> | Iterable<CsvRow>,
    { dryRun = false, ledger = new DryRunLedger() }: ImportOptions = {}
  ): Promise<OrderImportSummary> {
    let created = 0;
    let skipped = 0;
    const familiesNotFound = new Set<string>();
    let rowNumber = 0;

    for await (const raw of rows) {
      rowNumber += 1;
      const order = orderRowSchema.parse(raw);

      if (!order.orderId || !order.gallery) {
        this.logger.debug({ rowNumber }, 'order without id or gallery skipped');
        skipped += 1;
        continue;
      }

      const surname = surnameFromGallery(order.gallery);
      const familyKey = deriveFamilyKey(surname);

      const family = await this.store.findFamilyByKey(familyKey);
      if (!family && !(dryRun && ledger.hasFamily(familyKey))) {
        familiesNotFound.add(surname);
        this.logger.debug({ rowNumber, familyKey, gallery: order.gallery }, 'family missing, creating stub');
        if (dryRun) {
          ledger.addFamily(familyKey);
        } else {
          await this.store.createFamily(familyKey, {
            name: order.gallery,
            lastName: surname,
            deliveryEmail: order.customerEmail,
          });
        }
      }

      const externalOrderId = parseOrderId(order.orderId);
      if (externalOrderId === null) {
        throw invalidOrderId(order.orderId, rowNumber);
      }

      const fields = buildOrderFields(order, externalOrderId);
      if (fields.orderDate === order.orderDate && order.orderDate) {
        this.logger.debug({ rowNumber, orderDate: order.orderDate }, 'order date kept verbatim');
      }

      const existing = await this.store.findOrderByExternalId(externalOrderId);
      if (existing || (dryRun && ledger.hasOrder(externalOrderId))) {
        this.logger.debug({ rowNumber, externalOrderId, orderId: existing?.id ?? null }, 'order already imported');
        skipped += 1;
        continue;
      }

      if (dryRun) {
        ledger.addOrder(externalOrderId);
      } else {
        const orderId = await this.store.createOrder(fields);
        await this.store.createRelationship(familyKey, orderId, {
          amount: fields.totalSales,
          orderDate: fields.orderDate,
        });
      }

      created += 1;
      this.reporter.line(formatOrderLine(order.orderId, fields));
    }

    const newFamilies = [...familiesNotFound].sort();
    this.reporter.line('');
    this.reporter.line(`Orders summary: ${created} created, ${skipped} skipped`);
    if (newFamilies.length) {
      this.reporter.line(formatNewFamilies(newFamilies));
    }

    return { created, skipped, familiesNotFound: newFamilies };
  }
}
