import { query, withTransaction, type Queryable } from '../db.js';
import { storeFailure } from '../errors.js';
import type {
  FamilyFields,
  FamilyRecord,
  OrderFields,
  OrderRef,
  RelationshipAttributes,
  StoreGateway,
} from './store-gateway.js';

type FamilyRow = {
  id: string;
  name: string;
  last_name: string;
  external_contact_id: string | number | null;
  delivery_email: string | null;
  phone: string | null;
  galleries: string[] | null;
};

type OrderRow = {
  id: string;
  external_order_id: string | number;
};

const FAMILY_COLUMNS: ReadonlyArray<[keyof FamilyFields, string]> = [
  ['name', 'name'],
  ['lastName', 'last_name'],
  ['externalContactId', 'external_contact_id'],
  ['deliveryEmail', 'delivery_email'],
  ['phone', 'phone'],
  ['galleries', 'galleries'],
];

function familyAssignments(fields: Partial<FamilyFields>): { columns: string[]; values: unknown[] } {
  const columns: string[] = [];
  const values: unknown[] = [];
  for (const [key, column] of FAMILY_COLUMNS) {
    const value = fields[key];
    if (value === undefined) continue;
    columns.push(column);
    values.push(value);
  }
  return { columns, values };
}

function toFamilyRecord(row: FamilyRow): FamilyRecord {
  const record: FamilyRecord = {
    id: row.id,
    name: row.name,
    lastName: row.last_name,
    externalContactId: row.external_contact_id == null ? null : Number(row.external_contact_id),
  };
  if (row.delivery_email != null) record.deliveryEmail = row.delivery_email;
  if (row.phone != null) record.phone = row.phone;
  if (row.galleries != null) record.galleries = row.galleries;
  return record;
}

export class PgStoreGateway implements StoreGateway {
  constructor(private readonly client: Queryable) {}

  async ensureSchema(): Promise<void> {
    await withTransaction(this.client, async () => {
      await query(this.client, `create extension if not exists pgcrypto`);
      await query(
        this.client,
        `
        create table if not exists family (
          id text primary key,
          name text not null,
          last_name text,
          external_contact_id bigint,
          delivery_email text,
          phone text,
          galleries text[],
          created_at timestamptz not null default now(),
          updated_at timestamptz not null default now()
        )
      `
      );
      await query(
        this.client,
        `
        create table if not exists customer_order (
          id uuid primary key default gen_random_uuid(),
          external_order_id bigint not null,
          order_date text,
          gallery_name text,
          customer_name text,
          customer_email text,
          total_sales double precision not null default 0,
          profit double precision not null default 0,
          is_comp boolean not null default false,
          item_count integer not null default 0,
          items_raw text,
          created_at timestamptz not null default now()
        )
      `
      );
      await query(
        this.client,
        `
        create table if not exists family_order (
          id bigserial primary key,
          family_id text not null references family(id),
          order_id uuid not null references customer_order(id) on delete cascade,
          amount double precision not null,
          order_date text,
          created_at timestamptz not null default now()
        )
      `
      );
      await query(
        this.client,
        `create index if not exists idx_customer_order_external on customer_order(external_order_id)`
      );
      await query(this.client, `create index if not exists idx_family_order_family on family_order(family_id)`);
    });
  }

  async findFamilyByKey(key: string): Promise<FamilyRecord | null> {
    const { rows } = await query<FamilyRow>(
      this.client,
      `select id, name, last_name, external_contact_id, delivery_email, phone, galleries
       from family where id = $1`,
      [key]
    );
    return rows.length ? toFamilyRecord(rows[0]) : null;
  }

  async mergeFamily(key: string, fields: Partial<FamilyFields>): Promise<void> {
    const { columns, values } = familyAssignments(fields);
    const sets = columns.map((column, index) => `${column} = $${index + 2}`);
    sets.push('updated_at = now()');
    await query(this.client, `update family set ${sets.join(', ')} where id = $1`, [key, ...values]);
  }

  async createFamily(key: string, fields: FamilyFields): Promise<void> {
    const { columns, values } = familyAssignments(fields);
    const placeholders = values.map((_, index) => `$${index + 2}`);
    await query(
      this.client,
      `insert into family (id, ${columns.join(', ')}) values ($1, ${placeholders.join(', ')})`,
      [key, ...values]
    );
  }

  async findOrderByExternalId(externalOrderId: number): Promise<OrderRef | null> {
    const { rows } = await query<OrderRow>(
      this.client,
      `select id, external_order_id from customer_order where external_order_id = $1 limit 1`,
      [externalOrderId]
    );
    if (!rows.length) return null;
    return { id: rows[0].id, externalOrderId: Number(rows[0].external_order_id) };
  }

  async createOrder(fields: OrderFields): Promise<string> {
    const { rows } = await query<{ id: string }>(
      this.client,
      `insert into customer_order (
         external_order_id, order_date, gallery_name, customer_name, customer_email,
         total_sales, profit, is_comp, item_count, items_raw
       )
       values ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       returning id`,
      [
        fields.externalOrderId,
        fields.orderDate,
        fields.galleryName,
        fields.customerName,
        fields.customerEmail,
        fields.totalSales,
        fields.profit,
        fields.isComp,
        fields.itemCount,
        fields.itemsRaw,
      ]
    );
    if (!rows.length) {
      throw storeFailure(`insert of order ${fields.externalOrderId} returned no id`);
    }
    return rows[0].id;
  }

  async createRelationship(familyKey: string, orderId: string, attributes: RelationshipAttributes): Promise<void> {
    await query(
      this.client,
      `insert into family_order (family_id, order_id, amount, order_date) values ($1, $2, $3, $4)`,
      [familyKey, orderId, attributes.amount, attributes.orderDate]
    );
  }
}
