export type FamilyFields = {
  name: string;
  lastName: string;
  externalContactId?: number | null;
  deliveryEmail?: string;
  phone?: string;
  galleries?: string[];
};

export type FamilyRecord = FamilyFields & {
  id: string;
};

export type OrderFields = {
  externalOrderId: number;
  orderDate: string;
  galleryName: string;
  customerName: string;
  customerEmail: string;
  totalSales: number;
  profit: number;
  isComp: boolean;
  itemCount: number;
  itemsRaw: string | null;
};

export type OrderRef = {
  id: string;
  externalOrderId: number;
};

export type RelationshipAttributes = {
  amount: number;
  orderDate: string;
};

/**
 * Query contract the reconcilers depend on. Lookups resolve to `null` when
 * the store returns no rows.
 */
export interface StoreGateway {
  findFamilyByKey(key: string): Promise<FamilyRecord | null>;
  /** Updates only the fields present in `fields`. */
  mergeFamily(key: string, fields: Partial<FamilyFields>): Promise<void>;
  createFamily(key: string, fields: FamilyFields): Promise<void>;
  findOrderByExternalId(externalOrderId: number): Promise<OrderRef | null>;
  /** Returns the storage identity of the new order. */
  createOrder(fields: OrderFields): Promise<string>;
  createRelationship(familyKey: string, orderId: string, attributes: RelationshipAttributes): Promise<void>;
}
