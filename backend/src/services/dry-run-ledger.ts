/**
 * Records what a dry run would have written, so later rows and the orders
 * pass see those families and orders as existing. The store is still queried
 * for every row; the ledger only answers when the store has nothing.
 */
export class DryRunLedger {
  private readonly families = new Set<string>();
  private readonly orders = new Set<number>();

  hasFamily(key: string): boolean {
    return this.families.has(key);
  }

  addFamily(key: string): void {
    this.families.add(key);
  }

  hasOrder(externalOrderId: number): boolean {
    return this.orders.has(externalOrderId);
  }

  addOrder(externalOrderId: number): void {
    this.orders.add(externalOrderId);
  }
}
