import { openStore, type Store } from '../../src/db.js';
import { ensureSchema } from '../../src/services/schema.js';
import type { ShippingTables } from '../../src/services/shipping-tables.js';

/** An in-memory store with the shipment schema already created. */
export function createMemoryStore(): Store {
  const db = openStore(':memory:');
  ensureSchema(db);
  return db;
}

export function tables(partial: Partial<ShippingTables>): ShippingTables {
  return {
    tableA: partial.tableA ?? [],
    tableB: partial.tableB ?? [],
    tableC: partial.tableC ?? [],
  };
}
