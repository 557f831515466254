import type { Store } from '../db.js';

export type EntityKind = 'product' | 'location' | 'driver';

type EntityTable = {
  table: string;
  idColumn: string;
  nameColumn: string;
};

const ENTITY_TABLES: Record<EntityKind, EntityTable> = {
  product: { table: 'products', idColumn: 'product_id', nameColumn: 'product_name' },
  location: { table: 'locations', idColumn: 'location_id', nameColumn: 'location_name' },
  driver: { table: 'drivers', idColumn: 'driver_id', nameColumn: 'driver_identifier' },
};

type IdRow = { id: number };

/**
 * Returns the key of the row whose name column equals `name` exactly, inserting
 * the row first when it does not exist yet. Lookup and insert are separate
 * statements, so callers must be the only writer.
 */
export function resolveEntity(db: Store, kind: EntityKind, name: string): number {
  const { table, idColumn, nameColumn } = ENTITY_TABLES[kind];

  const existing = db
    .prepare<[string], IdRow>(`select ${idColumn} as id from ${table} where ${nameColumn} = ? limit 1`)
    .get(name);
  if (existing) {
    return existing.id;
  }

  const inserted = db.prepare<[string]>(`insert into ${table} (${nameColumn}) values (?)`).run(name);
  return Number(inserted.lastInsertRowid);
}
