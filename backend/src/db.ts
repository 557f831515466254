import { rmSync } from 'node:fs';
import Database from 'better-sqlite3';

export type Store = Database.Database;

/**
 * Opens (or creates) the store file. Foreign keys stay declared in the schema
 * but are not enforced for this connection: line items may name a shipment the
 * shipment metadata never lists.
 */
export function openStore(filePath: string): Store {
  const db = new Database(filePath);
  db.pragma('foreign_keys = OFF');
  return db;
}

/** Deletes the store file; returns false when there was none. */
export function removeStoreFile(filePath: string): boolean {
  try {
    rmSync(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export function withTransaction<T>(db: Store, fn: (db: Store) => T): T {
  db.exec('begin');
  try {
    const result = fn(db);
    db.exec('commit');
    return result;
  } catch (error) {
    db.exec('rollback');
    throw error;
  }
}
