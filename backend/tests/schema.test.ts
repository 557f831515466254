import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { openStore, type Store } from '../src/db.js';
import { ensureSchema, resetStore } from '../src/services/schema.js';
import { loadShipmentData } from '../src/services/shipment-loader.js';
import { fetchVerificationReport, type VerificationReport } from '../src/services/verifier.js';
import { tables } from './helpers/memory-store.js';

const SAMPLE = tables({
  tableA: [
    {
      origin_warehouse: 'WH1',
      destination_store: 'ST1',
      product: 'Widget',
      on_time: 'Yes',
      product_quantity: '5',
      driver_identifier: 'D1',
    },
  ],
  tableB: [
    { shipment_identifier: '100', product: 'Widget', on_time: 'Yes' },
    { shipment_identifier: '101', product: 'Gadget', on_time: 'No' },
  ],
  tableC: [
    { shipment_identifier: '100', origin_warehouse: 'WH1', destination_store: 'ST1', driver_identifier: 'D1' },
    { shipment_identifier: '101', origin_warehouse: 'ST1', destination_store: 'WH2', driver_identifier: 'D2' },
  ],
});

function countRows(db: Store, table: string): number {
  const row = db.prepare<[], { total: number }>(`select count(*) as total from ${table}`).get();
  return row ? row.total : 0;
}

function loadInto(filePath: string): VerificationReport {
  const db = openStore(filePath);
  try {
    ensureSchema(db);
    loadShipmentData(db, SAMPLE);
    return fetchVerificationReport(db, { lineItemLimit: 10 });
  } finally {
    db.close();
  }
}

describe('store lifecycle', () => {
  let dir: string;
  let storePath: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    dir = mkdtempSync(path.join(os.tmpdir(), 'shipment-store-'));
    storePath = path.join(dir, 'shipments.db');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('keeps existing rows when the schema is ensured again', () => {
    const db = openStore(storePath);
    ensureSchema(db);
    loadShipmentData(db, SAMPLE);

    ensureSchema(db);

    expect(countRows(db, 'products')).toBe(2);
    expect(countRows(db, 'shipments')).toBe(2);
    expect(countRows(db, 'shipment_line_items')).toBe(2);
    db.close();
  });

  it('rebuilds a populated store from scratch', () => {
    const first = loadInto(storePath);

    resetStore(storePath);
    expect(existsSync(storePath)).toBe(false);
    expect(console.log).toHaveBeenCalledWith(`[schema] Removed existing store file ${storePath}`);

    const db = openStore(storePath);
    ensureSchema(db);
    for (const table of ['products', 'locations', 'drivers', 'shipments', 'shipment_line_items']) {
      expect(countRows(db, table)).toBe(0);
    }
    db.close();

    const second = loadInto(storePath);
    expect(second).toEqual(first);
    expect(second.products).toEqual([
      { product_id: 1, product_name: 'Widget' },
      { product_id: 2, product_name: 'Gadget' },
    ]);
  });

  it('does nothing when there is no store file to remove', () => {
    expect(() => resetStore(storePath)).not.toThrow();
    expect(console.log).not.toHaveBeenCalled();
  });
});
