import path from 'node:path';
import { withTransaction, type Store } from '../db.js';
import { errorMessage, isIntegrityViolation } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { resolveEntity, type EntityKind } from './entity-resolver.js';
import { parseShipmentIdentifier, type ShippingTables, type TableBRow, type TableCRow } from './shipping-tables.js';

const log = createLogger('loader');

// shipping_data_1 has no quantity column.
export const DEFAULT_LINE_ITEM_QUANTITY = 1;

export type RowFailure = {
  source: string;
  shipmentIdentifier: string;
  kind: 'integrity' | 'unexpected';
  message: string;
};

export type LoadSummary = {
  products: number;
  locations: number;
  drivers: number;
  shipmentsInserted: number;
  shipmentsSkipped: number;
  lineItemsInserted: number;
  quantitiesDefaulted: number;
  failures: RowFailure[];
};

export type SourceLabels = {
  tableB: string;
  tableC: string;
};

const DEFAULT_SOURCES: SourceLabels = {
  tableB: 'shipping_data_1.csv',
  tableC: 'shipping_data_2.csv',
};

export function collectDistinct(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    if (value) seen.add(value);
  }
  return [...seen];
}

function requireName(value: string, column: string): string {
  if (!value) {
    throw new Error(`${column} is empty`);
  }
  return value;
}

function populateEntities(db: Store, kind: EntityKind, names: string[]): number {
  withTransaction(db, (tx) => {
    for (const name of names) {
      resolveEntity(tx, kind, name);
    }
  });
  return names.length;
}

function populateMasterData(db: Store, tables: ShippingTables, summary: LoadSummary): void {
  const { tableA, tableB, tableC } = tables;

  log.info('Populating products, locations and drivers');

  const products = collectDistinct([...tableA.map((row) => row.product), ...tableB.map((row) => row.product)]);
  summary.products = populateEntities(db, 'product', products);

  const locations = collectDistinct([
    ...tableA.map((row) => row.origin_warehouse),
    ...tableA.map((row) => row.destination_store),
    ...tableC.map((row) => row.origin_warehouse),
    ...tableC.map((row) => row.destination_store),
  ]);
  summary.locations = populateEntities(db, 'location', locations);

  const drivers = collectDistinct([
    ...tableA.map((row) => row.driver_identifier),
    ...tableC.map((row) => row.driver_identifier),
  ]);
  summary.drivers = populateEntities(db, 'driver', drivers);

  log.info(
    `Resolved ${summary.products} products, ${summary.locations} locations and ${summary.drivers} drivers`
  );
}

/** Keeps the first row per shipment identifier, in file order. */
export function uniqueShipments(rows: TableCRow[]): TableCRow[] {
  const seen = new Set<string>();
  const unique: TableCRow[] = [];
  for (const row of rows) {
    if (seen.has(row.shipment_identifier)) continue;
    seen.add(row.shipment_identifier);
    unique.push(row);
  }
  return unique;
}

function insertShipment(db: Store, row: TableCRow): boolean {
  const shipmentId = parseShipmentIdentifier(row.shipment_identifier);
  const originId = resolveEntity(db, 'location', requireName(row.origin_warehouse, 'origin_warehouse'));
  const destinationId = resolveEntity(db, 'location', requireName(row.destination_store, 'destination_store'));
  const driverId = resolveEntity(db, 'driver', requireName(row.driver_identifier, 'driver_identifier'));

  const result = db
    .prepare<[number, number, number, number]>(
      `insert or ignore into shipments (shipment_id, origin_location_id, destination_location_id, driver_id)
       values (?, ?, ?, ?)`
    )
    .run(shipmentId, originId, destinationId, driverId);
  return result.changes > 0;
}

function insertLineItem(db: Store, row: TableBRow, source: string): void {
  const shipmentId = parseShipmentIdentifier(row.shipment_identifier);
  const productId = resolveEntity(db, 'product', requireName(row.product, 'product'));

  log.warn(
    `Quantity not found in ${source} for shipment ${shipmentId} product ${row.product}; defaulting to ${DEFAULT_LINE_ITEM_QUANTITY}`
  );

  db.prepare<[number, number, number, string | null]>(
    `insert into shipment_line_items (shipment_id, product_id, quantity, on_time_status)
     values (?, ?, ?, ?)`
  ).run(shipmentId, productId, DEFAULT_LINE_ITEM_QUANTITY, row.on_time === '' ? null : row.on_time);
}

function recordFailure(
  summary: LoadSummary,
  subject: string,
  source: string,
  shipmentIdentifier: string,
  error: unknown
): void {
  const message = errorMessage(error);
  const identifier = shipmentIdentifier || 'N/A';
  if (isIntegrityViolation(error)) {
    log.error(`Integrity error inserting ${subject} ${identifier} from ${source}: ${message}`);
    summary.failures.push({ source, shipmentIdentifier: identifier, kind: 'integrity', message });
    return;
  }
  log.error(`Unexpected error processing ${subject} ${identifier} from ${source}: ${message}`);
  summary.failures.push({ source, shipmentIdentifier: identifier, kind: 'unexpected', message });
}

function migrateShipments(db: Store, rows: TableCRow[], source: string, summary: LoadSummary): void {
  const unique = uniqueShipments(rows);
  summary.shipmentsSkipped += rows.length - unique.length;

  for (const row of unique) {
    try {
      const inserted = withTransaction(db, (tx) => insertShipment(tx, row));
      if (inserted) {
        summary.shipmentsInserted += 1;
      } else {
        summary.shipmentsSkipped += 1;
      }
    } catch (error) {
      recordFailure(summary, 'shipment', source, row.shipment_identifier, error);
    }
  }
}

function migrateLineItems(db: Store, rows: TableBRow[], source: string, summary: LoadSummary): void {
  for (const row of rows) {
    try {
      withTransaction(db, (tx) => insertLineItem(tx, row, source));
      summary.lineItemsInserted += 1;
      summary.quantitiesDefaulted += 1;
    } catch (error) {
      recordFailure(summary, 'line item for shipment', source, row.shipment_identifier, error);
    }
  }
}

/**
 * Loads the three shipping tables into the store. Entity tables are committed
 * once per kind; every shipment and line item commits (or rolls back) on its
 * own, and a failing row is logged and recorded without stopping the load.
 */
export function loadShipmentData(
  db: Store,
  tables: ShippingTables,
  sources: SourceLabels = DEFAULT_SOURCES
): LoadSummary {
  const summary: LoadSummary = {
    products: 0,
    locations: 0,
    drivers: 0,
    shipmentsInserted: 0,
    shipmentsSkipped: 0,
    lineItemsInserted: 0,
    quantitiesDefaulted: 0,
    failures: [],
  };

  populateMasterData(db, tables, summary);

  log.info('Populating shipments and shipment line items');
  migrateShipments(db, tables.tableC, sources.tableC, summary);
  migrateLineItems(db, tables.tableB, sources.tableB, summary);

  log.info(
    `Inserted ${summary.shipmentsInserted} shipments (${summary.shipmentsSkipped} duplicates skipped) and ${summary.lineItemsInserted} line items; ${summary.failures.length} rows failed`
  );
  return summary;
}

export function sourceLabels(paths: { tableB: string; tableC: string }): SourceLabels {
  return {
    tableB: path.basename(paths.tableB),
    tableC: path.basename(paths.tableC),
  };
}
