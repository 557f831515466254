import type { Store } from '../db.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('verify');

export type ProductRow = { product_id: number; product_name: string };
export type LocationRow = { location_id: number; location_name: string };
export type DriverRow = { driver_id: number; driver_identifier: string };

export type ShipmentView = {
  shipment_id: number;
  origin: string;
  destination: string;
  driver_identifier: string;
};

export type LineItemView = {
  shipment_id: number;
  product_name: string;
  quantity: number;
  on_time_status: string | null;
};

export type VerificationReport = {
  products: ProductRow[];
  locations: LocationRow[];
  drivers: DriverRow[];
  shipments: ShipmentView[];
  lineItems: LineItemView[];
};

export function fetchVerificationReport(db: Store, options: { lineItemLimit: number }): VerificationReport {
  const products = db
    .prepare<[], ProductRow>('select product_id, product_name from products order by product_id')
    .all();
  const locations = db
    .prepare<[], LocationRow>('select location_id, location_name from locations order by location_id')
    .all();
  const drivers = db.prepare<[], DriverRow>('select driver_id, driver_identifier from drivers order by driver_id').all();

  const shipments = db
    .prepare<[], ShipmentView>(
      `select s.shipment_id,
              ol.location_name as origin,
              dl.location_name as destination,
              d.driver_identifier
       from shipments s
       join locations ol on s.origin_location_id = ol.location_id
       join locations dl on s.destination_location_id = dl.location_id
       join drivers d on s.driver_id = d.driver_id
       order by s.shipment_id`
    )
    .all();

  const lineItems = db
    .prepare<[number], LineItemView>(
      `select sli.shipment_id, p.product_name, sli.quantity, sli.on_time_status
       from shipment_line_items sli
       join products p on sli.product_id = p.product_id
       order by sli.line_item_id
       limit ?`
    )
    .all(options.lineItemLimit);

  return { products, locations, drivers, shipments, lineItems };
}

function printSection(title: string, rows: object[]): void {
  log.info(`${title} (${rows.length}):`);
  for (const row of rows) {
    log.info(`  ${Object.values(row).map((value) => (value === null ? 'NULL' : String(value))).join(' | ')}`);
  }
}

export function printVerificationReport(report: VerificationReport): void {
  printSection('Products', report.products);
  printSection('Locations', report.locations);
  printSection('Drivers', report.drivers);
  printSection('Shipments', report.shipments);
  printSection('ShipmentLineItems', report.lineItems);
}
