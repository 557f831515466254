import { removeStoreFile, type Store } from '../db.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('schema');

/** Removes the previous store file so the run rebuilds from scratch. */
export function resetStore(filePath: string): void {
  if (removeStoreFile(filePath)) {
    log.info(`Removed existing store file ${filePath}`);
  }
}

export function ensureSchema(db: Store): void {
  db.exec(`
    create table if not exists products (
      product_id integer primary key autoincrement,
      product_name text not null unique
    )
  `);

  db.exec(`
    create table if not exists locations (
      location_id integer primary key autoincrement,
      location_name text not null unique
    )
  `);

  db.exec(`
    create table if not exists drivers (
      driver_id integer primary key autoincrement,
      driver_identifier text not null unique
    )
  `);

  db.exec(`
    create table if not exists shipments (
      shipment_id integer primary key,
      origin_location_id integer not null,
      destination_location_id integer not null,
      driver_id integer not null,
      foreign key (origin_location_id) references locations(location_id),
      foreign key (destination_location_id) references locations(location_id),
      foreign key (driver_id) references drivers(driver_id)
    )
  `);

  db.exec(`
    create table if not exists shipment_line_items (
      line_item_id integer primary key autoincrement,
      shipment_id integer not null,
      product_id integer not null,
      quantity integer not null,
      on_time_status text,
      foreign key (shipment_id) references shipments(shipment_id),
      foreign key (product_id) references products(product_id)
    )
  `);

  log.info('Shipment tables are in place');
}
