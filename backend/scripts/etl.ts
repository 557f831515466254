// Shipment ETL: rebuilds the shipment store from the three shipping CSV exports.
// 1) Delete the previous store file and create products, locations, drivers, shipments, shipment_line_items.
// 2) Read shipping_data_0/1/2 and load them (per-row failures are logged, not fatal).
// 3) Print the resulting tables for inspection.
import 'dotenv/config';
import { loadConfig } from '../src/config.js';
import { openStore } from '../src/db.js';
import { errorMessage } from '../src/errors.js';
import { ensureSchema, resetStore } from '../src/services/schema.js';
import { loadShipmentData, sourceLabels } from '../src/services/shipment-loader.js';
import { readShippingTables } from '../src/services/shipping-tables.js';
import { fetchVerificationReport, printVerificationReport } from '../src/services/verifier.js';
import { createLogger } from '../src/utils/logger.js';

const log = createLogger('etl');

async function main(): Promise<void> {
  const config = loadConfig();

  resetStore(config.storePath);
  const db = openStore(config.storePath);

  try {
    log.info(`Store file ${config.storePath}`);
    ensureSchema(db);

    const tables = await readShippingTables(config.inputs);
    log.info(
      `Read ${tables.tableA.length} rows from ${config.inputs.tableA}, ${tables.tableB.length} from ${config.inputs.tableB}, ${tables.tableC.length} from ${config.inputs.tableC}`
    );

    const summary = loadShipmentData(db, tables, sourceLabels(config.inputs));
    if (summary.failures.length) {
      log.warn(`${summary.failures.length} rows were not loaded`);
      for (const failure of summary.failures) {
        log.warn(`  - ${failure.source} shipment ${failure.shipmentIdentifier} (${failure.kind}): ${failure.message}`);
      }
    }

    printVerificationReport(fetchVerificationReport(db, config.verify));
    log.info('Shipment load complete');
  } finally {
    db.close();
  }
}

main().catch((error) => {
  log.error(`Fatal: ${errorMessage(error)}`);
  process.exitCode = 1;
});
