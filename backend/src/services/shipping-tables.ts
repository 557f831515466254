import { promises as fsp } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { InputPaths } from '../config.js';
import { inputMalformed, inputMissing } from '../errors.js';

// shipping_data_0: origin/destination/product/driver per event
const tableARowSchema = z.object({
  origin_warehouse: z.string(),
  destination_store: z.string(),
  product: z.string(),
  on_time: z.string(),
  product_quantity: z.string(),
  driver_identifier: z.string(),
});

// shipping_data_1: line items
const tableBRowSchema = z.object({
  shipment_identifier: z.string(),
  product: z.string(),
  on_time: z.string(),
});

// shipping_data_2: shipment metadata
const tableCRowSchema = z.object({
  shipment_identifier: z.string(),
  origin_warehouse: z.string(),
  destination_store: z.string(),
  driver_identifier: z.string(),
});

export type TableARow = z.infer<typeof tableARowSchema>;
export type TableBRow = z.infer<typeof tableBRowSchema>;
export type TableCRow = z.infer<typeof tableCRowSchema>;

export type ShippingTables = {
  tableA: TableARow[];
  tableB: TableBRow[];
  tableC: TableCRow[];
};

async function readCsv<T extends z.ZodTypeAny>(filePath: string, rowSchema: T): Promise<Array<z.infer<T>>> {
  let content: string;
  try {
    content = await fsp.readFile(filePath, 'utf8');
  } catch (error) {
    throw inputMissing(filePath, error);
  }

  let records: unknown;
  try {
    records = parse(content, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw inputMalformed(filePath, error instanceof Error ? error.message : error);
  }

  const parsed = z.array(rowSchema).safeParse(records);
  if (!parsed.success) {
    throw inputMalformed(filePath, parsed.error.issues);
  }
  return parsed.data;
}

export async function readShippingTables(paths: InputPaths): Promise<ShippingTables> {
  return {
    tableA: await readCsv(paths.tableA, tableARowSchema),
    tableB: await readCsv(paths.tableB, tableBRowSchema),
    tableC: await readCsv(paths.tableC, tableCRowSchema),
  };
}

const shipmentIdentifierSchema = z.coerce.number().int();

/** Parses a `shipment_identifier` cell; throws when it is blank or not an integer. */
export function parseShipmentIdentifier(value: string): number {
  if (!value.trim()) {
    throw new Error('shipment_identifier is empty');
  }
  return shipmentIdentifierSchema.parse(value);
}
