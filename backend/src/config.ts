import path from 'node:path';
import { z } from 'zod';
import { invalidConfig } from './errors.js';

const envSchema = z.object({
  SHIPMENTS_DB_PATH: z.string().min(1).default('shipments.db'),
  SHIPPING_DATA_DIR: z.string().min(1).optional(),
  SHIPPING_DATA_0: z.string().min(1).default('shipping_data_0.csv'),
  SHIPPING_DATA_1: z.string().min(1).default('shipping_data_1.csv'),
  SHIPPING_DATA_2: z.string().min(1).default('shipping_data_2.csv'),
  VERIFY_LINE_ITEM_LIMIT: z.coerce.number().int().positive().default(10),
});

export type InputPaths = {
  tableA: string;
  tableB: string;
  tableC: string;
};

export type EtlConfig = {
  storePath: string;
  inputs: InputPaths;
  verify: {
    lineItemLimit: number;
  };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EtlConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw invalidConfig(parsed.error.issues);
  }
  const values = parsed.data;
  const dataDir = path.resolve(values.SHIPPING_DATA_DIR ?? process.cwd());

  return {
    storePath: path.resolve(values.SHIPMENTS_DB_PATH),
    inputs: {
      tableA: path.resolve(dataDir, values.SHIPPING_DATA_0),
      tableB: path.resolve(dataDir, values.SHIPPING_DATA_1),
      tableC: path.resolve(dataDir, values.SHIPPING_DATA_2),
    },
    verify: {
      lineItemLimit: values.VERIFY_LINE_ITEM_LIMIT,
    },
  };
}
