import { z } from 'zod';
import type { DelimitedTable } from '../lib/delimited.js';
import { parseDecimal } from '../lib/delimited.js';
import { ConfigSchemaError } from '../lib/errors.js';
import type { DemandRow, InfrastructureNode } from '../types/index.js';

/** `odm_<class>.csv`: demand per origin/destination pair for one hour. */
export const DEMAND_COLUMNS = ['from', 'to', 'num'] as const;

/** `rsu_config.csv`: one roadside unit per row. */
export const INFRASTRUCTURE_COLUMNS = ['rsuID', 'lon', 'lat'] as const;

const DemandRowSchema = z.object({
  from: z.string().min(1, 'Origin zone is required'),
  to: z.string().min(1, 'Destination zone is required'),
  num: z
    .string()
    .transform((value) => parseDecimal(value))
    .pipe(z.number().finite('Must be a number').nonnegative('Must not be negative')),
});

const InfrastructureRowSchema = z.object({
  rsuID: z.string().min(1, 'RSU id is required'),
  lon: z
    .string()
    .transform((value) => parseDecimal(value))
    .pipe(z.number().finite('Longitude must be a number')),
  lat: z
    .string()
    .transform((value) => parseDecimal(value))
    .pipe(z.number().finite('Latitude must be a number')),
});

function parseRows<T>(table: DelimitedTable, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  return table.rows.map((row, index) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ConfigSchemaError(
        table.source,
        `Row ${index + 2}, column '${issue?.path.join('.') ?? '?'}': ${issue?.message ?? 'invalid value'}`
      );
    }
    return result.data;
  });
}

export function toDemandRows(table: DelimitedTable): DemandRow[] {
  return parseRows(table, DemandRowSchema).map((row) => ({
    from: row.from,
    to: row.to,
    count: row.num,
  }));
}

export function toInfrastructureNodes(table: DelimitedTable): InfrastructureNode[] {
  return parseRows(table, InfrastructureRowSchema).map((row) => ({
    id: row.rsuID,
    lon: row.lon,
    lat: row.lat,
  }));
}
