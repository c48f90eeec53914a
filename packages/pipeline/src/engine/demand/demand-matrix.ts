import { readDelimited } from '../../lib/delimited.js';
import { writeText } from '../../lib/files.js';
import { DEMAND_COLUMNS, toDemandRows } from '../../schemas/tables.schema.js';
import type { DemandMatrixArtifact, DemandRow, TimeSegment, TimeWindow, VehicleClass } from '../../types/index.js';
import { segmentWindow } from './segments.js';

/** Source matrices describe one hour of demand */
export const REFERENCE_DURATION_SECONDS = 3600;

const FORMAT_HEADER = '$OM;D2';

export function readDemandRows(source: string): Promise<DemandRow[]> {
  return readDelimited(source, {
    expectedColumns: DEMAND_COLUMNS,
    description: 'Demand matrix',
  }).then(toDemandRows);
}

/** Scale hourly counts to the segment length, truncating toward zero. */
export function scaleDemand(rows: readonly DemandRow[], segmentDurationSeconds: number): DemandRow[] {
  const timeFactor = segmentDurationSeconds / REFERENCE_DURATION_SECONDS;
  return rows.map((row) => ({ ...row, count: Math.trunc(row.count * timeFactor) }));
}

/**
 * Render an O-format ($OM) matrix for od2trips. `rows` are already scaled.
 */
export function formatDemandMatrix(
  vehicleTypeCode: number,
  window: TimeWindow,
  factor: number,
  rows: readonly DemandRow[]
): string {
  const header =
    `${FORMAT_HEADER}\n` +
    '*vehicle type\n' +
    `${vehicleTypeCode}\n` +
    '*from-time to-time\n' +
    `${window.from}\t${window.to}\n` +
    `*factor\n${factor.toFixed(2)}\n\n`;
  return header + rows.map((row) => `\t ${row.from} \t ${row.to} \t ${row.count}\n`).join('');
}

/**
 * Scale the hourly source matrix to one segment and write it to `outputPath`.
 */
export async function emitDemandMatrix(
  source: string,
  segment: TimeSegment,
  vehicleClass: VehicleClass,
  outputPath: string
): Promise<DemandMatrixArtifact> {
  const rows = scaleDemand(await readDemandRows(source), segment.durationSeconds);
  const window = segmentWindow(segment);
  await writeText(outputPath, formatDemandMatrix(vehicleClass.vehicleTypeCode, window, segment.factor, rows));
  return {
    path: outputPath,
    vehicleClass: vehicleClass.id,
    vehicleTypeCode: vehicleClass.vehicleTypeCode,
    segmentIndex: segment.index,
    code: segment.code,
    factor: segment.factor,
    window,
  };
}
