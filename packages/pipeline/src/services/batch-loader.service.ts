import { readDelimited } from '../lib/delimited.js';
import { InvalidScenarioError } from '../lib/errors.js';
import { BATCH_COLUMNS, toScenarioSpec } from '../schemas/scenario.schema.js';
import type { DelimitedTable } from '../lib/delimited.js';
import type { ScenarioSpec } from '../types/index.js';

/**
 * Coerce every row of a batch table. The whole table is validated before
 * any scenario is returned, so a bad row never leaves siblings half-run.
 */
export function toScenarioSpecs(table: DelimitedTable): ScenarioSpec[] {
  const specs = table.rows.map((row, index) => toScenarioSpec(row, index + 2));

  const seen = new Set<string>();
  specs.forEach((spec, index) => {
    if (seen.has(spec.id)) {
      throw new InvalidScenarioError(
        'scenario_id',
        `Row ${index + 2}: scenario id '${spec.id}' is used more than once`,
        'unique id',
        spec.id
      );
    }
    seen.add(spec.id);
  });

  return specs;
}

export async function loadBatch(path: string): Promise<ScenarioSpec[]> {
  const table = await readDelimited(path, {
    expectedColumns: BATCH_COLUMNS,
    description: 'Batch file',
  });
  return toScenarioSpecs(table);
}
