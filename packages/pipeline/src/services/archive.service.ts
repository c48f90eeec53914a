import { copyFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { toDelimited } from '../lib/delimited.js';
import { assertExists, writeText } from '../lib/files.js';
import { BATCH_COLUMNS, toBatchRow } from '../schemas/scenario.schema.js';
import type { ScenarioSpec } from '../types/index.js';
import type { ArtifactPathSet } from '../engine/emit/artifact-paths.js';

/**
 * Keep a copy of the inputs a scenario ran with next to its results:
 * the batch row itself plus the roadside unit and detector tables.
 */
export async function archiveScenarioConfig(
  spec: ScenarioSpec,
  paths: Pick<ArtifactPathSet, 'infrastructureConfig' | 'detectorConfig' | 'results'>
): Promise<string[]> {
  const target = paths.results.config;
  await writeText(paths.results.archivedScenario, toDelimited(BATCH_COLUMNS, [toBatchRow(spec)]));

  const written = [paths.results.archivedScenario];
  const copies: Array<[string, string]> = [
    [paths.infrastructureConfig, 'RSU configuration'],
    [paths.detectorConfig, 'Detector configuration'],
  ];
  for (const [source, description] of copies) {
    await assertExists(source, description);
    const destination = join(target, basename(source));
    await copyFile(source, destination);
    written.push(destination);
  }
  return written;
}
