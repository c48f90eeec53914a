import { writeText } from '../../lib/files.js';
import { element, serializeXml } from '../../lib/xml.js';
import type { XmlElement } from '../../lib/xml.js';
import type { ArtifactPathResolver } from './artifact-paths.js';

/** Edge measurements are aggregated per minute */
export const EDGE_DUMP_INTERVAL_SECONDS = 60;

/** Vehicle types the edge dump records: passenger and heavy traffic */
export const MEASURED_VEHICLE_TYPES = '5 9';

export function buildAdditionalFile(edgeDumpReference: string): XmlElement {
  return element('additional', {}, [
    element('edgeData', {
      id: 'measurement',
      freq: EDGE_DUMP_INTERVAL_SECONDS,
      vTypes: MEASURED_VEHICLE_TYPES,
      file: edgeDumpReference,
      excludeEmpty: true,
    }),
  ]);
}

export async function emitAdditionalFile(
  outputPath: string,
  edgeDumpPath: string,
  resolver: ArtifactPathResolver
): Promise<void> {
  await writeText(outputPath, serializeXml(buildAdditionalFile(resolver.forTrafficSim(edgeDumpPath))));
}
