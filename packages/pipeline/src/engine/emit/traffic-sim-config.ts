import { writeText } from '../../lib/files.js';
import { element, option, serializeXml } from '../../lib/xml.js';
import type { XmlElement } from '../../lib/xml.js';
import type { ArtifactPathResolver, ArtifactPathSet } from './artifact-paths.js';

/** Same seed for every run; repeats differ through the network simulator's seeds */
export const TRAFFIC_SIM_SEED = 23424;

export const STEP_LENGTH_SECONDS = 0.1;
export const ACTION_STEP_LENGTH_SECONDS = 1;
export const FCD_PERIOD_SECONDS = 0.1;
export const MAX_DEPART_DELAY_SECONDS = 1;
/** Vehicles are never teleported */
export const TIME_TO_TELEPORT = -1;

export interface TrafficSimConfigInput {
  paths: Pick<
    ArtifactPathSet,
    'netFile' | 'vtypeFile' | 'tazFile' | 'polyFile' | 'additionalFile' | 'guiSettingsFile' | 'results'
  >;
  routeFiles: readonly string[];
  beginSeconds: number;
  durationSeconds: number;
  useTrafficLights: boolean;
}

export function buildTrafficSimConfig(input: TrafficSimConfigInput, resolver: ArtifactPathResolver): XmlElement {
  const ref = (path: string) => resolver.forTrafficSim(path);
  const { paths } = input;

  return element('configuration', {}, [
    element('input', {}, [
      option('net-file', ref(paths.netFile)),
      option('route-files', input.routeFiles.map(ref).join(', ')),
      option(
        'additional-files',
        [paths.vtypeFile, paths.tazFile, paths.polyFile, paths.additionalFile].map(ref).join(', ')
      ),
      option('seed', TRAFFIC_SIM_SEED),
    ]),
    element('output', {}, [
      option('fcd-output', ref(paths.results.fcdOutput)),
      option('device.fcd.period', FCD_PERIOD_SECONDS),
    ]),
    element('time', {}, [
      option('begin', input.beginSeconds),
      option('end', input.beginSeconds + input.durationSeconds),
      option('step-length', STEP_LENGTH_SECONDS),
    ]),
    element('processing', {}, [
      option('default.action-step-length', ACTION_STEP_LENGTH_SECONDS),
      option('time-to-teleport', TIME_TO_TELEPORT),
      option('tls.all-off', !input.useTrafficLights),
      option('max-depart-delay', MAX_DEPART_DELAY_SECONDS),
    ]),
    element('gui_only', {}, [option('gui-settings-file', ref(paths.guiSettingsFile))]),
  ]);
}

export async function emitTrafficSimConfig(
  outputPath: string,
  input: TrafficSimConfigInput,
  resolver: ArtifactPathResolver
): Promise<void> {
  await writeText(outputPath, serializeXml(buildTrafficSimConfig(input, resolver)));
}
