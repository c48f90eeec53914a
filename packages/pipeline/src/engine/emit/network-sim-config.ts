import { join } from 'node:path';
import { readDelimited } from '../../lib/delimited.js';
import { writeText } from '../../lib/files.js';
import { IniDocument, quoted, withUnit, xmldoc } from '../../lib/ini.js';
import { INFRASTRUCTURE_COLUMNS, toInfrastructureNodes } from '../../schemas/tables.schema.js';
import type { InfrastructureNode, PlacedInfrastructureNode } from '../../types/index.js';
import type { CoordinateTransformer } from '../projection/index.js';
import type { ArtifactPathResolver, ArtifactPathSet } from './artifact-paths.js';

/** Roadside unit radio range in meters */
export const COMMUNICATION_RANGE_METERS = 600;

/** Simulated wall clock the middleware starts at */
export const REFERENCE_DATETIME = '2021-01-08 12:00:00';

export interface NetworkSimConfigInput {
  paths: Pick<ArtifactPathSet, 'sumoConfigFile' | 'servicesFile' | 'results'>;
  durationSeconds: number;
  seeds: readonly number[];
  nodes: readonly PlacedInfrastructureNode[];
}

export function readInfrastructureNodes(path: string): Promise<InfrastructureNode[]> {
  return readDelimited(path, {
    expectedColumns: INFRASTRUCTURE_COLUMNS,
    description: 'RSU configuration',
  }).then(toInfrastructureNodes);
}

export function buildNetworkSimConfig(input: NetworkSimConfigInput, resolver: ArtifactPathResolver): IniDocument {
  const doc = new IniDocument();
  const general = doc.section('General');

  general
    .set('network', 'artery.envmod.World')
    .set('sim-time-limit', withUnit(Math.trunc(input.durationSeconds), 's'))
    .set('debug-on-errors', 'true')
    .set('print-undisposed', 'true')
    .set('cmdenv-express-mode', 'true')
    .set('**.scalar-recording', 'false')
    .set('**.vector-recording', 'false')
    .set('**.middleware.datetime', quoted(REFERENCE_DATETIME))
    .set('*.traci.core.version', -1)
    .set('*.traci.launcher.typename', quoted('PosixLauncher'))
    .set('*.traci.launcher.sumocfg', quoted(resolver.forNetworkSim(input.paths.sumoConfigFile)))
    .set('num-rngs', 2)
    .set('*.traci.mapper.rng-0', 1)
    .set('seed-1-mt', `\${seed=${input.seeds.join(', ')}}`)
    .set('*.traci.mapper.typename', quoted('traci.MultiTypeModuleMapper'))
    .set('*.traci.mapper.vehicleTypes', xmldoc('vehicles.xml'))
    .set('*.numRoadSideUnits', input.nodes.length)
    .set('*.rsu[*].middleware.services', xmldoc('services-rsu.xml'))
    .set('*.rsu[*].middleware.RsuCa.reception.result-recording-modes', 'all')
    .blank();

  input.nodes.forEach((node, index) => {
    const rsu = `*.rsu[${index}]`;
    general
      .set(`${rsu}.mobility.initialZ`, '0m')
      .set(`${rsu}.mobility.initialX`, withUnit(node.x, 'm', 2))
      .set(`${rsu}.mobility.initialY`, withUnit(node.y, 'm', 2))
      .set(
        `${rsu}.middleware.RsuCALog.outputDirectory`,
        quoted(`${resolver.forNetworkSim(join(input.paths.results.omnet, node.id))}_`)
      )
      .blank();
  });

  general
    .set('*.radioMedium.rangeFilter', quoted('communicationRange'))
    .set('*.node[*].wlan[*].typename', quoted('VanetNic'))
    .set('*.node[*].wlan[*].radio.channelNumber', 180)
    .set('*.node[*].wlan[*].radio.carrierFrequency', '5.9 GHz')
    .set('*.node[*].wlan[*].radio.transmitter.communicationRange', withUnit(COMMUNICATION_RANGE_METERS, 'm'))
    .set('*.node[*].middleware.updateInterval', '0.1s')
    .set('*.node[*].middleware.services', xmldoc(resolver.forNetworkSim(input.paths.servicesFile)));

  return doc;
}

export interface EmitNetworkSimConfigInput extends Omit<NetworkSimConfigInput, 'nodes'> {
  infrastructureConfig: string;
  netFile: string;
}

/**
 * Read the roadside units, place them on the network and write the
 * network simulator's ini file.
 */
export async function emitNetworkSimConfig(
  outputPath: string,
  input: EmitNetworkSimConfigInput,
  transformer: CoordinateTransformer,
  resolver: ArtifactPathResolver
): Promise<PlacedInfrastructureNode[]> {
  const nodes = await transformer.placeNodes(await readInfrastructureNodes(input.infrastructureConfig), input.netFile);
  const doc = buildNetworkSimConfig({ ...input, nodes }, resolver);
  await writeText(outputPath, doc.toString());
  return nodes;
}
