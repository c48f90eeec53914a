import { join, relative, resolve, sep } from 'node:path';
import type { ScenarioSpec } from '../../types/index.js';

export const DEFAULT_POLY_FILE = 'dave.poly.add.xml';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ResultPaths {
  readonly root: string;
  readonly sumo: string;
  readonly omnet: string;
  readonly dave: string;
  readonly config: string;
  readonly fcdOutput: string;
  readonly edgeDump: string;
  readonly archivedScenario: string;
}

/**
 * Every absolute path one scenario reads or writes. Computed once when the
 * pipeline is constructed.
 */
export interface ArtifactPathSet {
  readonly simulationRoot: string;
  readonly sumoRoot: string;
  readonly netDir: string;
  readonly additionalDir: string;
  readonly trafficDir: string;
  readonly routesDir: string;
  readonly sumoConfigDir: string;

  readonly netFile: string;
  readonly polyFile: string;
  readonly vtypeTemplate: string;
  readonly vtypeFile: string;
  readonly additionalFile: string;
  readonly guiSettingsFile: string;

  readonly tazFile: string;
  readonly infrastructureConfig: string;
  readonly detectorConfig: string;
  readonly obstructionTrips: string;
  readonly obstructionRoute: string;

  readonly sumoConfigFile: string;
  readonly servicesFile: string;
  readonly networkConfigFile: string;

  readonly results: ResultPaths;
}

export interface ArtifactLayoutOptions {
  simulationRoot: string;
  /** Results folder, relative to the simulation root or absolute */
  resultsDir: string;
  polyFile?: string;
}

// ─── Layout ──────────────────────────────────────────────────────────────────

export function buildArtifactPaths(
  spec: Pick<ScenarioSpec, 'id' | 'network' | 'trafficProfile'>,
  options: ArtifactLayoutOptions
): ArtifactPathSet {
  const simulationRoot = resolve(options.simulationRoot);
  const sumoRoot = join(simulationRoot, 'sumo');
  const netDir = join(sumoRoot, 'net');
  const additionalDir = join(sumoRoot, 'additional');
  const trafficDir = join(sumoRoot, 'traffic', spec.trafficProfile);
  const routesDir = join(sumoRoot, 'routes', spec.id);
  const sumoConfigDir = join(sumoRoot, 'config');

  const resultsRoot = resolve(simulationRoot, options.resultsDir, spec.id);
  const resultsSumo = join(resultsRoot, 'sumo');
  const resultsConfig = join(resultsRoot, 'config');

  return Object.freeze({
    simulationRoot,
    sumoRoot,
    netDir,
    additionalDir,
    trafficDir,
    routesDir,
    sumoConfigDir,

    netFile: join(netDir, spec.network),
    polyFile: join(netDir, options.polyFile ?? DEFAULT_POLY_FILE),
    vtypeTemplate: join(additionalDir, 'vtypes.add.xml'),
    vtypeFile: join(additionalDir, `${spec.id}_vtypes.add.xml`),
    additionalFile: join(additionalDir, `${spec.id}_additional.add.xml`),
    guiSettingsFile: join(additionalDir, 'view.add.xml'),

    tazFile: join(trafficDir, 'taz.xml'),
    infrastructureConfig: join(trafficDir, 'rsu_config.csv'),
    detectorConfig: join(trafficDir, 'detector_config.csv'),
    obstructionTrips: join(trafficDir, 'obstruction.trips.xml'),
    obstructionRoute: join(routesDir, `${spec.id}_od_routes.rou.xml`),

    sumoConfigFile: join(sumoConfigDir, `${spec.id}.sumocfg`),
    servicesFile: join(simulationRoot, `${spec.id}_services.xml`),
    networkConfigFile: join(simulationRoot, `${spec.id}_omnetpp.ini`),

    results: Object.freeze({
      root: resultsRoot,
      sumo: resultsSumo,
      omnet: join(resultsRoot, 'omnet'),
      dave: join(resultsRoot, 'dave'),
      config: resultsConfig,
      fcdOutput: join(resultsSumo, 'fcd.out.xml'),
      edgeDump: join(resultsSumo, 'edge_dump.out.xml'),
      archivedScenario: join(resultsConfig, 'sim_config.csv'),
    }),
  });
}

/** `<routes>/<id>_trip_<class>.odtrips.xml` */
export function tripFilePath(paths: Pick<ArtifactPathSet, 'routesDir'>, scenarioId: string, vehicleClassId: string): string {
  return join(paths.routesDir, `${scenarioId}_trip_${vehicleClassId}.odtrips.xml`);
}

// ─── Relativization ──────────────────────────────────────────────────────────

function toPosix(path: string): string {
  return path.split(sep).join('/');
}

/**
 * Writes paths the way each simulator resolves them: the traffic simulator
 * relative to its config folder (`sumo/config/`), the network simulator
 * relative to the simulation root it is started in.
 */
export class ArtifactPathResolver {
  constructor(private readonly paths: Pick<ArtifactPathSet, 'sumoRoot' | 'simulationRoot'>) {}

  forTrafficSim(path: string): string {
    return `../${toPosix(relative(this.paths.sumoRoot, path))}`;
  }

  forNetworkSim(path: string): string {
    return toPosix(relative(this.paths.simulationRoot, path));
  }
}
