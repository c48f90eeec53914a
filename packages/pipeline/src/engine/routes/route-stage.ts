import { ExternalToolError } from '../../lib/errors.js';
import { assertExists, pathExists } from '../../lib/files.js';
import type { Logger } from '../../lib/logger.js';
import type { ExternalTool } from '../../services/external-tool.service.js';
import type { DemandMatrixArtifact, RouteArtifact, RouteArtifactSet, VehicleClass } from '../../types/index.js';
import type { ArtifactPathSet } from '../emit/artifact-paths.js';
import { tripFilePath } from '../emit/artifact-paths.js';

export interface RouteTools {
  od2trips: ExternalTool;
  duarouter: ExternalTool;
}

export interface ClassDemand {
  vehicleClass: VehicleClass;
  matrices: readonly DemandMatrixArtifact[];
}

export function od2tripsArgs(
  tazFile: string,
  matrices: readonly DemandMatrixArtifact[],
  outputPath: string,
  vehicleClass: VehicleClass
): string[] {
  return [
    '-n', tazFile,
    '-X', 'never',
    '-d', matrices.map((m) => m.path).join(','),
    '--flow-output', outputPath,
    '--prefix', `${vehicleClass.id}_`,
    '--departlane', vehicleClass.departLane,
  ];
}

export function duarouterArgs(netFile: string, tripFile: string, vtypeFile: string, outputPath: string): string[] {
  return [
    '-n', netFile,
    '-X', 'never',
    '--route-files', tripFile,
    '--additional-files', vtypeFile,
    '-o', outputPath,
  ];
}

/**
 * Turns demand matrices into route inputs for the traffic simulator.
 */
export class RouteStageOrchestrator {
  constructor(
    private readonly scenarioId: string,
    private readonly paths: Pick<
      ArtifactPathSet,
      'routesDir' | 'tazFile' | 'netFile' | 'obstructionTrips' | 'obstructionRoute'
    >,
    private readonly tools: RouteTools,
    private readonly logger: Logger
  ) {}

  async buildRoutesForClass(vehicleClass: VehicleClass, matrices: readonly DemandMatrixArtifact[]): Promise<RouteArtifact> {
    const output = tripFilePath(this.paths, this.scenarioId, vehicleClass.id);
    const args = od2tripsArgs(this.paths.tazFile, matrices, output, vehicleClass);
    await this.runTool(this.tools.od2trips, args, output);
    return { kind: 'trips', source: vehicleClass.id, path: output };
  }

  /** Route the scripted obstruction vehicle. */
  async buildObstructionRoute(vtypeFile: string): Promise<RouteArtifact> {
    const tripFile = this.paths.obstructionTrips;
    await assertExists(tripFile, 'Obstruction trip file');

    const output = this.paths.obstructionRoute;
    await this.runTool(this.tools.duarouter, duarouterArgs(this.paths.netFile, tripFile, vtypeFile, output), output);
    return { kind: 'obstruction', source: 'obstruction', path: output };
  }

  /**
   * One trip file per class in the given order, then the obstruction route
   * when requested.
   */
  async buildAll(demand: readonly ClassDemand[], obstruction: { vtypeFile: string } | null): Promise<RouteArtifactSet> {
    const artifacts: RouteArtifact[] = [];
    for (const { vehicleClass, matrices } of demand) {
      artifacts.push(await this.buildRoutesForClass(vehicleClass, matrices));
    }
    if (obstruction) {
      artifacts.push(await this.buildObstructionRoute(obstruction.vtypeFile));
    }
    this.logger.info({ routeFiles: artifacts.length }, 'Route stage finished');
    return Object.freeze(artifacts);
  }

  private async runTool(tool: ExternalTool, args: string[], expectedOutput: string): Promise<void> {
    await tool.run(args);
    if (!(await pathExists(expectedOutput))) {
      throw new ExternalToolError(tool.name, args, `finished but did not write ${expectedOutput}`, 0);
    }
  }
}
